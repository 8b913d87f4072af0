"use client";

import { Statistics } from "@/lib/types";

interface StatsBarProps {
  stats: Statistics | null;
}

const STAT_LABELS: { key: keyof Statistics; label: string }[] = [
  { key: "totalVehicles", label: "Total" },
  { key: "availableVehicles", label: "Available" },
  { key: "newVehicles24h", label: "New (24h)" },
  { key: "soldVehicles", label: "Sold" },
  { key: "vehiclesWithPriceHistory", label: "Price Tracked" },
];

export function StatsBar({ stats }: StatsBarProps) {
  if (!stats) return null;

  return (
    <div className="flex flex-wrap gap-3 mb-4">
      {STAT_LABELS.map(({ key, label }) => (
        <div key={key} className="bg-gray-900 border border-gray-800 rounded px-4 py-2">
          <div className="text-xl font-bold">{stats[key]}</div>
          <div className="text-xs text-gray-400">{label}</div>
        </div>
      ))}
    </div>
  );
}
