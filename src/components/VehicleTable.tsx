"use client";

import { useState } from "react";
import { VehicleWithHistory } from "@/lib/types";
import { PriceHistory } from "./PriceHistory";

interface VehicleTableProps {
  vehicles: VehicleWithHistory[];
  onToggleSold: (url: string, sold: boolean) => void;
}

type SortKey = "price" | "firstSeen" | "lastSeen" | "location";

const euros = (amount: number) => `${amount.toLocaleString("fr-FR")} €`;

function priceDelta(vehicle: VehicleWithHistory) {
  const diff = vehicle.price - vehicle.originalPrice;
  if (diff === 0) return null;
  return (
    <span
      className={`ml-2 px-1.5 py-0.5 rounded text-xs font-medium ${
        diff < 0 ? "bg-emerald-900/50 text-emerald-300" : "bg-red-900/50 text-red-300"
      }`}
    >
      {diff < 0 ? "-" : "+"}
      {euros(Math.abs(diff))}
    </span>
  );
}

export function VehicleTable({ vehicles, onToggleSold }: VehicleTableProps) {
  const [sortKey, setSortKey] = useState<SortKey>("lastSeen");
  const [sortAsc, setSortAsc] = useState(false);
  const [showUnavailable, setShowUnavailable] = useState(false);

  const handleSort = (key: SortKey) => {
    if (key === sortKey) {
      setSortAsc(!sortAsc);
    } else {
      setSortKey(key);
      setSortAsc(key === "price" || key === "location");
    }
  };

  const visible = vehicles.filter((v) => showUnavailable || v.isAvailable);
  const sorted = [...visible].sort((a, b) => {
    let cmp: number;
    switch (sortKey) {
      case "price":
        cmp = a.price - b.price;
        break;
      case "location":
        cmp = a.location.localeCompare(b.location);
        break;
      default:
        cmp = a[sortKey].localeCompare(b[sortKey]);
    }
    return sortAsc ? cmp : -cmp;
  });

  const SortHeader = ({ label, sortKeyVal }: { label: string; sortKeyVal: SortKey }) => (
    <th
      className="px-3 py-2 text-left text-xs font-medium text-gray-400 uppercase tracking-wider cursor-pointer hover:text-gray-200 select-none"
      onClick={() => handleSort(sortKeyVal)}
    >
      {label}
      {sortKey === sortKeyVal && <span className="ml-1">{sortAsc ? "▲" : "▼"}</span>}
    </th>
  );

  const Header = ({ label }: { label: string }) => (
    <th className="px-3 py-2 text-left text-xs font-medium text-gray-400 uppercase tracking-wider">{label}</th>
  );

  if (vehicles.length === 0) {
    return (
      <div className="text-center text-gray-500 py-12">
        No vehicles yet. Run a scrape to populate the database.
      </div>
    );
  }

  return (
    <>
      <label className="flex items-center gap-2 mb-2 text-xs text-gray-400">
        <input
          type="checkbox"
          checked={showUnavailable}
          onChange={(e) => setShowUnavailable(e.target.checked)}
        />
        Show unavailable ({vehicles.length - vehicles.filter((v) => v.isAvailable).length})
      </label>
      <div className="overflow-x-auto">
        <table className="w-full text-sm">
          <thead className="sticky top-0 bg-gray-900 z-10">
            <tr className="border-b border-gray-800">
              <Header label="Photo" />
              <SortHeader label="Price" sortKeyVal="price" />
              <Header label="Vehicle" />
              <Header label="Color" />
              <Header label="Seats" />
              <Header label="Packs" />
              <SortHeader label="Location" sortKeyVal="location" />
              <SortHeader label="First Seen" sortKeyVal="firstSeen" />
              <SortHeader label="Last Seen" sortKeyVal="lastSeen" />
              <Header label="Sold" />
            </tr>
          </thead>
          <tbody>
            {sorted.map((v) => (
              <tr
                key={v.url}
                className={`border-b border-gray-800/50 hover:bg-gray-900/50 ${
                  v.isAvailable ? "" : "opacity-50"
                } ${v.isNew ? "bg-emerald-950/30" : ""}`}
              >
                <td className="px-3 py-2">
                  <a href={v.url} target="_blank" rel="noopener noreferrer">
                    {v.photoUrl ? (
                      // eslint-disable-next-line @next/next/no-img-element
                      <img src={v.photoUrl} alt={v.title} loading="lazy" className="w-32 rounded" />
                    ) : (
                      <div className="w-32 h-20 flex items-center justify-center bg-gray-800 rounded text-xs text-gray-500">
                        No Photo
                      </div>
                    )}
                  </a>
                  {v.isNew && (
                    <span className="inline-block mt-1 px-1.5 py-0.5 rounded text-xs font-medium bg-emerald-700 text-white">
                      NEW
                    </span>
                  )}
                </td>
                <td className="px-3 py-2 whitespace-nowrap">
                  <span className="font-semibold">{euros(v.price)}</span>
                  {priceDelta(v)}
                  <PriceHistory history={v.priceHistory} />
                </td>
                <td className="px-3 py-2">
                  <a href={v.url} target="_blank" rel="noopener noreferrer" className="text-blue-400 hover:underline">
                    {v.title}
                  </a>
                </td>
                <td className="px-3 py-2">{v.exteriorColor}</td>
                <td className="px-3 py-2">{v.seatType}</td>
                <td className="px-3 py-2 text-xs text-gray-400 max-w-xs">{v.packs}</td>
                <td className="px-3 py-2">
                  {v.latitude !== null && v.longitude !== null ? (
                    <a
                      href={`https://www.google.com/maps/search/?api=1&query=${v.latitude},${v.longitude}`}
                      target="_blank"
                      rel="noopener noreferrer"
                      className="text-blue-400 hover:underline"
                    >
                      {v.location}
                    </a>
                  ) : (
                    v.location
                  )}
                </td>
                <td className="px-3 py-2 text-xs text-gray-400 whitespace-nowrap">
                  {new Date(v.firstSeen).toLocaleString()}
                </td>
                <td className="px-3 py-2 text-xs text-gray-400 whitespace-nowrap">
                  {new Date(v.lastSeen).toLocaleString()}
                </td>
                <td className="px-3 py-2">
                  <input
                    type="checkbox"
                    checked={v.isSold}
                    onChange={(e) => onToggleSold(v.url, e.target.checked)}
                  />
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </>
  );
}
