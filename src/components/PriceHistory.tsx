"use client";

import { PriceHistoryEntry } from "@/lib/types";

interface PriceHistoryProps {
  history: PriceHistoryEntry[];
}

export function PriceHistory({ history }: PriceHistoryProps) {
  if (history.length <= 1) return null;

  return (
    <ul className="mt-1 space-y-0.5 text-xs text-gray-500">
      {history.map((entry, i) => {
        const prev = i > 0 ? history[i - 1].price : null;
        let arrow = "";
        if (prev !== null && entry.price < prev) arrow = "↓";
        else if (prev !== null && entry.price > prev) arrow = "↑";
        return (
          <li key={`${entry.scrapedAt}-${i}`}>
            {entry.scrapedAt.slice(0, 10)}: {entry.price.toLocaleString("fr-FR")}&nbsp;&euro;
            {arrow && (
              <span className={arrow === "↓" ? "ml-1 text-emerald-400" : "ml-1 text-red-400"}>{arrow}</span>
            )}
          </li>
        );
      })}
    </ul>
  );
}
