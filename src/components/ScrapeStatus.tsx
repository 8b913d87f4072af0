"use client";

import { CrawlStatus } from "@/lib/types";

interface ScrapeStatusProps {
  status: CrawlStatus | null;
}

export function ScrapeStatus({ status }: ScrapeStatusProps) {
  if (!status) return null;

  const tone = status.error
    ? "text-red-300"
    : status.isRunning
      ? "text-blue-300"
      : "text-gray-400";

  return (
    <span className={`text-xs ${tone}`}>
      {status.isRunning && <span className="inline-block w-2 h-2 mr-2 rounded-full bg-blue-400 animate-pulse" />}
      {status.statusMessage}
      {status.lastRun && !status.isRunning && (
        <> &middot; last run {new Date(status.lastRun).toLocaleString()}</>
      )}
    </span>
  );
}
