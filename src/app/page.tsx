"use client";

import { useState, useEffect, useCallback, useRef } from "react";
import { VehicleTable } from "@/components/VehicleTable";
import { StatsBar } from "@/components/StatsBar";
import { ScrapeStatus } from "@/components/ScrapeStatus";
import { CrawlStatus, Statistics, VehicleWithHistory } from "@/lib/types";

const POLL_INTERVAL_MS = 2000;

interface VehiclesResponse {
  success: boolean;
  vehicles?: VehicleWithHistory[];
  stats?: Statistics;
  error?: string;
}

interface StatusResponse extends CrawlStatus {
  success: boolean;
}

export default function Home() {
  const [vehicles, setVehicles] = useState<VehicleWithHistory[]>([]);
  const [stats, setStats] = useState<Statistics | null>(null);
  const [status, setStatus] = useState<CrawlStatus | null>(null);
  const [error, setError] = useState<string | null>(null);
  const wasRunning = useRef(false);

  const loadVehicles = useCallback(async () => {
    try {
      const res = await fetch("/api/vehicles");
      const data: VehiclesResponse = await res.json();

      if (!data.success) {
        setError(data.error || "Failed to load vehicles");
        return;
      }

      setVehicles(data.vehicles || []);
      setStats(data.stats || null);
      setError(null);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to load vehicles");
    }
  }, []);

  const loadStatus = useCallback(async () => {
    try {
      const res = await fetch("/api/status");
      const data: StatusResponse = await res.json();
      setStatus(data);

      // Reload once a run finishes
      if (wasRunning.current && !data.isRunning) {
        await loadVehicles();
      }
      wasRunning.current = data.isRunning;
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to load status");
    }
  }, [loadVehicles]);

  useEffect(() => {
    void loadVehicles();
    void loadStatus();
  }, [loadVehicles, loadStatus]);

  useEffect(() => {
    if (!status?.isRunning) return;
    const timer = setInterval(() => void loadStatus(), POLL_INTERVAL_MS);
    return () => clearInterval(timer);
  }, [status?.isRunning, loadStatus]);

  const handleScrape = async () => {
    setError(null);
    try {
      const res = await fetch("/api/scrape", { method: "POST" });
      const data: { success: boolean; message?: string; error?: string } = await res.json();

      if (!data.success) {
        setError(data.error || data.message || "Failed to start scrape");
      }
      await loadStatus();
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to start scrape");
    }
  };

  const handleToggleSold = async (url: string, sold: boolean) => {
    try {
      const res = await fetch("/api/vehicles/sold", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ url, sold }),
      });
      const data: { success: boolean; error?: string } = await res.json();

      if (!data.success) {
        setError(data.error || "Failed to update vehicle");
        return;
      }
      await loadVehicles();
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to update vehicle");
    }
  };

  const running = status?.isRunning ?? false;

  return (
    <div className="min-h-screen p-4 md:p-8 max-w-[1400px] mx-auto">
      <header className="mb-6">
        <h1 className="text-2xl font-bold mb-1">Mégane E-Tech Tracker</h1>
        <p className="text-gray-400 text-sm">Used Iconic Optimum Charge listings with price history</p>
      </header>

      <div className="flex flex-wrap items-center gap-3 mb-4">
        <button
          onClick={handleScrape}
          disabled={running}
          className="bg-blue-600 hover:bg-blue-500 disabled:bg-blue-800 disabled:text-gray-400 text-white px-4 py-2 rounded text-sm font-medium transition-colors"
        >
          {running ? "Scraping..." : "Run Scrape"}
        </button>

        <a
          href="/api/vehicles/export"
          className="bg-gray-700 hover:bg-gray-600 text-white px-4 py-2 rounded text-sm font-medium transition-colors"
        >
          Export CSV
        </a>

        <a
          href="/api/report"
          target="_blank"
          rel="noopener noreferrer"
          className="bg-gray-700 hover:bg-gray-600 text-white px-4 py-2 rounded text-sm font-medium transition-colors"
        >
          HTML Report
        </a>

        <div className="ml-auto">
          <ScrapeStatus status={status} />
        </div>
      </div>

      <StatsBar stats={stats} />

      {error && (
        <div className="mb-4 p-3 bg-red-900/30 border border-red-800 rounded text-red-300 text-sm">
          {error}
        </div>
      )}

      <VehicleTable vehicles={vehicles} onToggleSold={handleToggleSold} />
    </div>
  );
}
