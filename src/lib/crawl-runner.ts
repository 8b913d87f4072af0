import { config } from "./config";
import { getStore, SqliteVehicleStore } from "./db";
import { runCrawl, CrawlDeps } from "./pipeline";
import { writeReport } from "./report";
import { writeCsv } from "./csv";
import { CrawlProgress, CrawlStatus, CrawlSummary } from "./types";

type RunnerState = "idle" | "running";

export interface CrawlRunnerOptions {
  getStore?: () => SqliteVehicleStore;
  crawl?: (deps: CrawlDeps) => Promise<CrawlSummary>;
  reportPath?: string | null;
  csvPath?: string | null;
}

function progressMessage(p: CrawlProgress): string {
  return `Scraping... Page ${p.pagesProcessed} | Ads: ${p.adsProcessed} | New: ${p.adsAdded}`;
}

/**
 * Owns the single background crawl. `tryStart` is a synchronous
 * idle -> running transition, so two triggers can never both win.
 */
export class CrawlRunner {
  private state: RunnerState = "idle";
  private current: Promise<void> | null = null;
  private status: CrawlStatus = {
    isRunning: false,
    statusMessage: "Ready",
    lastRun: null,
    error: null,
    pagesProcessed: 0,
    adsProcessed: 0,
    adsAdded: 0,
  };

  constructor(private readonly options: CrawlRunnerOptions = {}) {}

  getStatus(): CrawlStatus {
    return { ...this.status };
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  /**
   * Start a crawl in the background. Returns false when one is already
   * running; the trigger is rejected, not queued.
   */
  tryStart(): boolean {
    if (this.state !== "idle") return false;
    this.state = "running";

    this.status = {
      ...this.status,
      isRunning: true,
      statusMessage: "Starting scraper...",
      error: null,
      pagesProcessed: 0,
      adsProcessed: 0,
      adsAdded: 0,
    };

    this.current = this.execute().finally(() => {
      this.state = "idle";
      this.status = { ...this.status, isRunning: false };
      this.current = null;
    });
    return true;
  }

  /** Resolves when the active crawl (if any) has finished. */
  async waitForIdle(): Promise<void> {
    if (this.current) await this.current;
  }

  private async execute(): Promise<void> {
    const resolveStore = this.options.getStore ?? getStore;
    const crawl = this.options.crawl ?? runCrawl;
    const reportPath = this.options.reportPath === undefined ? config.reportOutputFile : this.options.reportPath;
    const csvPath = this.options.csvPath === undefined ? config.csvOutputFile : this.options.csvPath;

    try {
      const store = resolveStore();
      const summary = await crawl({
        store,
        onProgress: (progress) => {
          this.status = { ...this.status, ...progress, statusMessage: progressMessage(progress) };
        },
      });

      if (reportPath) {
        writeReport(reportPath, {
          vehicles: store.getAllVehicles(),
          histories: store.getAllPriceHistories(),
          stats: store.getStatistics(),
        });
      }
      if (csvPath && summary.vehicles.length > 0) {
        writeCsv(csvPath, summary.vehicles);
      }

      const p = summary.progress;
      this.status = {
        ...this.status,
        ...p,
        statusMessage: `Completed! Pages: ${p.pagesProcessed} | Ads: ${p.adsProcessed} | New: ${p.adsAdded}`,
        lastRun: new Date().toISOString(),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("[runner] Crawl failed:", error);
      this.status = { ...this.status, error: message, statusMessage: `Error: ${message}` };
    }
  }
}

export const crawlRunner = new CrawlRunner();
