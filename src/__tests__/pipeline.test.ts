import { describe, it, expect, beforeEach, vi } from "vitest";
import { readFileSync } from "fs";
import { resolve } from "path";
import * as cheerio from "cheerio";
import { openDatabase, SqliteVehicleStore } from "../lib/db";
import { processDetailPage, runCrawl } from "../lib/pipeline";
import { CrawlProgress, SeatType, StopReason } from "../lib/types";
import { DocumentFetcher } from "../lib/scraping/utils";

const BASE_URL = "https://dealer.example";
const SEARCH_URL = "https://dealer.example/search";
const DETAIL_HTML = readFileSync(resolve(__dirname, "fixtures/detail-page.html"), "utf-8");

const REJECTED_HTML = `<html><body>
  <h1>Renault Megane E-Tech Iconic EV60 Super Charge</h1>
  <ul><li>Couleur : <b>Blanc Glacier</b></li></ul>
</body></html>`;
const RESULTS_HTML = `<html><body>
  <a href="/detail/a">Megane E-Tech Iconic</a>
  <a href="/detail/b">Megane E-Tech Iconic</a>
  <a href="/detail/c">Megane E-Tech Iconic</a>
</body></html>`;
const EMPTY_HTML = "<html><body><p>Aucun résultat</p></body></html>";

function fakeFetcher(pages: Record<string, string>): DocumentFetcher & { calls: string[] } {
  const calls: string[] = [];
  const fetcher = async (url: string) => {
    calls.push(url);
    const html = pages[url];
    return html === undefined ? null : cheerio.load(html);
  };
  return Object.assign(fetcher, { calls });
}

describe("runCrawl", () => {
  let store: SqliteVehicleStore;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    store = new SqliteVehicleStore(openDatabase(":memory:"));
  });

  const crawl = (fetcher: DocumentFetcher, extra: { maxPages?: number; onProgress?: (p: Readonly<CrawlProgress>) => void } = {}) =>
    runCrawl({
      store,
      fetchDocument: fetcher,
      searchUrl: SEARCH_URL,
      baseUrl: BASE_URL,
      debugDumpPath: null,
      maxPages: extra.maxPages ?? 5,
      onProgress: extra.onProgress,
    });

  it("keeps only listings that fetch and pass every filter", async () => {
    const fetcher = fakeFetcher({
      "https://dealer.example/search?page=1": RESULTS_HTML,
      "https://dealer.example/search?page=2": EMPTY_HTML,
      "https://dealer.example/detail/a": REJECTED_HTML,
      // detail/b fails to fetch
      "https://dealer.example/detail/c": DETAIL_HTML,
    });

    const summary = await crawl(fetcher);

    expect(summary.stopReason).toBe(StopReason.END_OF_RESULTS);
    expect(summary.progress).toEqual({ pagesProcessed: 2, adsProcessed: 3, adsAdded: 1 });
    expect(summary.markedUnavailable).toBe(0);
    expect(summary.vehicles).toHaveLength(1);
    expect(summary.vehicles[0]).toMatchObject({
      url: "https://dealer.example/detail/c",
      price: 22990,
      exteriorColor: "Blanc Glacier",
      seatType: SeatType.ALCANTARA,
      location: "Lyon Sud",
      latitude: 45.75,
      longitude: 4.85,
    });
    expect(store.getAllVehicles().map((v) => v.url)).toEqual(["https://dealer.example/detail/c"]);
    expect(fetcher.calls).toEqual([
      "https://dealer.example/search?page=1",
      "https://dealer.example/detail/a",
      "https://dealer.example/detail/b",
      "https://dealer.example/detail/c",
      "https://dealer.example/search?page=2",
    ]);
  });

  it("reports frozen progress snapshots in order", async () => {
    const events: Readonly<CrawlProgress>[] = [];
    const fetcher = fakeFetcher({
      "https://dealer.example/search?page=1": RESULTS_HTML,
      "https://dealer.example/search?page=2": EMPTY_HTML,
      "https://dealer.example/detail/c": DETAIL_HTML,
    });

    await crawl(fetcher, { onProgress: (p) => events.push(p) });

    expect(events).toEqual([
      { pagesProcessed: 0, adsProcessed: 0, adsAdded: 0 },
      { pagesProcessed: 1, adsProcessed: 0, adsAdded: 0 },
      { pagesProcessed: 1, adsProcessed: 1, adsAdded: 0 },
      { pagesProcessed: 1, adsProcessed: 2, adsAdded: 0 },
      { pagesProcessed: 1, adsProcessed: 3, adsAdded: 0 },
      { pagesProcessed: 1, adsProcessed: 3, adsAdded: 1 },
      { pagesProcessed: 2, adsProcessed: 3, adsAdded: 1 },
    ]);
    expect(events.every((e) => Object.isFrozen(e))).toBe(true);
  });

  it("marks previously seen vehicles that were not observed", async () => {
    const seed = await crawl(
      fakeFetcher({
        "https://dealer.example/search?page=1": '<a href="/detail/old">Megane</a>',
        "https://dealer.example/detail/old": DETAIL_HTML,
      }),
      { maxPages: 1 }
    );
    expect(seed.progress.adsAdded).toBe(1);

    const summary = await crawl(
      fakeFetcher({
        "https://dealer.example/search?page=1": '<a href="/detail/new">Megane</a>',
        "https://dealer.example/detail/new": DETAIL_HTML,
      }),
      { maxPages: 1 }
    );

    expect(summary.markedUnavailable).toBe(1);
    expect(store.getVehicle("https://dealer.example/detail/old")?.isAvailable).toBe(false);
    expect(store.getVehicle("https://dealer.example/detail/new")?.isAvailable).toBe(true);
  });

  it("stops on a failed search page and still sweeps", async () => {
    store.upsertVehicle({
      title: "Megane",
      price: 21000,
      trim: "Iconic",
      chargeType: "Optimum Charge",
      exteriorColor: "Blanc",
      seatType: SeatType.UNSURE,
      packs: "None",
      location: "Nantes",
      url: "https://dealer.example/detail/seen",
      photoUrl: null,
      latitude: null,
      longitude: null,
    });

    const summary = await crawl(fakeFetcher({}));

    expect(summary.stopReason).toBe(StopReason.FETCH_FAILED);
    expect(summary.progress).toEqual({ pagesProcessed: 0, adsProcessed: 0, adsAdded: 0 });
    expect(summary.markedUnavailable).toBe(1);
  });

  it("stops on an anomalous search page", async () => {
    const summary = await crawl(
      fakeFetcher({ "https://dealer.example/search?page=1": "<html><body><p>Access denied</p></body></html>" })
    );

    expect(summary.stopReason).toBe(StopReason.ANOMALY);
    expect(summary.progress.pagesProcessed).toBe(1);
  });

  it("moves on when every link on a page is another charge variant", async () => {
    const fetcher = fakeFetcher({
      "https://dealer.example/search?page=1": '<a href="/detail/x">Megane Super Charge</a>',
      "https://dealer.example/search?page=2": EMPTY_HTML,
    });

    const summary = await crawl(fetcher);

    expect(summary.stopReason).toBe(StopReason.END_OF_RESULTS);
    expect(summary.progress).toEqual({ pagesProcessed: 2, adsProcessed: 0, adsAdded: 0 });
  });

  it("stops after maxPages, counting a repeat listing once as new", async () => {
    const fetcher = async (url: string) =>
      cheerio.load(url.startsWith(SEARCH_URL) ? '<a href="/detail/c">Megane</a>' : DETAIL_HTML);

    const summary = await crawl(fetcher, { maxPages: 2 });

    expect(summary.stopReason).toBe(StopReason.MAX_PAGES);
    expect(summary.progress).toEqual({ pagesProcessed: 2, adsProcessed: 2, adsAdded: 1 });
    expect(store.getPriceHistory("https://dealer.example/detail/c")).toHaveLength(1);
  });
});

describe("processDetailPage", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("returns null for a rejected listing", async () => {
    const fetcher = fakeFetcher({ "https://dealer.example/detail/a": REJECTED_HTML });
    expect(await processDetailPage("https://dealer.example/detail/a", fetcher, BASE_URL)).toBeNull();
  });

  it("rejects a red listing by color", async () => {
    const red = DETAIL_HTML.replace("Blanc Glacier", "Rouge Flamme");
    const fetcher = fakeFetcher({ "https://dealer.example/detail/r": red });
    const log = vi.spyOn(console, "log");

    expect(await processDetailPage("https://dealer.example/detail/r", fetcher, BASE_URL)).toBeNull();
    expect(log).toHaveBeenCalledWith("[pipeline] Rejected by color: https://dealer.example/detail/r");
  });

  it("rejects by color when a valueless couleur item comes first", async () => {
    const red = DETAIL_HTML.replace(
      "<li>Couleur : <strong>Blanc Glacier</strong></li>",
      "<li>Couleur disponible</li><li>Couleur : <strong>Rouge Flamme</strong></li>"
    );
    const fetcher = fakeFetcher({ "https://dealer.example/detail/r2": red });
    const log = vi.spyOn(console, "log");

    expect(await processDetailPage("https://dealer.example/detail/r2", fetcher, BASE_URL)).toBeNull();
    expect(log).toHaveBeenCalledWith("[pipeline] Rejected by color: https://dealer.example/detail/r2");
  });
});
