import { config } from "./config";
import {
  CrawlProgress,
  CrawlSummary,
  ProgressSink,
  StopReason,
  Vehicle,
  VehicleStore,
} from "./types";
import { DocumentFetcher, fetchDocument } from "./scraping/utils";
import { buildPageUrl, enumerateListings } from "./enumerator";
import { createExtractionContext, extractColor, extractVehicle } from "./extractors";
import { runFilterChain } from "./filters";

export interface CrawlDeps {
  store: VehicleStore;
  fetchDocument?: DocumentFetcher;
  onProgress?: ProgressSink;
  maxPages?: number;
  searchUrl?: string;
  baseUrl?: string;
  debugDumpPath?: string | null;
}

/**
 * Run-scoped counters. The progress sink only ever sees frozen copies.
 */
export class CrawlContext {
  pagesProcessed = 0;
  adsProcessed = 0;
  adsAdded = 0;

  constructor(private readonly onProgress?: ProgressSink) {}

  snapshot(): Readonly<CrawlProgress> {
    return Object.freeze({
      pagesProcessed: this.pagesProcessed,
      adsProcessed: this.adsProcessed,
      adsAdded: this.adsAdded,
    });
  }

  report(): void {
    this.onProgress?.(this.snapshot());
  }
}

/**
 * Fetch one detail page, run the filter chain, and extract the vehicle.
 * Returns null for fetch failures and rejected listings.
 */
export async function processDetailPage(
  url: string,
  fetchDoc: DocumentFetcher,
  baseUrl: string = config.baseUrl
): Promise<Readonly<Vehicle> | null> {
  const $ = await fetchDoc(url);
  if (!$) return null;

  const ctx = createExtractionContext($, baseUrl);
  const color = extractColor(ctx);

  const verdict = runFilterChain({ fullText: ctx.lowerText, color });
  if (!verdict.passed) {
    console.log(`[pipeline] Rejected by ${verdict.gate}: ${url}`);
    return null;
  }

  return extractVehicle(ctx, url, color);
}

export async function runCrawl(deps: CrawlDeps): Promise<CrawlSummary> {
  const {
    store,
    fetchDocument: fetchDoc = (url: string) => fetchDocument(url),
    maxPages = config.maxPages,
    searchUrl = config.searchUrl,
    baseUrl = config.baseUrl,
    debugDumpPath,
  } = deps;

  const ctx = new CrawlContext(deps.onProgress);
  const vehicles: Readonly<Vehicle>[] = [];
  const observedUrls = new Set<string>();
  let stopReason: StopReason = StopReason.MAX_PAGES;

  console.log(`[pipeline] Starting crawl: ${config.trimLabel} + ${config.chargeLabel}, up to ${maxPages} pages`);
  ctx.report();

  for (let page = 1; page <= maxPages; page++) {
    const pageUrl = buildPageUrl(searchUrl, page);
    console.log(`[pipeline] Page ${page}: ${pageUrl}`);

    const $ = await fetchDoc(pageUrl);
    if (!$) {
      stopReason = StopReason.FETCH_FAILED;
      break;
    }

    ctx.pagesProcessed = page;
    ctx.report();

    const listing = enumerateListings($, { baseUrl, debugDumpPath });
    if (listing.endOfResults) {
      stopReason = StopReason.END_OF_RESULTS;
      break;
    }
    if (listing.anomaly) {
      stopReason = StopReason.ANOMALY;
      break;
    }
    if (listing.urls.length === 0) {
      console.log("[pipeline] Listings found but all filtered by charge variant, next page");
      continue;
    }

    console.log(`[pipeline] Found ${listing.urls.length} candidates, checking details`);

    for (const url of listing.urls) {
      ctx.adsProcessed++;
      ctx.report();

      const vehicle = await processDetailPage(url, fetchDoc, baseUrl);
      if (!vehicle) continue;

      console.log(
        `[pipeline] MATCH: ${vehicle.price}€ | ${vehicle.exteriorColor} | ${vehicle.location}` +
          `${vehicle.photoUrl ? "" : " (no photo)"}${vehicle.latitude === null ? " (no coords)" : ""}`
      );
      vehicles.push(vehicle);
      observedUrls.add(vehicle.url);

      const { isNew, priceChanged } = store.upsertVehicle(vehicle);
      if (isNew) {
        ctx.adsAdded++;
        ctx.report();
      }
      if (priceChanged) {
        console.log(`[pipeline] Price changed for ${vehicle.url}`);
      }
    }
  }

  const markedUnavailable = store.markUnavailable(observedUrls);

  console.log(
    `[pipeline] Crawl stopped (${stopReason}): ${ctx.pagesProcessed} pages, ` +
      `${ctx.adsProcessed} ads, ${ctx.adsAdded} new, ${vehicles.length} matches, ` +
      `${markedUnavailable} marked unavailable`
  );

  return {
    vehicles,
    progress: { ...ctx.snapshot() },
    stopReason,
    markedUnavailable,
  };
}
