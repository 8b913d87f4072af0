import type { CheerioAPI } from "cheerio";
import { writeFileSync } from "fs";
import { config } from "./config";
import { resolveUrl } from "./extractors/dom";

export interface EnumerationResult {
  urls: string[]; // unique, first-seen order
  endOfResults: boolean;
  anomaly: boolean;
}

export interface EnumerateOptions {
  baseUrl?: string;
  debugDumpPath?: string | null; // null disables the dump
}

const LISTING_HREF = /(detail|product)/i;
// "0 résultat(s)" / "Aucun résultat"
const ZERO_RESULTS_MARKERS = ["aucun r", "0 r"];
// Other charging variants that show up in result snippets
const SKIPPED_VARIANTS = ["super charge", "standard charge"];

export function buildPageUrl(searchUrl: string, page: number): string {
  const separator = searchUrl.includes("?") ? "&" : "?";
  return `${searchUrl}${separator}page=${page}`;
}

export function enumerateListings($: CheerioAPI, options: EnumerateOptions = {}): EnumerationResult {
  const baseUrl = options.baseUrl ?? config.baseUrl;
  const debugDumpPath = options.debugDumpPath === undefined ? config.debugDumpPath : options.debugDumpPath;

  const links = $("a[href]")
    .toArray()
    .filter((el) => LISTING_HREF.test($(el).attr("href") ?? ""));

  if (links.length === 0) {
    const pageText = $.root().text().toLowerCase();
    if (ZERO_RESULTS_MARKERS.some((marker) => pageText.includes(marker))) {
      console.log("[enumerator] Page reports 0 results, end of search");
      return { urls: [], endOfResults: true, anomaly: false };
    }

    console.warn("[enumerator] No listing links and no '0 results' marker, possible block or markup change");
    if (debugDumpPath) {
      writeFileSync(debugDumpPath, $.html(), "utf-8");
      console.warn(`[enumerator] Saved page to ${debugDumpPath}`);
    }
    return { urls: [], endOfResults: false, anomaly: true };
  }

  const urls = new Set<string>();
  for (const link of links) {
    const linkText = $(link).text().replace(/\s+/g, " ").toLowerCase();
    if (SKIPPED_VARIANTS.some((variant) => linkText.includes(variant))) continue;
    urls.add(resolveUrl($(link).attr("href") ?? "", baseUrl));
  }

  return { urls: [...urls], endOfResults: false, anomaly: false };
}
