import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { config } from "../config";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

export interface FetchOptions {
  politeDelayMs?: number;
  timeoutMs?: number;
}

/**
 * Single GET with a politeness delay before the request. No retries:
 * non-2xx statuses and timeouts throw.
 */
export async function fetchPage(url: string, options: FetchOptions = {}): Promise<string> {
  const { politeDelayMs = config.scrapeDelayMs, timeoutMs = config.requestTimeoutMs } = options;

  if (politeDelayMs > 0) await delay(politeDelayMs);

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await undiciFetch(url, {
      headers: {
        "User-Agent": config.getRandomUserAgent(),
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "fr-FR,fr;q=0.9,en;q=0.8",
        Referer: `${config.baseUrl}/`,
      },
      signal: controller.signal,
      dispatcher: getProxyDispatcher(),
    });

    if (response.status === 403) {
      throw new Error(`Access denied (403) for ${url}`);
    }
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} for ${url}`);
    }

    return await response.text();
  } finally {
    clearTimeout(timeout);
  }
}

export type DocumentFetcher = (url: string) => Promise<CheerioAPI | null>;

/**
 * Fetch and parse a page. Any failure is logged and reported as null so
 * the caller can abandon the current step.
 */
export async function fetchDocument(url: string, options: FetchOptions = {}): Promise<CheerioAPI | null> {
  try {
    const html = await fetchPage(url, options);
    return cheerio.load(html);
  } catch (error) {
    console.error(
      `[fetch] Failed to fetch ${url}:`,
      error instanceof Error ? error.message : String(error)
    );
    return null;
  }
}

export function titleCase(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/(^|[^\p{L}'])(\p{L})/gu, (_, sep: string, letter: string) => sep + letter.toUpperCase());
}

export function collapseWhitespace(raw: string): string {
  return raw.replace(/\s+/g, " ").trim();
}
