import type { CheerioAPI } from "cheerio";

/**
 * Parsed detail page plus the text views every extractor shares.
 */
export interface ExtractionContext {
  $: CheerioAPI;
  text: string; // visible text, whitespace collapsed, original case
  lowerText: string;
  baseUrl: string;
}

/**
 * One heuristic for one field. Returns null when it finds nothing, which
 * hands over to the next strategy in the chain.
 */
export interface FieldStrategy<T> {
  name: string;
  extract(ctx: ExtractionContext): T | null;
}

export interface FieldResult<T> {
  value: T;
  strategy: string | null; // null when the default was used
}
