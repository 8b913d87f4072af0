import type { CheerioAPI } from "cheerio";
import { config } from "../config";
import { SeatType, Vehicle } from "../types";
import { titleCase } from "../scraping/utils";
import { visibleText } from "./dom";
import {
  COLOR_STRATEGIES,
  LOCATION_STRATEGIES,
  NO_PACKS,
  PACK_STRATEGIES,
  PRICE_STRATEGIES,
  SEAT_TYPE_STRATEGIES,
  TITLE_STRATEGIES,
  UNKNOWN_COLOR,
  UNKNOWN_LOCATION,
  UNKNOWN_TITLE,
} from "./fields";
import { PHOTO_STRATEGIES } from "./photo";
import { COORDINATE_STRATEGIES, Coordinates } from "./coordinates";
import { ExtractionContext, FieldResult, FieldStrategy } from "./types";

export type { ExtractionContext, FieldStrategy, FieldResult } from "./types";
export { parseMapsHref, isWithinBounds } from "./coordinates";
export type { Coordinates } from "./coordinates";

/**
 * Evaluate strategies in order; the first non-null value wins.
 */
export function runStrategies<T>(
  strategies: FieldStrategy<T>[],
  ctx: ExtractionContext,
  fallback: T
): FieldResult<T> {
  for (const strategy of strategies) {
    const value = strategy.extract(ctx);
    if (value !== null) return { value, strategy: strategy.name };
  }
  return { value: fallback, strategy: null };
}

export function createExtractionContext($: CheerioAPI, baseUrl: string = config.baseUrl): ExtractionContext {
  const text = visibleText($);
  return { $, text, lowerText: text.toLowerCase(), baseUrl };
}

export const extractLocation = (ctx: ExtractionContext): string =>
  runStrategies(LOCATION_STRATEGIES, ctx, UNKNOWN_LOCATION).value;

export const extractPacks = (ctx: ExtractionContext): string =>
  runStrategies(PACK_STRATEGIES, ctx, NO_PACKS).value;

export const extractColor = (ctx: ExtractionContext): string =>
  runStrategies(COLOR_STRATEGIES, ctx, UNKNOWN_COLOR).value;

export const extractPrice = (ctx: ExtractionContext): number =>
  runStrategies(PRICE_STRATEGIES, ctx, 0).value;

export const extractPhotoUrl = (ctx: ExtractionContext): string | null =>
  runStrategies<string | null>(PHOTO_STRATEGIES, ctx, null).value;

export const extractCoordinates = (ctx: ExtractionContext): Coordinates | null =>
  runStrategies<Coordinates | null>(COORDINATE_STRATEGIES, ctx, null).value;

export const extractSeatType = (ctx: ExtractionContext): SeatType =>
  runStrategies(SEAT_TYPE_STRATEGIES, ctx, SeatType.UNSURE).value;

export const extractTitle = (ctx: ExtractionContext): string =>
  runStrategies(TITLE_STRATEGIES, ctx, UNKNOWN_TITLE).value;

/**
 * Build the vehicle record for a page that already passed the filter
 * chain. `color` is the raw lower-cased value the color gate saw.
 */
export function extractVehicle(ctx: ExtractionContext, url: string, color: string): Readonly<Vehicle> {
  const coords = extractCoordinates(ctx);

  if (!coords && ctx.$('a[href*="maps" i]').length > 0) {
    console.log(`[extract] No coordinates extracted but found maps link(s) on ${url}`);
  }

  return Object.freeze({
    title: extractTitle(ctx),
    price: extractPrice(ctx),
    trim: config.trimLabel,
    chargeType: config.chargeLabel,
    exteriorColor: titleCase(color),
    seatType: extractSeatType(ctx),
    packs: extractPacks(ctx),
    location: extractLocation(ctx),
    url,
    photoUrl: extractPhotoUrl(ctx),
    latitude: coords?.latitude ?? null,
    longitude: coords?.longitude ?? null,
  });
}
