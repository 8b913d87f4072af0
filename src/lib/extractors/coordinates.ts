import type { CheerioAPI } from "cheerio";
import { FieldStrategy } from "./types";

export interface Coordinates {
  latitude: number;
  longitude: number;
}

// Roughly metropolitan France
export const COORDINATE_BOUNDS = {
  minLatitude: 41,
  maxLatitude: 51,
  minLongitude: -5,
  maxLongitude: 10,
};

export const COORDINATE_PATTERNS: RegExp[] = [
  /\/maps\/dir\/\/([-+]?\d+\.\d+),([-+]?\d+\.\d+)/,
  /@([-+]?\d+\.\d+),([-+]?\d+\.\d+)/,
  /q=([-+]?\d+\.\d+),([-+]?\d+\.\d+)/,
  /([-+]?\d+\.\d+),([-+]?\d+\.\d+)/,
];

export function isWithinBounds({ latitude, longitude }: Coordinates): boolean {
  const b = COORDINATE_BOUNDS;
  return (
    latitude >= b.minLatitude &&
    latitude <= b.maxLatitude &&
    longitude >= b.minLongitude &&
    longitude <= b.maxLongitude
  );
}

/**
 * First in-bounds coordinate pair found in a maps URL, trying each
 * pattern in turn.
 */
export function parseMapsHref(href: string): Coordinates | null {
  for (const pattern of COORDINATE_PATTERNS) {
    const match = href.match(pattern);
    if (!match) continue;
    const coords = { latitude: parseFloat(match[1]), longitude: parseFloat(match[2]) };
    if (Number.isNaN(coords.latitude) || Number.isNaN(coords.longitude)) continue;
    if (isWithinBounds(coords)) return coords;
  }
  return null;
}

function mapsLinkHrefs($: CheerioAPI): string[] {
  return $("a[href]")
    .toArray()
    .filter((el) => {
      const href = $(el).attr("href") ?? "";
      if (/google\.[a-z.]+\/maps/i.test(href)) return true;
      const text = $(el).text().toLowerCase();
      return /maps/i.test(href) && (text.includes("itinéraire") || text.includes("direction"));
    })
    .map((el) => $(el).attr("href") ?? "");
}

export const COORDINATE_STRATEGIES: FieldStrategy<Coordinates>[] = [
  {
    name: "maps-link",
    extract({ $ }) {
      for (const href of mapsLinkHrefs($)) {
        const coords = parseMapsHref(href);
        if (coords) return coords;
      }
      return null;
    },
  },
];
