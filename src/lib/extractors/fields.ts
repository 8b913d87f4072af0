import { SeatType } from "../types";
import { collapseWhitespace, titleCase } from "../scraping/utils";
import { collectTextNodes, documentOrder } from "./dom";
import { FieldStrategy } from "./types";

// ===== Location =====

export const UNKNOWN_LOCATION = "Unknown Location";

export const LOCATION_STRATEGIES: FieldStrategy<string>[] = [
  {
    name: "dealer-link",
    extract({ $ }) {
      const link = $("a")
        .filter((_, el) => /dealerInfos/i.test($(el).attr("class") ?? ""))
        .first();
      if (!link.length) return null;
      const city = collapseWhitespace(link.text()).replace(/^renault\s+/i, "").trim();
      return city ? titleCase(city) : null;
    },
  },
  {
    name: "sold-by-text",
    extract({ text }) {
      const match = text.match(/Vendu par\s*:\s*(.*?)(?:\d{5}|-)/i);
      if (!match) return null;
      const seller = match[1].trim().slice(0, 30).replace(/RENAULT /g, "").trim();
      return seller ? titleCase(seller) : null;
    },
  },
];

// ===== Packs =====

export const PACK_KEYWORDS = ["pack", "vision", "driving", "augment", "harman"];
export const NO_PACKS = "None";
const MAX_OPTIONS_HEADER_LENGTH = 50;

export const PACK_STRATEGIES: FieldStrategy<string>[] = [
  {
    name: "options-list",
    extract({ $ }) {
      const order = documentOrder($);
      const lists = $("ul").toArray();
      const found = new Set<string>();

      for (const { text, node } of collectTextNodes($)) {
        if (!/options/i.test(text) || text.length > MAX_OPTIONS_HEADER_LENGTH) continue;

        const parent = $(node).parent();
        if (!parent.length) continue;
        const enclosingDiv = parent.parents("div").first();
        const container = enclosingDiv.length ? enclosingDiv[0] : parent[0];
        const start = order.get(container) ?? -1;

        const list = lists.find((ul) => (order.get(ul) ?? -1) > start);
        if (!list) continue;

        $(list)
          .find("li")
          .each((_, li) => {
            const item = collapseWhitespace($(li).text());
            const lower = item.toLowerCase();
            if (PACK_KEYWORDS.some((k) => lower.includes(k))) found.add(item);
          });
      }

      if (found.size === 0) return null;
      return [...found].sort().join(", ");
    },
  },
];

// ===== Exterior color =====

export const UNKNOWN_COLOR = "inconnu";

export const COLOR_STRATEGIES: FieldStrategy<string>[] = [
  {
    name: "couleur-list-item",
    extract({ $ }) {
      const items = $("li")
        .toArray()
        .filter((li) => $(li).text().toLowerCase().includes("couleur"));

      // First item that actually carries a value wins
      for (const li of items) {
        const emphasized = $(li).find("strong, b").first();
        if (emphasized.length) {
          const value = collapseWhitespace(emphasized.text()).toLowerCase();
          if (value) return value;
        }

        const raw = collapseWhitespace($(li).text()).toLowerCase();
        if (!raw.includes(":")) continue;
        const value = raw.split(":").pop()?.trim();
        if (value) return value;
      }
      return null;
    },
  },
];

// ===== Price =====

// "22 990 €", "22.990€", "22990 €" (NBSP included in \s)
const PRICE_PATTERN = /^\s*\d{2}[\s.]?\d{3}\s*€/;

export const PRICE_STRATEGIES: FieldStrategy<number>[] = [
  {
    name: "euro-text-node",
    extract({ $ }) {
      const hit = collectTextNodes($).find((t) => PRICE_PATTERN.test(t.text));
      if (!hit) return null;
      const digits = hit.text.replace(/\D/g, "");
      return digits ? parseInt(digits, 10) : null;
    },
  },
];

// ===== Seat type =====

export const SEAT_TYPE_STRATEGIES: FieldStrategy<SeatType>[] = [
  {
    name: "fabric-keywords",
    extract({ lowerText }) {
      return lowerText.includes("alcantara") || lowerText.includes("tissu")
        ? SeatType.ALCANTARA
        : null;
    },
  },
  {
    name: "leather-phrase",
    extract({ lowerText }) {
      return lowerText.includes("sellerie cuir riviera gris") ? SeatType.WHITE_LEATHER : null;
    },
  },
];

// ===== Title =====

export const UNKNOWN_TITLE = "Unknown Vehicle";

export const TITLE_STRATEGIES: FieldStrategy<string>[] = [
  {
    name: "h1",
    extract({ $ }) {
      const h1 = $("h1").first();
      if (!h1.length) return null;
      return collapseWhitespace(h1.text()) || null;
    },
  },
  {
    name: "document-title",
    extract({ $ }) {
      const title = $("title").first();
      if (!title.length) return null;
      return collapseWhitespace(title.text()) || null;
    },
  },
];
