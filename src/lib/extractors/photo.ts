import type { CheerioAPI } from "cheerio";
import { resolveUrl } from "./dom";
import { FieldStrategy } from "./types";

const MAIN_IMAGE_CLASS = /(product|vehicle|main|hero)/i;
const VEHICLE_ALT_KEYWORDS = ["megane", "véhicule", "vehicle", "voiture"];
const MIN_MAIN_IMAGE_WIDTH = 200;

function imagesWithSrc($: CheerioAPI, selector = "img") {
  return $(selector)
    .toArray()
    .filter((img) => Boolean($(img).attr("src")));
}

function isDecoration(src: string): boolean {
  const lower = src.toLowerCase();
  return lower.includes("logo") || lower.includes("icon");
}

export const PHOTO_STRATEGIES: FieldStrategy<string>[] = [
  {
    name: "main-image-class",
    extract({ $, baseUrl }) {
      const img = imagesWithSrc($).find((el) => MAIN_IMAGE_CLASS.test($(el).attr("class") ?? ""));
      const src = img && $(img).attr("src");
      return src ? resolveUrl(src, baseUrl) : null;
    },
  },
  {
    name: "picture-element",
    extract({ $, baseUrl }) {
      const picture = $("picture").first();
      if (!picture.length) return null;
      const src = picture.find("img").first().attr("src");
      return src ? resolveUrl(src, baseUrl) : null;
    },
  },
  {
    name: "vehicle-alt-text",
    extract({ $, baseUrl }) {
      const img = imagesWithSrc($).find((el) => {
        const alt = ($(el).attr("alt") ?? "").toLowerCase();
        return VEHICLE_ALT_KEYWORDS.some((k) => alt.includes(k));
      });
      const src = img && $(img).attr("src");
      return src ? resolveUrl(src, baseUrl) : null;
    },
  },
  {
    name: "large-image",
    extract({ $, baseUrl }) {
      const candidates = imagesWithSrc($).filter((el) => !isDecoration($(el).attr("src") ?? ""));

      const wide = candidates.find((el) => {
        const width = ($(el).attr("width") ?? "").trim();
        return /^\d+$/.test(width) && parseInt(width, 10) > MIN_MAIN_IMAGE_WIDTH;
      });
      const unsized = candidates.find((el) => !$(el).attr("width"));

      const chosen = wide ?? unsized;
      const src = chosen && $(chosen).attr("src");
      return src ? resolveUrl(src, baseUrl) : null;
    },
  },
];
