import { describe, it, expect } from "vitest";
import { parseMapsHref, isWithinBounds } from "../lib/extractors";

describe("parseMapsHref", () => {
  it("reads the directions form", () => {
    expect(parseMapsHref("https://www.google.com/maps/dir//45.75,4.85")).toEqual({
      latitude: 45.75,
      longitude: 4.85,
    });
  });

  it("reads the @ form", () => {
    expect(parseMapsHref("https://www.google.com/maps/@45.75,4.85,15z")).toEqual({
      latitude: 45.75,
      longitude: 4.85,
    });
  });

  it("reads the q= form with negative longitude", () => {
    expect(parseMapsHref("https://maps.google.fr/?q=48.39,-4.49")).toEqual({
      latitude: 48.39,
      longitude: -4.49,
    });
  });

  it("reads a bare pair", () => {
    expect(parseMapsHref("https://maps.example/place/43.3,5.37")).toEqual({
      latitude: 43.3,
      longitude: 5.37,
    });
  });

  it("rejects coordinates outside the bounding box", () => {
    expect(parseMapsHref("https://maps.google.com/?q=60.0,4.85")).toBeNull();
  });

  it("falls through to a later pattern when an earlier match is out of bounds", () => {
    expect(parseMapsHref("https://www.google.com/maps/dir//60.1,4.2/@45.7,4.8,12z")).toEqual({
      latitude: 45.7,
      longitude: 4.8,
    });
  });

  it("returns null without a coordinate pair", () => {
    expect(parseMapsHref("https://www.google.com/maps/place/Lyon")).toBeNull();
  });
});

describe("isWithinBounds", () => {
  it("includes the box edges", () => {
    expect(isWithinBounds({ latitude: 41, longitude: -5 })).toBe(true);
    expect(isWithinBounds({ latitude: 51, longitude: 10 })).toBe(true);
  });

  it("excludes points just outside", () => {
    expect(isWithinBounds({ latitude: 40.99, longitude: 2 })).toBe(false);
    expect(isWithinBounds({ latitude: 45, longitude: 10.01 })).toBe(false);
  });
});
