import { describe, expect, it } from "vitest";
import { coordinatesOf, neighborhoodOf, pickColumn, toNumber, toRow, UNKNOWN_NEIGHBORHOOD } from "@/lib/rows";

describe("toRow", () => {
  it("normalises driver values to scalars", () => {
    expect(toRow({ a: 1n, b: true, c: undefined, d: "x", e: 2.5 })).toEqual({ a: 1, b: 1, c: null, d: "x", e: 2.5 });
  });

  it("returns an empty row for non-objects", () => {
    expect(toRow(null)).toEqual({});
  });
});

describe("toNumber", () => {
  it("parses numeric strings and rejects blanks", () => {
    expect(toNumber("12")).toBe(12);
    expect(toNumber("  ")).toBeNull();
    expect(toNumber("abc")).toBeNull();
    expect(toNumber(null)).toBeNull();
  });
});

describe("neighborhoodOf", () => {
  it("buckets missing and blank values as Unknown", () => {
    expect(neighborhoodOf({ neighborhood: "  Mission " })).toBe("Mission");
    expect(neighborhoodOf({ neighborhood: "   " })).toBe(UNKNOWN_NEIGHBORHOOD);
    expect(neighborhoodOf({ neighborhood: null })).toBe(UNKNOWN_NEIGHBORHOOD);
    expect(neighborhoodOf({})).toBe(UNKNOWN_NEIGHBORHOOD);
  });
});

describe("coordinatesOf", () => {
  it("accepts short column names and numeric strings", () => {
    expect(coordinatesOf({ lat: "37.7", lng: "-122.4" })).toEqual({ lat: 37.7, lng: -122.4 });
  });

  it("drops out-of-range coordinates", () => {
    expect(coordinatesOf({ latitude: 137.7, longitude: -122.4 })).toBeNull();
  });
});

describe("pickColumn", () => {
  it("returns the first alias present", () => {
    expect(pickColumn([{ b: 1 }, { c: 2 }], ["a", "c", "b"])).toBe("c");
    expect(pickColumn([{ b: 1 }], ["a"])).toBeNull();
  });
});
