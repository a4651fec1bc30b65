import { describe, expect, it } from "vitest";
import {
  FUEL_KEYS,
  isFuelKey,
  listAvailableFuelLabels,
  parseFuelTypes
} from "../../packages/shared/src/fuel.js";

describe("parseFuelTypes", () => {
  it("detects 100LL from the 100 token", () => {
    expect(parseFuelTypes("100LL,A")).toEqual({ mogas: false, "100ll": true, jet_a: false });
  });

  it("detects MOGAS alongside other grades", () => {
    expect(parseFuelTypes("A1+,MOGAS")).toEqual({ mogas: true, "100ll": false, jet_a: false });
  });

  it("detects Jet A only when the cell spells out JET", () => {
    expect(parseFuelTypes("100LL,JET A")).toEqual({ mogas: false, "100ll": true, jet_a: true });
    expect(parseFuelTypes("A,A1+")).toEqual({ mogas: false, "100ll": false, jet_a: false });
  });

  it("matches regardless of case", () => {
    expect(parseFuelTypes("jet a, mogas")).toEqual({ mogas: true, "100ll": false, jet_a: true });
  });

  it("treats an empty cell as no fuel", () => {
    expect(parseFuelTypes("")).toEqual({ mogas: false, "100ll": false, jet_a: false });
  });
});

describe("listAvailableFuelLabels", () => {
  it("lists labels in definition order", () => {
    expect(listAvailableFuelLabels({ mogas: true, "100ll": false, jet_a: true })).toEqual([
      "MOGAS",
      "Jet A"
    ]);
  });

  it("returns an empty list when nothing is sold", () => {
    expect(listAvailableFuelLabels({ mogas: false, "100ll": false, jet_a: false })).toEqual([]);
  });
});

describe("isFuelKey", () => {
  it("accepts every known key and nothing else", () => {
    expect(FUEL_KEYS.every(isFuelKey)).toBe(true);
    expect(isFuelKey("jet-a")).toBe(false);
    expect(isFuelKey(100)).toBe(false);
  });
});
