import { describe, expect, it } from "vitest";
import {
  haversineDistanceMiles,
  milesToMeters
} from "../../packages/shared/src/distance.js";

describe("haversineDistanceMiles", () => {
  it("returns near-zero for same coordinate", () => {
    expect(haversineDistanceMiles(43.98436, -88.55705, 43.98436, -88.55705)).toBeCloseTo(0, 5);
  });

  it("measures one degree of latitude as about 69 miles", () => {
    expect(haversineDistanceMiles(40, -100, 41, -100)).toBeCloseTo(69.09, 1);
  });

  it("calculates Oshkosh to Chicago roughly", () => {
    const distance = haversineDistanceMiles(43.98436, -88.55705, 41.8781, -87.6298);
    expect(distance).toBeGreaterThan(145);
    expect(distance).toBeLessThan(160);
  });
});

describe("milesToMeters", () => {
  it("converts statute miles", () => {
    expect(milesToMeters(10)).toBeCloseTo(16093.4, 6);
  });
});
