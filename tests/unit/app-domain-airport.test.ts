import { describe, expect, it } from "vitest";
import {
  buildAirNavUrl,
  formatAirportLocation,
  formatDistanceMiles,
  formatRadiusMiles
} from "../../web/src/lib/app-domain-airport";

describe("airport display helpers", () => {
  it("formats distances to one decimal place", () => {
    expect(formatDistanceMiles(12.345)).toBe("12.3 mi");
    expect(formatDistanceMiles(0)).toBe("0.0 mi");
  });

  it("formats the radius label", () => {
    expect(formatRadiusMiles(200)).toBe("200 miles");
  });

  it("links to the AirNav page for the ICAO identifier", () => {
    expect(buildAirNavUrl({ icao: "KOSH" })).toBe("https://www.airnav.com/airport/KOSH");
  });

  it("joins city and state, skipping empty parts", () => {
    expect(formatAirportLocation({ city: "OSHKOSH", state: "WI" })).toBe("OSHKOSH, WI");
    expect(formatAirportLocation({ city: "", state: "WI" })).toBe("WI");
  });
});
