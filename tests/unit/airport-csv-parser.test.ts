import { describe, expect, it } from "vitest";
import {
  AirportCsvFormatError,
  parseAirportBaseCsv
} from "../../pipeline/services/airport-csv-parser.js";
import { SAMPLE_AIRPORT_BASE_CSV } from "../nasr-archive-fixtures";

const HEADER = "ARPT_ID,ARPT_NAME,CITY,STATE_CODE,LAT_DECIMAL,LONG_DECIMAL,FUEL_TYPES";

describe("parseAirportBaseCsv", () => {
  it("maps APT_BASE.csv rows to airports", () => {
    const parsed = parseAirportBaseCsv(SAMPLE_AIRPORT_BASE_CSV);

    expect(parsed.airports).toEqual([
      {
        arpt_id: "OSH",
        name: "WITTMAN RGNL",
        city: "OSHKOSH",
        state: "WI",
        icao: "KOSH",
        lat: 43.98436,
        lon: -88.55705,
        fuel: { mogas: false, "100ll": true, jet_a: false }
      },
      {
        arpt_id: "1C8",
        name: "CAMBRIDGE MUNI",
        city: "CAMBRIDGE",
        state: "IL",
        icao: "K1C8",
        lat: 41.27,
        lon: -90.19,
        fuel: { mogas: true, "100ll": false, jet_a: false }
      },
      {
        arpt_id: "T41",
        name: "LA PORTE MUNI",
        city: "LA PORTE",
        state: "TX",
        icao: "KT41",
        lat: 29.6691,
        lon: -95.0643,
        fuel: { mogas: true, "100ll": true, jet_a: false }
      }
    ]);
  });

  it("counts rows without an id or usable coordinates", () => {
    const parsed = parseAirportBaseCsv(SAMPLE_AIRPORT_BASE_CSV);

    expect(parsed.skippedRowCount).toBe(3);
    expect(parsed.warnings).toEqual([
      "Skipped 3 APT_BASE.csv row(s) without an airport id or usable coordinates."
    ]);
  });

  it("prefixes K when the file has no ICAO_ID column", () => {
    const parsed = parseAirportBaseCsv(
      `${HEADER}\nOSH,WITTMAN RGNL,OSHKOSH,WI,43.98436,-88.55705,"100LL,A"\n`
    );

    expect(parsed.airports.map((airport) => airport.icao)).toEqual(["KOSH"]);
    expect(parsed.warnings).toEqual([]);
  });

  it("strips a byte order mark before the header", () => {
    const parsed = parseAirportBaseCsv(`\uFEFF${HEADER}\nOSH,WITTMAN RGNL,OSHKOSH,WI,44,-88.5,JET A\n`);

    expect(parsed.airports).toHaveLength(1);
    expect(parsed.airports[0]?.fuel).toEqual({ mogas: false, "100ll": false, jet_a: true });
  });

  it("treats a row cut short as missing coordinates", () => {
    const parsed = parseAirportBaseCsv(`${HEADER}\nOSH,WITTMAN RGNL,OSHKOSH\n`);

    expect(parsed.airports).toEqual([]);
    expect(parsed.skippedRowCount).toBe(1);
  });

  it("lists every missing required column", () => {
    expect(() =>
      parseAirportBaseCsv("ARPT_ID,ARPT_NAME,STATE_CODE,LAT_DECIMAL,LONG_DECIMAL\nOSH,X,WI,44,-88\n")
    ).toThrow("APT_BASE.csv is missing required columns: CITY, FUEL_TYPES.");
  });

  it("rejects an empty file", () => {
    expect(() => parseAirportBaseCsv("")).toThrow(AirportCsvFormatError);
    expect(() => parseAirportBaseCsv("")).toThrow("APT_BASE.csv is empty (no header row).");
  });
});
