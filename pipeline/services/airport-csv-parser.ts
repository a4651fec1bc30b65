import { parse } from "csv-parse/sync";
import type { Airport } from "../../packages/shared/src/contracts.js";
import { parseFuelTypes } from "../../packages/shared/src/fuel.js";
import { normalizeWhitespace } from "../../packages/shared/src/text-utils.js";

export class AirportCsvFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AirportCsvFormatError";
  }
}

const REQUIRED_COLUMNS = [
  "ARPT_ID",
  "LAT_DECIMAL",
  "LONG_DECIMAL",
  "ARPT_NAME",
  "CITY",
  "STATE_CODE",
  "FUEL_TYPES"
] as const;

type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

const OPTIONAL_ICAO_COLUMN = "ICAO_ID";

export interface ParsedAirportBase {
  airports: Airport[];
  skippedRowCount: number;
  warnings: string[];
}

const parseCoordinate = (value: string, limit: number): number | null => {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed) || Math.abs(parsed) > limit) {
    return null;
  }

  return parsed;
};

const readRows = (csvText: string): string[][] => {
  try {
    return parse(csvText, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true
    });
  } catch (error) {
    throw new AirportCsvFormatError("APT_BASE.csv could not be parsed as CSV.", {
      cause: error
    });
  }
};

export const parseAirportBaseCsv = (csvText: string): ParsedAirportBase => {
  const rows = readRows(csvText);
  const [headerRow, ...dataRows] = rows;

  if (!headerRow) {
    throw new AirportCsvFormatError("APT_BASE.csv is empty (no header row).");
  }

  const header = headerRow.map((cell) => cell.trim());
  const missingColumns = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missingColumns.length) {
    throw new AirportCsvFormatError(
      `APT_BASE.csv is missing required columns: ${missingColumns.join(", ")}.`
    );
  }

  const columnIndex = new Map<RequiredColumn, number>(
    REQUIRED_COLUMNS.map((column): [RequiredColumn, number] => [column, header.indexOf(column)])
  );
  const icaoColumnIndex = header.indexOf(OPTIONAL_ICAO_COLUMN);

  const airports: Airport[] = [];
  let skippedRowCount = 0;

  for (const row of dataRows) {
    const cell = (column: RequiredColumn): string => row[columnIndex.get(column) ?? -1] ?? "";

    const airportId = cell("ARPT_ID").trim();
    const latitude = parseCoordinate(cell("LAT_DECIMAL"), 90);
    const longitude = parseCoordinate(cell("LONG_DECIMAL"), 180);

    if (!airportId || latitude === null || longitude === null) {
      skippedRowCount += 1;
      continue;
    }

    const icaoId = icaoColumnIndex >= 0 ? (row[icaoColumnIndex] ?? "").trim() : "";

    airports.push({
      arpt_id: airportId,
      name: normalizeWhitespace(cell("ARPT_NAME")),
      city: normalizeWhitespace(cell("CITY")),
      state: normalizeWhitespace(cell("STATE_CODE")),
      icao: icaoId || `K${airportId}`,
      lat: latitude,
      lon: longitude,
      fuel: parseFuelTypes(cell("FUEL_TYPES"))
    });
  }

  const warnings = skippedRowCount
    ? [`Skipped ${skippedRowCount} APT_BASE.csv row(s) without an airport id or usable coordinates.`]
    : [];

  return { airports, skippedRowCount, warnings };
};
