import { z } from "zod";
import type { Airport, AirportsMetadata } from "./api";

const AIRPORTS_URL = import.meta.env.VITE_AIRPORTS_URL ?? "/airports.json";
const AIRPORTS_METADATA_URL =
  import.meta.env.VITE_AIRPORTS_METADATA_URL ?? "/airports-meta.json";

const airportSchema = z.object({
  arpt_id: z.string(),
  name: z.string(),
  city: z.string(),
  state: z.string(),
  icao: z.string(),
  lat: z.number().finite(),
  lon: z.number().finite(),
  fuel: z.object({
    mogas: z.boolean(),
    "100ll": z.boolean(),
    jet_a: z.boolean()
  })
});

const airportsSchema = z.array(airportSchema);

const airportsMetadataSchema = z.object({
  cycleDate: z.string(),
  sourceUrl: z.string(),
  usedFallbackCycle: z.boolean(),
  generatedAt: z.string(),
  airportCount: z.number(),
  skippedRowCount: z.number(),
  warnings: z.array(z.string())
});

const describeIssue = (issue: z.ZodIssue): string =>
  issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message;

export const fetchAirports = async (signal?: AbortSignal): Promise<Airport[]> => {
  const response = await fetch(AIRPORTS_URL, { signal });

  if (!response.ok) {
    throw new Error(`Failed to fetch airport data (HTTP ${response.status})`);
  }

  const parseResult = airportsSchema.safeParse(await response.json());
  if (!parseResult.success) {
    const [firstIssue] = parseResult.error.issues;
    throw new Error(
      `Airport data is malformed${firstIssue ? ` (${describeIssue(firstIssue)})` : ""}`
    );
  }

  return parseResult.data;
};

/**
 * The metadata file only feeds the "NASR cycle" caption, so a missing or
 * unreadable file resolves to null instead of failing the page.
 */
export const fetchAirportsMetadata = async (
  signal?: AbortSignal
): Promise<AirportsMetadata | null> => {
  const response = await fetch(AIRPORTS_METADATA_URL, { signal });

  if (!response.ok) {
    return null;
  }

  const parseResult = airportsMetadataSchema.safeParse(await response.json().catch(() => null));
  return parseResult.success ? parseResult.data : null;
};
