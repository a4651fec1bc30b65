export type FuelKey = "mogas" | "100ll" | "jet_a";

export type FuelAvailability = Record<FuelKey, boolean>;

export interface FuelDefinition {
  key: FuelKey;
  label: string;
  matchToken: string;
}

/**
 * One airport as published in airports.json. Property names are the
 * published wire format consumed by the map page, so they stay snake_case.
 */
export interface Airport {
  arpt_id: string;
  name: string;
  city: string;
  state: string;
  icao: string;
  lat: number;
  lon: number;
  fuel: FuelAvailability;
}

export interface AirportWithDistance extends Airport {
  distanceMiles: number;
}

export interface AirportsMetadata {
  cycleDate: string;
  sourceUrl: string;
  usedFallbackCycle: boolean;
  generatedAt: string;
  airportCount: number;
  skippedRowCount: number;
  warnings: string[];
}

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/**
 * - VIEW: airports inside the visible map bounds.
 * - RADIUS: airports within the search radius of the chosen center.
 * - ALL: every airport that sells a selected fuel.
 */
export type SearchMode = "VIEW" | "RADIUS" | "ALL";
