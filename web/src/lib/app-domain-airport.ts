import type { Airport } from "./api";
import { AIRNAV_AIRPORT_BASE_URL } from "./app-domain-constants";

export const formatDistanceMiles = (distanceMiles: number): string =>
  `${distanceMiles.toFixed(1)} mi`;

export const formatRadiusMiles = (radiusMiles: number): string => `${radiusMiles} miles`;

export const buildAirNavUrl = (airport: Pick<Airport, "icao">): string =>
  `${AIRNAV_AIRPORT_BASE_URL}/${encodeURIComponent(airport.icao)}`;

export const formatAirportLocation = (airport: Pick<Airport, "city" | "state">): string =>
  [airport.city, airport.state].filter(Boolean).join(", ");
