import { haversineDistanceMiles } from "../../../packages/shared/src/distance.js";
import type { Airport, AirportWithDistance, FuelKey, GeoPoint, SearchMode } from "./api";

export const MAX_MAP_PINS = 2000;
export const LIST_PAGE_SIZE = 80;

export type MapBounds = {
  west: number;
  south: number;
  east: number;
  north: number;
};

export type AirportSearchCriteria = {
  selectedFuels: readonly FuelKey[];
  searchMode: SearchMode;
  center: GeoPoint;
  radiusMiles: number;
  /** Visible map bounds; null until the map has reported them. */
  viewBounds: MapBounds | null;
  searchText?: string;
};

export const isWithinBounds = (bounds: MapBounds, latitude: number, longitude: number): boolean =>
  latitude >= bounds.south &&
  latitude <= bounds.north &&
  longitude >= bounds.west &&
  longitude <= bounds.east;

export const distanceFromCenterMiles = (center: GeoPoint, airport: Airport): number =>
  haversineDistanceMiles(center.latitude, center.longitude, airport.lat, airport.lon);

const matchesSearchText = (airport: Airport, normalizedSearchText: string): boolean =>
  [airport.name, airport.arpt_id, airport.icao, airport.city].some((value) =>
    value.toLowerCase().includes(normalizedSearchText)
  );

export const filterAirports = (
  airports: readonly Airport[],
  criteria: AirportSearchCriteria
): Airport[] => {
  const { selectedFuels, searchMode, center, radiusMiles, viewBounds } = criteria;

  if (!selectedFuels.length) {
    return [];
  }

  const normalizedSearchText = criteria.searchText?.trim().toLowerCase() ?? "";

  return airports.filter((airport) => {
    if (!selectedFuels.some((fuelKey) => airport.fuel[fuelKey])) {
      return false;
    }

    if (normalizedSearchText && !matchesSearchText(airport, normalizedSearchText)) {
      return false;
    }

    if (searchMode === "RADIUS") {
      return distanceFromCenterMiles(center, airport) <= radiusMiles;
    }

    if (searchMode === "VIEW" && viewBounds) {
      return isWithinBounds(viewBounds, airport.lat, airport.lon);
    }

    return true;
  });
};

export const rankAirportsByDistance = (
  airports: readonly Airport[],
  center: GeoPoint
): AirportWithDistance[] =>
  airports
    .map((airport) => ({ ...airport, distanceMiles: distanceFromCenterMiles(center, airport) }))
    .sort((left, right) => left.distanceMiles - right.distanceMiles);

export const searchAirports = (
  airports: readonly Airport[],
  criteria: AirportSearchCriteria
): AirportWithDistance[] => rankAirportsByDistance(filterAirports(airports, criteria), criteria.center);

export const selectMapPins = <T>(rankedAirports: readonly T[]): T[] =>
  rankedAirports.slice(0, MAX_MAP_PINS);

export const getVisibleListCount = (page: number, total: number): number =>
  Math.min((page + 1) * LIST_PAGE_SIZE, total);

export const hasMoreListPages = (page: number, total: number): boolean =>
  (page + 1) * LIST_PAGE_SIZE < total;

export const describeSearchArea = (searchMode: SearchMode, radiusMiles: number): string => {
  if (searchMode === "ALL") {
    return "total";
  }

  if (searchMode === "RADIUS") {
    return `within ${radiusMiles}mi`;
  }

  return "in view";
};

export const describeResultCount = (
  total: number,
  searchMode: SearchMode,
  radiusMiles: number
): string => {
  const mapLimitNote = total > MAX_MAP_PINS ? `, ${MAX_MAP_PINS} shown on map` : "";
  return `(${total} ${describeSearchArea(searchMode, radiusMiles)}${mapLimitNote})`;
};

export const shouldShowRadiusCircle = (searchMode: SearchMode, showRadiusCircle: boolean): boolean =>
  searchMode === "RADIUS" || (searchMode !== "ALL" && showRadiusCircle);
