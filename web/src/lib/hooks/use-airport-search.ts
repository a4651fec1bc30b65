import { useMemo } from "react";
import type { Airport, AirportWithDistance } from "../api";
import { searchAirports, selectMapPins, type AirportSearchCriteria } from "../airport-search";

export function useAirportSearch(
  airports: readonly Airport[],
  {
    selectedFuels,
    searchMode,
    center,
    radiusMiles,
    viewBounds,
    searchText
  }: AirportSearchCriteria
): {
  rankedAirports: AirportWithDistance[];
  mapPins: AirportWithDistance[];
} {
  const rankedAirports = useMemo(
    () =>
      searchAirports(airports, {
        selectedFuels,
        searchMode,
        center,
        radiusMiles,
        viewBounds,
        searchText
      }),
    // center by value: a re-created object with the same coordinates keeps the list page.
    [
      airports,
      selectedFuels,
      searchMode,
      center.latitude,
      center.longitude,
      radiusMiles,
      viewBounds,
      searchText
    ]
  );

  const mapPins = useMemo(() => selectMapPins(rankedAirports), [rankedAirports]);

  return { rankedAirports, mapPins };
}
