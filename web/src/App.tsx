import { Alert, Button, Group, Loader, Text, Title } from "@mantine/core";
import { IconArrowsMaximize, IconArrowsMinimize } from "@tabler/icons-react";
import { useQuery } from "@tanstack/react-query";
import { useCallback, useEffect, useState } from "react";
import { AirportListPanel } from "./components/AirportListPanel";
import { FilterPanel } from "./components/FilterPanel";
import { MapView } from "./components/MapView";
import type { Airport, FuelKey, GeoPoint, SearchMode } from "./lib/api";
import { FUEL_KEYS } from "./lib/api";
import type { MapBounds } from "./lib/airport-search";
import { shouldShowRadiusCircle } from "./lib/airport-search";
import {
  AIRPORTS_METADATA_QUERY_KEY,
  AIRPORTS_QUERY_KEY,
  airportsMetadataQueryFn,
  airportsQueryFn,
  toLoadErrorMessage
} from "./lib/airports-query";
import { DEFAULT_RADIUS_MILES, DEFAULT_SEARCH_CENTER } from "./lib/app-domain-constants";
import { readUserPreferences, writeUserPreferences } from "./lib/app-domain-preferences";
import { useAirportSearch } from "./lib/hooks/use-airport-search";
import { useUserLocation } from "./lib/hooks/use-user-location";

const NO_AIRPORTS: Airport[] = [];

export const App = () => {
  const [initialPreferences] = useState(readUserPreferences);

  const [selectedFuels, setSelectedFuels] = useState<FuelKey[]>(
    () => initialPreferences.selectedFuels ?? [...FUEL_KEYS]
  );
  const [radiusMiles, setRadiusMiles] = useState(
    () => initialPreferences.radiusMiles ?? DEFAULT_RADIUS_MILES
  );
  const [showRadiusCircle, setShowRadiusCircle] = useState(
    () => initialPreferences.showRadiusCircle ?? false
  );
  const [searchMode, setSearchMode] = useState<SearchMode>("VIEW");
  const [center, setCenter] = useState<GeoPoint>(DEFAULT_SEARCH_CENTER);
  const [userLocation, setUserLocation] = useState<GeoPoint | null>(null);
  const [viewBounds, setViewBounds] = useState<MapBounds | null>(null);
  const [fitToRadiusRequest, setFitToRadiusRequest] = useState(0);
  const [isMapExpanded, setIsMapExpanded] = useState(false);
  const [searchText, setSearchText] = useState("");

  const airportsQuery = useQuery({
    queryKey: AIRPORTS_QUERY_KEY,
    queryFn: airportsQueryFn
  });
  const metadataQuery = useQuery({
    queryKey: AIRPORTS_METADATA_QUERY_KEY,
    queryFn: airportsMetadataQueryFn
  });

  useEffect(() => {
    writeUserPreferences({ selectedFuels, radiusMiles, showRadiusCircle });
  }, [radiusMiles, selectedFuels, showRadiusCircle]);

  useUserLocation((location) => {
    setCenter(location);
    setUserLocation(location);
  });

  const { rankedAirports, mapPins } = useAirportSearch(airportsQuery.data ?? NO_AIRPORTS, {
    selectedFuels,
    searchMode,
    center,
    radiusMiles,
    // Bounds apply in VIEW mode only.
    viewBounds: searchMode === "VIEW" ? viewBounds : null,
    searchText
  });

  const requestFitToRadius = () => {
    setFitToRadiusRequest((currentRequest) => currentRequest + 1);
  };

  const toggleFuel = useCallback((fuelKey: FuelKey) => {
    setSelectedFuels((currentFuels) =>
      currentFuels.includes(fuelKey)
        ? currentFuels.filter((currentFuel) => currentFuel !== fuelKey)
        : FUEL_KEYS.filter((key) => key === fuelKey || currentFuels.includes(key))
    );
  }, []);

  const handleMapClick = useCallback(
    (point: GeoPoint) => {
      setCenter(point);
      if (searchMode === "VIEW") {
        setSearchMode("RADIUS");
        requestFitToRadius();
      }
    },
    [searchMode]
  );

  const changeRadiusMiles = (nextRadiusMiles: number) => {
    setRadiusMiles(nextRadiusMiles);
    if (searchMode === "RADIUS") {
      requestFitToRadius();
    }
  };

  const loadErrorMessage = toLoadErrorMessage(airportsQuery.error);

  return (
    <div className="app">
      <header className="app-header">
        <Title order={1} size="h3">Fuel Near Me</Title>
        <Text size="sm" c="dimmed">
          Airports selling MOGAS, 100LL and Jet A, from the FAA NASR airport data.
        </Text>
      </header>

      {loadErrorMessage ? (
        <Alert color="red" title="Could not load airports" mb="md" data-testid="load-error">
          {loadErrorMessage}
        </Alert>
      ) : null}

      <div className="layout">
        <FilterPanel
          selectedFuels={selectedFuels}
          toggleFuel={toggleFuel}
          radiusMiles={radiusMiles}
          changeRadiusMiles={changeRadiusMiles}
          showRadiusCircle={showRadiusCircle}
          setShowRadiusCircle={setShowRadiusCircle}
          searchMode={searchMode}
          changeSearchMode={setSearchMode}
        />

        <main className="main-column">
          <section className="panel map-panel">
            <Group justify="space-between" mb="xs">
              {airportsQuery.isPending ? <Loader size="sm" /> : <span />}
              <Button
                size="xs"
                variant="default"
                leftSection={
                  isMapExpanded ? <IconArrowsMinimize size={14} /> : <IconArrowsMaximize size={14} />
                }
                onClick={() => setIsMapExpanded((current) => !current)}
                data-testid="expand-map-button"
              >
                {isMapExpanded ? "Shrink Map" : "Expand Map"}
              </Button>
            </Group>
            <MapView
              pins={mapPins}
              center={center}
              radiusMiles={radiusMiles}
              showRadiusOverlay={shouldShowRadiusCircle(searchMode, showRadiusCircle)}
              fitToRadiusRequest={fitToRadiusRequest}
              userLocation={userLocation}
              isExpanded={isMapExpanded}
              onMapClick={handleMapClick}
              onViewportChange={setViewBounds}
            />
          </section>

          <AirportListPanel
            rankedAirports={rankedAirports}
            searchMode={searchMode}
            radiusMiles={radiusMiles}
            metadata={metadataQuery.data ?? null}
            searchText={searchText}
            setSearchText={setSearchText}
          />
        </main>
      </div>
    </div>
  );
};
