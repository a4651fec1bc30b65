import L, { type LeafletMouseEvent } from "leaflet";
import { memo, useEffect, useState } from "react";
import {
  Circle,
  CircleMarker,
  MapContainer,
  Pane,
  Popup,
  TileLayer,
  useMap
} from "react-leaflet";
import { AirportCardContent } from "./AirportCardContent";
import { milesToMeters } from "../../../packages/shared/src/distance.js";
import type { AirportWithDistance, GeoPoint } from "../lib/api";
import type { MapBounds } from "../lib/airport-search";
import {
  MAP_COLLAPSED_HEIGHT_PIXELS,
  MAP_EXPANDED_HEIGHT_PIXELS,
  MAP_INITIAL_ZOOM,
  MAP_MAX_ZOOM,
  MAP_MIN_ZOOM,
  MAP_RESIZE_SETTLE_DELAY_MS,
  MAP_USER_LOCATION_ZOOM
} from "../lib/app-domain-constants";

const RADIUS_FIT_PADDING: [number, number] = [50, 50];
const AIRPORT_MARKER_PATH_OPTIONS = {
  color: "#1f5f44",
  fillColor: "#2e7555",
  fillOpacity: 0.85,
  opacity: 1
} as const;
const RADIUS_CIRCLE_PATH_OPTIONS = {
  color: "#2e7555",
  fillColor: "#95d765",
  fillOpacity: 0.08,
  weight: 2
} as const;
const SEARCH_CENTER_PATH_OPTIONS = {
  color: "#2e7555",
  fillColor: "#2e7555",
  fillOpacity: 0.9
} as const;

export type MapViewProps = {
  pins: AirportWithDistance[];
  center: GeoPoint;
  radiusMiles: number;
  showRadiusOverlay: boolean;
  /** Incremented each time the map should zoom to the search radius. */
  fitToRadiusRequest: number;
  userLocation: GeoPoint | null;
  isExpanded: boolean;
  onMapClick: (point: GeoPoint) => void;
  onViewportChange: (bounds: MapBounds) => void;
};

const MapEventBridge = ({
  onMapClick,
  onViewportChange
}: Pick<MapViewProps, "onMapClick" | "onViewportChange">) => {
  const map = useMap();

  useEffect(() => {
    const reportViewport = () => {
      const bounds = map.getBounds();
      onViewportChange({
        west: bounds.getWest(),
        south: bounds.getSouth(),
        east: bounds.getEast(),
        north: bounds.getNorth()
      });
    };

    const handleClick = (event: LeafletMouseEvent) => {
      onMapClick({ latitude: event.latlng.lat, longitude: event.latlng.lng });
    };

    reportViewport();

    map.on("moveend", reportViewport);
    map.on("zoomend", reportViewport);
    map.on("click", handleClick);

    return () => {
      map.off("moveend", reportViewport);
      map.off("zoomend", reportViewport);
      map.off("click", handleClick);
    };
  }, [map, onMapClick, onViewportChange]);

  return null;
};

const FitToRadius = ({
  center,
  radiusMiles,
  fitToRadiusRequest
}: Pick<MapViewProps, "center" | "radiusMiles" | "fitToRadiusRequest">) => {
  const map = useMap();

  useEffect(() => {
    if (fitToRadiusRequest === 0) {
      return;
    }

    const radiusBounds = L.latLng(center.latitude, center.longitude).toBounds(
      milesToMeters(radiusMiles) * 2
    );
    map.fitBounds(radiusBounds, { padding: RADIUS_FIT_PADDING });
    // Only an explicit request refits; radius or center edits alone do not.
  }, [fitToRadiusRequest, map]);

  return null;
};

const FitToUser = ({ latitude, longitude }: GeoPoint) => {
  const map = useMap();

  useEffect(() => {
    map.setView([latitude, longitude], MAP_USER_LOCATION_ZOOM);
  }, [latitude, longitude, map]);

  return null;
};

const InvalidateSizeOnResize = ({ isExpanded }: { isExpanded: boolean }) => {
  const map = useMap();

  useEffect(() => {
    const timeoutId = setTimeout(() => map.invalidateSize(), MAP_RESIZE_SETTLE_DELAY_MS);
    return () => {
      clearTimeout(timeoutId);
    };
  }, [isExpanded, map]);

  return null;
};

const SearchRadiusOverlay = ({
  center,
  radiusMiles
}: Pick<MapViewProps, "center" | "radiusMiles">) => (
  <>
    <Circle
      center={[center.latitude, center.longitude]}
      radius={milesToMeters(radiusMiles)}
      pathOptions={RADIUS_CIRCLE_PATH_OPTIONS}
      interactive={false}
    />
    <CircleMarker
      center={[center.latitude, center.longitude]}
      radius={8}
      pathOptions={SEARCH_CENTER_PATH_OPTIONS}
      bubblingMouseEvents={false}
    >
      <Popup>
        <strong>Search Center</strong>
        <br />
        {radiusMiles} mile radius
      </Popup>
    </CircleMarker>
  </>
);

const AirportMarker = memo(({
  airport,
  selectAirport
}: {
  airport: AirportWithDistance;
  selectAirport: (airport: AirportWithDistance) => void;
}) => (
  <CircleMarker
    center={[airport.lat, airport.lon]}
    pane="airport-pins"
    radius={6}
    pathOptions={AIRPORT_MARKER_PATH_OPTIONS}
    bubblingMouseEvents={false}
    eventHandlers={{
      click: () => {
        selectAirport(airport);
      }
    }}
  />
));

AirportMarker.displayName = "AirportMarker";

const AirportPins = ({ pins }: { pins: AirportWithDistance[] }) => {
  const [selectedAirport, setSelectedAirport] = useState<AirportWithDistance | null>(null);

  useEffect(() => {
    if (!selectedAirport) {
      return;
    }

    const refreshedAirport = pins.find((pin) => pin.arpt_id === selectedAirport.arpt_id);
    if (refreshedAirport !== selectedAirport) {
      setSelectedAirport(refreshedAirport ?? null);
    }
  }, [pins, selectedAirport]);

  return (
    <>
      <Pane name="airport-pins" style={{ zIndex: 610 }}>
        {pins.map((airport) => (
          <AirportMarker key={airport.arpt_id} airport={airport} selectAirport={setSelectedAirport} />
        ))}
      </Pane>

      {selectedAirport ? (
        <Popup
          position={[selectedAirport.lat, selectedAirport.lon]}
          className="airport-popup"
          minWidth={240}
          eventHandlers={{
            remove: () => {
              setSelectedAirport(null);
            }
          }}
        >
          <AirportCardContent airport={selectedAirport} />
        </Popup>
      ) : null}
    </>
  );
};

export const MapView = memo(({
  pins,
  center,
  radiusMiles,
  showRadiusOverlay,
  fitToRadiusRequest,
  userLocation,
  isExpanded,
  onMapClick,
  onViewportChange
}: MapViewProps) => (
  // MapContainer reads its style once, so the height lives on the frame.
  <div
    className="map-frame"
    data-testid="map-frame"
    style={{ height: isExpanded ? MAP_EXPANDED_HEIGHT_PIXELS : MAP_COLLAPSED_HEIGHT_PIXELS }}
  >
    <MapContainer
      center={[center.latitude, center.longitude]}
      zoom={MAP_INITIAL_ZOOM}
      minZoom={MAP_MIN_ZOOM}
      maxZoom={MAP_MAX_ZOOM}
      scrollWheelZoom
      preferCanvas
      className="map"
      style={{ height: "100%" }}
    >
      <TileLayer
        attribution='&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors'
        url="https://tile.openstreetmap.org/{z}/{x}/{y}.png"
        maxZoom={19}
      />

      <MapEventBridge onMapClick={onMapClick} onViewportChange={onViewportChange} />
      <FitToRadius center={center} radiusMiles={radiusMiles} fitToRadiusRequest={fitToRadiusRequest} />
      <InvalidateSizeOnResize isExpanded={isExpanded} />
      {userLocation ? (
        <FitToUser latitude={userLocation.latitude} longitude={userLocation.longitude} />
      ) : null}

      {showRadiusOverlay ? <SearchRadiusOverlay center={center} radiusMiles={radiusMiles} /> : null}

      <AirportPins pins={pins} />
    </MapContainer>
  </div>
));

MapView.displayName = "MapView";
