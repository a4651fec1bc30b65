import type { GeoPoint } from "../../../packages/shared/src/contracts.js";

export const FAA_NASR_SOURCE_URL =
  "https://www.faa.gov/air_traffic/flight_info/aeronav/aero_data/NASR_Subscription/";
export const AIRNAV_AIRPORT_BASE_URL = "https://www.airnav.com/airport";

/** Geographic center of the contiguous United States. */
export const DEFAULT_SEARCH_CENTER: GeoPoint = { latitude: 39.5, longitude: -98.3 };

export const DEFAULT_RADIUS_MILES = 200;
export const MIN_RADIUS_MILES = 10;
export const MAX_RADIUS_MILES = 500;
export const RADIUS_STEP_MILES = 10;

export const MAP_MIN_ZOOM = 4;
export const MAP_MAX_ZOOM = 12;
export const MAP_INITIAL_ZOOM = 6;
export const MAP_USER_LOCATION_ZOOM = 7;

export const MAP_COLLAPSED_HEIGHT_PIXELS = 350;
export const MAP_EXPANDED_HEIGHT_PIXELS = 700;
export const MAP_RESIZE_SETTLE_DELAY_MS = 300;
