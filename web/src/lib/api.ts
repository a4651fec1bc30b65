export type {
  Airport,
  AirportWithDistance,
  AirportsMetadata,
  FuelAvailability,
  FuelDefinition,
  FuelKey,
  GeoPoint,
  SearchMode
} from "../../../packages/shared/src/contracts.js";

export {
  FUEL_DEFINITIONS,
  FUEL_KEYS,
  isFuelKey,
  listAvailableFuelLabels
} from "../../../packages/shared/src/fuel.js";
