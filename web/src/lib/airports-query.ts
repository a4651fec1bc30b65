import type { QueryFunctionContext } from "@tanstack/react-query";
import type { Airport, AirportsMetadata } from "./api";
import { fetchAirports, fetchAirportsMetadata } from "./airports-data";

export const AIRPORTS_QUERY_KEY = ["airports"] as const;
export const AIRPORTS_METADATA_QUERY_KEY = ["airports-metadata"] as const;

export const airportsQueryFn = ({ signal }: QueryFunctionContext): Promise<Airport[]> =>
  fetchAirports(signal);

export const airportsMetadataQueryFn = ({
  signal
}: QueryFunctionContext): Promise<AirportsMetadata | null> => fetchAirportsMetadata(signal);

export const toLoadErrorMessage = (error: unknown): string | null => {
  if (!error) {
    return null;
  }

  return error instanceof Error ? error.message : "Unknown load error";
};
