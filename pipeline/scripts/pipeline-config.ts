import "dotenv/config";
import { DEFAULT_NASR_BASE_URL } from "../services/nasr-cycle.js";

// ---------------------------------------------------------------------------
// Environment configuration
// ---------------------------------------------------------------------------

const parsePositiveInteger = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export const NASR_BASE_URL = process.env.NASR_BASE_URL ?? DEFAULT_NASR_BASE_URL;
export const NASR_DOWNLOAD_TIMEOUT_MS = parsePositiveInteger(
  process.env.NASR_DOWNLOAD_TIMEOUT_MS,
  120_000
);
/** Optional YYYY-MM-DD override for the cycle to download. */
export const NASR_CYCLE_DATE = process.env.NASR_CYCLE_DATE?.trim() || null;
export const AIRPORTS_OUTPUT_PATH =
  process.env.AIRPORTS_OUTPUT_PATH ?? "web/public/airports.json";
export const AIRPORTS_METADATA_OUTPUT_PATH =
  process.env.AIRPORTS_METADATA_OUTPUT_PATH ?? "web/public/airports-meta.json";
