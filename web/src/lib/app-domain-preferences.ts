import { z } from "zod";
import type { FuelKey } from "./api";
import { FUEL_KEYS, isFuelKey } from "./api";
import { MAX_RADIUS_MILES, MIN_RADIUS_MILES, RADIUS_STEP_MILES } from "./app-domain-constants";

const USER_PREFERENCES_STORAGE_KEY = "fuel-near-me-preferences";

export type UserPreferences = {
  selectedFuels?: FuelKey[];
  radiusMiles?: number;
  showRadiusCircle?: boolean;
};

export const clampRadiusMiles = (radiusMiles: number): number => {
  const stepped = Math.round(radiusMiles / RADIUS_STEP_MILES) * RADIUS_STEP_MILES;
  return Math.min(MAX_RADIUS_MILES, Math.max(MIN_RADIUS_MILES, stepped));
};

// Each field falls back on its own so one bad value does not drop the rest.
const storedPreferencesSchema = z.object({
  selectedFuels: z.array(z.unknown()).optional().catch(undefined),
  radiusMiles: z.number().finite().optional().catch(undefined),
  showRadiusCircle: z.boolean().optional().catch(undefined)
});

const parseJson = (value: string): unknown => {
  try {
    return JSON.parse(value);
  } catch {
    return null;
  }
};

export const parseUserPreferences = (value: string | null): UserPreferences => {
  if (!value) {
    return {};
  }

  const parseResult = storedPreferencesSchema.safeParse(parseJson(value));
  if (!parseResult.success) {
    return {};
  }

  const stored = parseResult.data;
  const preferences: UserPreferences = {};

  if (stored.selectedFuels) {
    const selectedFuels = new Set(stored.selectedFuels.filter(isFuelKey));
    preferences.selectedFuels = FUEL_KEYS.filter((fuelKey) => selectedFuels.has(fuelKey));
  }

  if (stored.radiusMiles !== undefined) {
    preferences.radiusMiles = clampRadiusMiles(stored.radiusMiles);
  }

  if (stored.showRadiusCircle !== undefined) {
    preferences.showRadiusCircle = stored.showRadiusCircle;
  }

  return preferences;
};

export const readUserPreferences = (): UserPreferences => {
  try {
    return parseUserPreferences(window.localStorage.getItem(USER_PREFERENCES_STORAGE_KEY));
  } catch {
    return {};
  }
};

export const writeUserPreferences = (preferences: UserPreferences) => {
  try {
    window.localStorage.setItem(USER_PREFERENCES_STORAGE_KEY, JSON.stringify(preferences));
  } catch {
    return;
  }
};
