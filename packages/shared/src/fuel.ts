import type { FuelAvailability, FuelDefinition, FuelKey } from "./contracts.js";

export const FUEL_DEFINITIONS: readonly FuelDefinition[] = [
  { key: "mogas", label: "MOGAS", matchToken: "MOGAS" },
  { key: "100ll", label: "100LL", matchToken: "100" },
  { key: "jet_a", label: "Jet A", matchToken: "JET" }
];

export const FUEL_KEYS: readonly FuelKey[] = FUEL_DEFINITIONS.map((fuel) => fuel.key);

export const isFuelKey = (value: unknown): value is FuelKey =>
  value === "mogas" || value === "100ll" || value === "jet_a";

/**
 * NASR lists fuel grades as a comma separated cell of codes such as
 * "100LL,A" or "A1+,MOGAS". A grade counts as sold when the upper-cased cell
 * contains its token anywhere. Jet fuel is coded A, A1 or A1+, which the JET
 * token does not match, so `jet_a` only turns on for cells that spell out JET.
 */
export const parseFuelTypes = (rawFuelTypes: string): FuelAvailability => {
  const normalizedFuelTypes = rawFuelTypes.toUpperCase();

  const fuel: FuelAvailability = { mogas: false, "100ll": false, jet_a: false };

  for (const definition of FUEL_DEFINITIONS) {
    fuel[definition.key] = normalizedFuelTypes.includes(definition.matchToken);
  }

  return fuel;
};

export const listAvailableFuelLabels = (fuel: FuelAvailability): string[] =>
  FUEL_DEFINITIONS.filter((definition) => fuel[definition.key]).map(
    (definition) => definition.label
  );
