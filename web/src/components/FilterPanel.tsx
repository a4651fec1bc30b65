import { Anchor, Button, Checkbox, Divider, Group, Slider, Stack, Text, Title } from "@mantine/core";
import { IconList, IconMapSearch } from "@tabler/icons-react";
import type { FuelKey, SearchMode } from "../lib/api";
import { FUEL_DEFINITIONS } from "../lib/api";
import { formatRadiusMiles } from "../lib/app-domain-airport";
import {
  FAA_NASR_SOURCE_URL,
  MAX_RADIUS_MILES,
  MIN_RADIUS_MILES,
  RADIUS_STEP_MILES
} from "../lib/app-domain-constants";

export type FilterPanelProps = {
  selectedFuels: readonly FuelKey[];
  toggleFuel: (fuelKey: FuelKey) => void;
  radiusMiles: number;
  changeRadiusMiles: (radiusMiles: number) => void;
  showRadiusCircle: boolean;
  setShowRadiusCircle: (showRadiusCircle: boolean) => void;
  searchMode: SearchMode;
  changeSearchMode: (searchMode: SearchMode) => void;
};

export const FilterPanel = ({
  selectedFuels,
  toggleFuel,
  radiusMiles,
  changeRadiusMiles,
  showRadiusCircle,
  setShowRadiusCircle,
  searchMode,
  changeSearchMode
}: FilterPanelProps) => {
  const isMapSearchActive = searchMode === "VIEW" || searchMode === "RADIUS";

  return (
    <aside className="panel filter-panel">
      <Title order={2} size="h4">Filters</Title>
      <Stack gap="md" mt={12}>
        <div>
          <Title order={3} size="sm" mb={8}>
            <Anchor href={FAA_NASR_SOURCE_URL} target="_blank" rel="noreferrer" c="inherit" underline="always">
              Fuel sold
            </Anchor>
          </Title>
          <Group gap="xs" role="group" aria-label="Fuel filter">
            {FUEL_DEFINITIONS.map((fuel) => {
              const isSelected = selectedFuels.includes(fuel.key);
              return (
                <Button
                  key={fuel.key}
                  size="xs"
                  variant={isSelected ? "filled" : "default"}
                  color="green"
                  aria-pressed={isSelected}
                  data-testid={`fuel-toggle-${fuel.key}`}
                  onClick={() => toggleFuel(fuel.key)}
                >
                  {fuel.label}
                </Button>
              );
            })}
          </Group>
          {!selectedFuels.length ? (
            <Text size="xs" c="dimmed" mt={6}>
              Select at least one fuel to see airports.
            </Text>
          ) : null}
        </div>

        <Divider />
        <div>
          <Group justify="space-between" mb={8}>
            <Title order={3} size="sm">Search radius</Title>
            <Text size="sm" data-testid="radius-display">
              {formatRadiusMiles(radiusMiles)}
            </Text>
          </Group>
          <Slider
            aria-label="Search radius in miles"
            min={MIN_RADIUS_MILES}
            max={MAX_RADIUS_MILES}
            step={RADIUS_STEP_MILES}
            value={radiusMiles}
            onChange={changeRadiusMiles}
            label={(value) => formatRadiusMiles(value)}
            color="green"
          />
          <Checkbox
            mt={12}
            label="Show radius circle"
            checked={showRadiusCircle}
            onChange={(event) => setShowRadiusCircle(event.currentTarget.checked)}
            data-testid="show-radius-circle"
          />
        </div>

        <Divider />
        <Group grow gap="xs">
          <Button
            variant={isMapSearchActive ? "filled" : "default"}
            color="green"
            leftSection={<IconMapSearch size={16} />}
            aria-pressed={isMapSearchActive}
            onClick={() => changeSearchMode("VIEW")}
            data-testid="search-mode-view"
          >
            Search map view
          </Button>
          <Button
            variant={searchMode === "ALL" ? "filled" : "default"}
            color="green"
            leftSection={<IconList size={16} />}
            aria-pressed={searchMode === "ALL"}
            onClick={() => changeSearchMode("ALL")}
            data-testid="search-mode-all"
          >
            List all
          </Button>
        </Group>
      </Stack>
    </aside>
  );
};
