import { Anchor, Badge, Group, Text } from "@mantine/core";
import { memo } from "react";
import type { AirportWithDistance } from "../lib/api";
import { listAvailableFuelLabels } from "../lib/api";
import {
  buildAirNavUrl,
  formatAirportLocation,
  formatDistanceMiles
} from "../lib/app-domain-airport";

type AirportCardContentProps = {
  airport: AirportWithDistance;
};

export const AirportCardContent = memo(({ airport }: AirportCardContentProps) => {
  const fuelLabels = listAvailableFuelLabels(airport.fuel);

  return (
    <div className="airport-card" data-testid="airport-card">
      <Text fw={600} className="airport-card-title">
        {airport.name}{" "}
        <Text span c="dimmed" size="sm">
          ({airport.arpt_id})
        </Text>
      </Text>
      <Text size="sm" c="dimmed">
        {formatAirportLocation(airport)}
      </Text>
      <Group gap={4} mt={4} data-testid="airport-fuel-list">
        <Text size="sm">Fuel:</Text>
        {fuelLabels.length ? (
          fuelLabels.map((fuelLabel) => (
            <Badge key={fuelLabel} size="sm" variant="light" color="green">
              {fuelLabel}
            </Badge>
          ))
        ) : (
          <Text size="sm" c="dimmed">
            none listed
          </Text>
        )}
      </Group>
      <Text size="sm" data-testid="airport-distance">
        Distance: {formatDistanceMiles(airport.distanceMiles)}
      </Text>
      <Anchor href={buildAirNavUrl(airport)} target="_blank" rel="noreferrer" size="sm">
        View on AirNav
      </Anchor>
    </div>
  );
});

AirportCardContent.displayName = "AirportCardContent";
