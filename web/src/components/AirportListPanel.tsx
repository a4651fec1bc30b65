import { Button, Text, TextInput, Title } from "@mantine/core";
import { memo, useRef } from "react";
import { AirportCardContent } from "./AirportCardContent";
import type { AirportWithDistance, AirportsMetadata, SearchMode } from "../lib/api";
import { describeResultCount } from "../lib/airport-search";
import { useListPagination } from "../lib/hooks/use-list-pagination";
import { useLoadMoreObserver } from "../lib/hooks/use-load-more-observer";

export type AirportListPanelProps = {
  rankedAirports: AirportWithDistance[];
  searchMode: SearchMode;
  radiusMiles: number;
  metadata: AirportsMetadata | null;
  searchText: string;
  setSearchText: (searchText: string) => void;
};

const formatCycleCaption = (metadata: AirportsMetadata | null): string => {
  if (!metadata) {
    return "-";
  }

  return metadata.usedFallbackCycle ? `${metadata.cycleDate} (previous cycle)` : metadata.cycleDate;
};

export const AirportListPanel = memo(({
  rankedAirports,
  searchMode,
  radiusMiles,
  metadata,
  searchText,
  setSearchText
}: AirportListPanelProps) => {
  const loadMoreButtonReference = useRef<HTMLButtonElement>(null);
  const { visibleItems, hasMore, loadMore } = useListPagination(rankedAirports);

  useLoadMoreObserver({
    targetReference: loadMoreButtonReference,
    isEnabled: hasMore,
    onVisible: loadMore
  });

  return (
    <section className="panel list-panel">
      <Title order={2} size="h4">
        Airports{" "}
        <Text span c="dimmed" size="sm" data-testid="result-count">
          {describeResultCount(rankedAirports.length, searchMode, radiusMiles)}
        </Text>
      </Title>
      <Text size="xs" c="dimmed" mt={4}>
        NASR cycle: {formatCycleCaption(metadata)}
      </Text>

      <TextInput
        mt={12}
        type="search"
        label="Search airports"
        placeholder="Name, identifier or city"
        value={searchText}
        onChange={(event) => setSearchText(event.currentTarget.value)}
        data-testid="airport-search-input"
      />

      <ul className="airport-list" data-testid="airport-list">
        {visibleItems.map((airport) => (
          <li key={airport.arpt_id} className="airport-row" data-testid="airport-row">
            <AirportCardContent airport={airport} />
          </li>
        ))}
      </ul>

      <Button
        ref={loadMoreButtonReference}
        fullWidth
        variant="light"
        color="green"
        disabled={!hasMore}
        onClick={loadMore}
        data-testid="load-more-button"
      >
        Load more
      </Button>
    </section>
  );
});

AirportListPanel.displayName = "AirportListPanel";
