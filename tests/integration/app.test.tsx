// @vitest-environment jsdom
import React from "react";
import { QueryClient, QueryClientProvider } from "@tanstack/react-query";
import { act, cleanup, fireEvent, screen, waitFor } from "@testing-library/react";
import { http, HttpResponse } from "msw";
import { setupServer } from "msw/node";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { buildAirport } from "../airport-fixtures";
import { renderWithMantine } from "../test-utils";
import { App } from "../../web/src/App";

const AIRPORTS_URL = "http://localhost/airports.json";
const METADATA_URL = "http://localhost/airports-meta.json";
const PREFERENCES_KEY = "fuel-near-me-preferences";

const mockedMap = {
  setView: vi.fn(),
  fitBounds: vi.fn(),
  invalidateSize: vi.fn(),
  on: vi.fn(),
  off: vi.fn(),
  getBounds: vi.fn(() => ({
    getWest: () => -100,
    getSouth: () => 38,
    getEast: () => -96,
    getNorth: () => 41
  }))
};

vi.mock("leaflet", () => ({
  default: {
    latLng: (latitude: number, longitude: number) => ({
      toBounds: (sizeInMeters: number) => ({ latitude, longitude, sizeInMeters })
    })
  }
}));

vi.mock("react-leaflet", () => ({
  MapContainer: ({ children }: { children: React.ReactNode }) => (
    <div data-testid="mock-map-container">{children}</div>
  ),
  TileLayer: () => null,
  Pane: ({ children }: { children: React.ReactNode }) => <div>{children}</div>,
  Popup: ({ children }: { children: React.ReactNode }) => <div>{children}</div>,
  Circle: () => <div data-testid="radius-circle" />,
  CircleMarker: ({ children }: { children?: React.ReactNode }) => <div>{children}</div>,
  useMap: () => mockedMap
}));

// Near the default center and inside the mocked view bounds.
const KANSAS_AIRPORT = buildAirport({
  arpt_id: "KS1",
  icao: "KKS1",
  name: "PRAIRIE FIELD",
  city: "SMITH CENTER",
  state: "KS",
  lat: 39.5,
  lon: -98.3,
  fuel: { mogas: false, "100ll": true, jet_a: false }
});
// About 375 miles north, outside the mocked view bounds.
const DAKOTA_AIRPORT = buildAirport({
  arpt_id: "SD1",
  icao: "KSD1",
  name: "NORTH FIELD",
  city: "MITCHELL",
  state: "SD",
  lat: 44.9,
  lon: -98.3,
  fuel: { mogas: true, "100ll": false, jet_a: false }
});

const server = setupServer();

beforeAll(() => {
  server.listen({ onUnhandledRequest: "error" });
});

beforeEach(() => {
  for (const spy of Object.values(mockedMap)) {
    spy.mockClear();
  }
  server.use(
    http.get(AIRPORTS_URL, () => HttpResponse.json([KANSAS_AIRPORT, DAKOTA_AIRPORT])),
    http.get(METADATA_URL, () => new HttpResponse(null, { status: 404 }))
  );
});

afterEach(() => {
  cleanup();
  server.resetHandlers();
  window.localStorage.clear();
});

afterAll(() => {
  server.close();
});

const renderApp = async () => {
  const queryClient = new QueryClient({
    defaultOptions: { queries: { retry: false, gcTime: Infinity } }
  });

  renderWithMantine(
    <QueryClientProvider client={queryClient}>
      <App />
    </QueryClientProvider>
  );

  await waitFor(() => {
    expect(screen.getByTestId("result-count").textContent).toBe("(1 in view)");
  });
};

const clickMap = (latitude: number, longitude: number) => {
  const clickRegistrations = mockedMap.on.mock.calls.filter(([eventName]) => eventName === "click");
  const latestClickHandler = clickRegistrations.at(-1)?.[1];
  expect(latestClickHandler).toBeDefined();

  act(() => {
    latestClickHandler?.({ latlng: { lat: latitude, lng: longitude } });
  });
};

const pressRadiusSliderRight = () => {
  fireEvent.keyDown(screen.getByRole("slider"), { key: "ArrowRight", code: "ArrowRight" });
};

const listedAirportNames = () =>
  screen.getAllByTestId("airport-row").map((row) => row.querySelector("p")?.textContent ?? "");

describe("App", () => {
  it("lists the airports inside the map view after loading", async () => {
    await renderApp();

    expect(listedAirportNames()).toEqual(["PRAIRIE FIELD (KS1)"]);
  });

  it("switches from map view to a radius search on map click and fits the radius", async () => {
    await renderApp();

    clickMap(44.9, -98.3);

    await waitFor(() => {
      expect(screen.getByTestId("result-count").textContent).toBe("(1 within 200mi)");
    });
    expect(listedAirportNames()).toEqual(["NORTH FIELD (SD1)"]);
    expect(mockedMap.fitBounds).toHaveBeenCalledTimes(1);
    expect(screen.getByTestId("radius-circle")).toBeTruthy();
  });

  it("keeps listing everything when the map is clicked in list all mode", async () => {
    await renderApp();

    fireEvent.click(screen.getByTestId("search-mode-all"));
    expect(screen.getByTestId("result-count").textContent).toBe("(2 total)");

    clickMap(44.9, -98.3);

    expect(screen.getByTestId("result-count").textContent).toBe("(2 total)");
    expect(screen.getByTestId("search-mode-all").getAttribute("aria-pressed")).toBe("true");
    expect(listedAirportNames()).toEqual(["NORTH FIELD (SD1)", "PRAIRIE FIELD (KS1)"]);
    expect(mockedMap.fitBounds).not.toHaveBeenCalled();
  });

  it("refits the map on radius changes only while searching a radius", async () => {
    await renderApp();

    pressRadiusSliderRight();
    expect(screen.getByTestId("radius-display").textContent).toBe("210 miles");
    expect(mockedMap.fitBounds).not.toHaveBeenCalled();

    clickMap(44.9, -98.3);
    expect(mockedMap.fitBounds).toHaveBeenCalledTimes(1);

    pressRadiusSliderRight();
    expect(screen.getByTestId("radius-display").textContent).toBe("220 miles");
    expect(mockedMap.fitBounds).toHaveBeenCalledTimes(2);
  });

  it("saves filter choices to local storage", async () => {
    await renderApp();

    fireEvent.click(screen.getByTestId("fuel-toggle-mogas"));
    pressRadiusSliderRight();

    expect(JSON.parse(window.localStorage.getItem(PREFERENCES_KEY) ?? "null")).toEqual({
      selectedFuels: ["100ll", "jet_a"],
      radiusMiles: 210,
      showRadiusCircle: false
    });
  });

  it("starts from saved preferences", async () => {
    window.localStorage.setItem(
      PREFERENCES_KEY,
      JSON.stringify({ selectedFuels: ["100ll"], radiusMiles: 120, showRadiusCircle: true })
    );

    await renderApp();

    expect(screen.getByTestId("radius-display").textContent).toBe("120 miles");
    expect(screen.getByTestId("fuel-toggle-mogas").getAttribute("aria-pressed")).toBe("false");
    expect(screen.getByTestId("radius-circle")).toBeTruthy();
  });

  it("expands and shrinks the map", async () => {
    await renderApp();

    const toggleButton = screen.getByTestId("expand-map-button");
    expect(toggleButton.textContent).toBe("Expand Map");
    expect(screen.getByTestId("map-frame").style.height).toBe("350px");

    fireEvent.click(toggleButton);
    expect(screen.getByTestId("expand-map-button").textContent).toBe("Shrink Map");
    expect(screen.getByTestId("map-frame").style.height).toBe("700px");

    fireEvent.click(screen.getByTestId("expand-map-button"));
    expect(screen.getByTestId("map-frame").style.height).toBe("350px");
  });
});
