/**
 * A small street network shared by the server tests.
 *
 *   A ── B          D ── E      (Island)
 *        │
 *        C ─ F                  (Surulere)
 *
 * A→B and B→C are about 110m each, D→E is a separate island, and C→F is a
 * 22m stub that the roads layer leaves out.
 */

import { buildTopology, GeoStore } from "@street-guide/builder";
import type { LineFeature, PointFeature } from "@street-guide/types";
import type { Polygon } from "geojson";
import type { NetworkData } from "../services/network.service.js";

export const A = { lng: 3.35, lat: 6.5 };
export const B = { lng: 3.351, lat: 6.5 };
export const C = { lng: 3.351, lat: 6.501 };
export const D = { lng: 3.36, lat: 6.51 };
export const E = { lng: 3.361, lat: 6.51 };
export const F = { lng: 3.3512, lat: 6.501 };

function line(from: { lng: number; lat: number }, to: { lng: number; lat: number }, name?: string): LineFeature {
  return {
    geometry: {
      type: "LineString",
      coordinates: [
        [from.lng, from.lat],
        [to.lng, to.lat],
      ],
    },
    properties: name === undefined ? {} : { name },
  };
}

export function square(west: number, south: number, east: number, north: number): Polygon {
  return {
    type: "Polygon",
    coordinates: [
      [
        [west, south],
        [east, south],
        [east, north],
        [west, north],
        [west, south],
      ],
    ],
  };
}

export const ROADS: LineFeature[] = [
  line(A, B, "Bode Thomas Street"),
  line(B, C, "Adeniran Ogunsanya"),
  line(D, E),
  line(C, F),
];

export const POINTS: Omit<PointFeature, "id">[] = [
  { name: "Harbour Bank", category: "Bank", coordinate: C },
  { name: "Corner Microfinance", category: "Microfinance Bank", coordinate: { lng: 3.3502, lat: 6.5 } },
  { name: "Island Clinic", category: "Clinic", coordinate: E },
  { name: "Surulere School", category: "School", coordinate: { lng: 3.352, lat: 6.502 } },
];

export const SURULERE = square(3.345, 6.495, 3.355, 6.505);
export const ISLAND = square(3.358, 6.508, 3.365, 6.515);

export const DISTRICTS = [
  { name: "Surulere", geometry: SURULERE },
  { name: "Island", geometry: ISLAND },
];

export const BOUNDARY = [
  { properties: { name: "Project Area" }, geometry: square(3.34, 6.49, 3.37, 6.52) },
];

/** The fixture as it reads back from a freshly written store */
export function fixtureData(overrides: Partial<NetworkData> = {}): NetworkData {
  return {
    topology: buildTopology(ROADS).topology,
    points: POINTS.map((p, i) => ({ id: i + 1, ...p })),
    districts: DISTRICTS.map((d, i) => ({ id: i + 1, ...d })),
    boundary: BOUNDARY.map((b, i) => ({ id: i + 1, ...b })),
    ...overrides,
  };
}

/** An in-memory store holding the fixture. The caller closes it. */
export function fixtureStore(): GeoStore {
  const store = new GeoStore({ filePath: ":memory:" });
  store.writeTopology(buildTopology(ROADS).topology);
  store.writePointFeatures(POINTS);
  store.writeDistricts(DISTRICTS);
  store.writeBoundary(BOUNDARY);
  return store;
}
