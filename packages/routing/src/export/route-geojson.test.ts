import { describe, it, expect } from "vitest";
import type { ConnectedEdge, FacilityTarget, RouteResult } from "@street-guide/types";
import { buildDirectedCoords, routeEdgesToGeoJson, routeResultToGeoJson } from "./route-geojson.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function makeEdge(
  id: number,
  source: number,
  target: number,
  coordinates: [number, number][],
  name?: string
): ConnectedEdge {
  return {
    id,
    ...(name !== undefined && { name }),
    source,
    target,
    geometry: { type: "LineString", coordinates },
    cost: 100,
    reverseCost: 100,
  };
}

const AB = makeEdge(1, 1, 2, [[3.35, 6.5], [3.351, 6.5]], "Bode Thomas Street");
const BC = makeEdge(2, 2, 3, [[3.351, 6.5], [3.3515, 6.5005], [3.351, 6.501]]);

const TARGET: FacilityTarget = {
  name: "Harbour Bank",
  category: "Bank",
  coordinate: { lng: 3.351, lat: 6.501 },
};

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("buildDirectedCoords", () => {
  it("joins edges without repeating shared endpoints", () => {
    expect(buildDirectedCoords([AB, BC], 1)).toEqual([
      [3.35, 6.5],
      [3.351, 6.5],
      [3.3515, 6.5005],
      [3.351, 6.501],
    ]);
  });

  it("reverses edges entered at their target", () => {
    expect(buildDirectedCoords([BC, AB], 3)).toEqual([
      [3.351, 6.501],
      [3.3515, 6.5005],
      [3.351, 6.5],
      [3.35, 6.5],
    ]);
  });

  it("flattens multi-part geometries", () => {
    const multi: ConnectedEdge = {
      ...AB,
      geometry: {
        type: "MultiLineString",
        coordinates: [
          [[3.35, 6.5], [3.3505, 6.5]],
          [[3.3506, 6.5], [3.351, 6.5]],
        ],
      },
    };
    expect(buildDirectedCoords([multi], 1)).toEqual([
      [3.35, 6.5],
      [3.3505, 6.5],
      [3.3506, 6.5],
      [3.351, 6.5],
    ]);
  });

  it("returns nothing for an empty path", () => {
    expect(buildDirectedCoords([], 1)).toEqual([]);
  });
});

describe("routeResultToGeoJson", () => {
  it("returns an empty collection for an empty result", () => {
    expect(routeResultToGeoJson({ mode: "empty", reason: "no-facility" })).toEqual({
      type: "FeatureCollection",
      features: [],
      _meta: { mode: "empty", reason: "no-facility" },
    });
  });

  it("emits the target point and the road route", () => {
    const result: RouteResult = {
      mode: "network",
      startNodeId: 1,
      edges: [AB, BC],
      totalCost: 200,
      message: "Road Distance: 200m",
      target: TARGET,
    };

    const collection = routeResultToGeoJson(result);

    expect(collection._meta).toEqual({ mode: "network" });
    expect(collection.features).toEqual([
      {
        type: "Feature",
        geometry: { type: "Point", coordinates: [3.351, 6.501] },
        properties: { name: "Harbour Bank", category: "Bank", is_target: true },
      },
      {
        type: "Feature",
        geometry: {
          type: "LineString",
          coordinates: [
            [3.35, 6.5],
            [3.351, 6.5],
            [3.3515, 6.5005],
            [3.351, 6.501],
          ],
        },
        properties: { type: "route", distance_msg: "Road Distance: 200m" },
      },
    ]);
  });

  it("omits the target point for a plain route", () => {
    const collection = routeResultToGeoJson({
      mode: "network",
      startNodeId: 1,
      edges: [AB],
      totalCost: 100,
      message: "Road Distance: 100m",
    });

    expect(collection.features).toHaveLength(1);
    expect(collection.features[0]?.properties).toEqual({
      type: "route",
      distance_msg: "Road Distance: 100m",
    });
  });

  it("draws a dashed two-point line for the straight-line fallback", () => {
    const collection = routeResultToGeoJson({
      mode: "straight-line",
      line: [{ lng: 3.35, lat: 6.5 }, TARGET.coordinate],
      distance: 156.7,
      message: "Straight Distance: 157m (No road path)",
      target: TARGET,
    });

    expect(collection._meta).toEqual({ mode: "straight-line" });
    expect(collection.features[1]).toEqual({
      type: "Feature",
      geometry: {
        type: "LineString",
        coordinates: [
          [3.35, 6.5],
          [3.351, 6.501],
        ],
      },
      properties: {
        type: "route",
        style: "dashed",
        distance_msg: "Straight Distance: 157m (No road path)",
      },
    });
  });
});

describe("routeEdgesToGeoJson", () => {
  it("emits one feature per edge, naming unnamed roads", () => {
    const collection = routeEdgesToGeoJson({
      mode: "network",
      startNodeId: 1,
      edges: [AB, BC],
      totalCost: 200,
      message: "Road Distance: 200m",
    });

    expect(collection.features.map((f) => f.properties)).toEqual([
      { id: 1, name: "Bode Thomas Street" },
      { id: 2, name: "Road" },
    ]);
    expect(collection.features[1]?.geometry).toEqual(BC.geometry);
  });

  it("returns an empty collection when there is no path", () => {
    expect(routeEdgesToGeoJson({ mode: "empty", reason: "no-path" })).toEqual({
      type: "FeatureCollection",
      features: [],
      _meta: { mode: "empty", reason: "no-path" },
    });
  });
});
