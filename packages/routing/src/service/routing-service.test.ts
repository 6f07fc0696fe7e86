import { describe, it, expect, vi, afterEach } from "vitest";
import type { Coordinate, LineFeature, PointFeature, Topology } from "@street-guide/types";
import { buildTopology, haversineDistance } from "@street-guide/builder";
import { RoadGraph, VertexIndex } from "../graph/index.js";
import { FacilityIndex } from "../facilities/index.js";
import { GraphCollaborators } from "./graph-collaborators.js";
import type { RoutingCollaborators } from "./collaborators.js";
import { RoutingService } from "./routing-service.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function line(coords: [number, number][]): LineFeature {
  return { geometry: { type: "LineString", coordinates: coords }, properties: {} };
}

function at([lng, lat]: [number, number]): Coordinate {
  return { lng, lat };
}

function serviceFor(topology: Topology, points: PointFeature[] = []): RoutingService {
  const graph = new RoadGraph(topology);
  return new RoutingService(
    new GraphCollaborators({
      graph,
      vertices: new VertexIndex(graph.nodes.values()),
      facilities: new FacilityIndex(points),
    })
  );
}

// A-B and B-C are joined at B; D-E is a separate cluster
const A: [number, number] = [3.35, 6.5];
const B: [number, number] = [3.351, 6.5];
const C: [number, number] = [3.351, 6.501];
const D: [number, number] = [3.36, 6.51];
const E: [number, number] = [3.361, 6.51];

const { topology } = buildTopology([line([A, B]), line([B, C]), line([D, E])]);

/** Slightly off node A, so snapping has work to do */
const NEAR_A: Coordinate = { lng: 3.3501, lat: 6.5001 };

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("RoutingService.route", () => {
  const service = serviceFor(topology);

  it("routes A to C through B", async () => {
    const result = await service.route(at(A), at(C));

    expect(result.mode).toBe("network");
    if (result.mode !== "network") return;
    expect(result.startNodeId).toBe(1);
    expect(result.edges.map((e) => e.id)).toEqual([1, 2]);
    expect(result.totalCost).toBeCloseTo(
      haversineDistance(at(A), at(B)) + haversineDistance(at(B), at(C)),
      6
    );
    expect(result.message).toBe("Road Distance: 222m");
  });

  it("returns edges in traversal order when travelling backwards", async () => {
    const result = await service.route(at(C), NEAR_A);

    expect(result.mode).toBe("network");
    if (result.mode !== "network") return;
    expect(result.startNodeId).toBe(3);
    expect(result.edges.map((e) => e.id)).toEqual([2, 1]);
  });

  it("reports no-path between separate clusters", async () => {
    await expect(service.route(at(A), at(D))).resolves.toEqual({
      mode: "empty",
      reason: "no-path",
    });
  });

  it("reports no-path when both points snap to one vertex", async () => {
    await expect(service.route(at(A), NEAR_A)).resolves.toEqual({
      mode: "empty",
      reason: "no-path",
    });
  });

  it("reports no-vertex on an empty graph", async () => {
    const empty = serviceFor({ nodes: [], edges: [] });
    await expect(empty.route(at(A), at(C))).resolves.toEqual({
      mode: "empty",
      reason: "no-vertex",
    });
  });
});

describe("RoutingService.nearestFacility", () => {
  const bankAtC: PointFeature = {
    id: 1,
    name: "Harbour Bank",
    category: "Bank",
    coordinate: at(C),
  };
  const clinicAtE: PointFeature = {
    id: 2,
    name: "Island Clinic",
    category: "Clinic",
    coordinate: at(E),
  };
  const service = serviceFor(topology, [bankAtC, clinicAtE]);

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns no-facility when the category has no features", async () => {
    await expect(service.nearestFacility(NEAR_A, "Fire Station")).resolves.toEqual({
      mode: "empty",
      reason: "no-facility",
    });
  });

  it("routes over the network to a connected facility", async () => {
    const result = await service.nearestFacility(NEAR_A, "bank");

    expect(result.mode).toBe("network");
    if (result.mode !== "network") return;
    expect(result.edges.map((e) => e.id)).toEqual([1, 2]);
    expect(result.message).toBe(`Road Distance: ${Math.round(result.totalCost)}m`);
    expect(result.target).toEqual({
      name: "Harbour Bank",
      category: "Bank",
      coordinate: at(C),
    });
  });

  it("falls back to a straight line for a disconnected facility", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});

    const result = await service.nearestFacility(NEAR_A, "clinic");
    const expected = haversineDistance(NEAR_A, at(E));

    expect(result.mode).toBe("straight-line");
    if (result.mode !== "straight-line") return;
    expect(result.line).toEqual([NEAR_A, at(E)]);
    expect(result.distance).toBe(expected);
    expect(result.message).toBe(`Straight Distance: ${Math.round(expected)}m (No road path)`);
    expect(result.message).toContain("No road path");
    expect(result.target.name).toBe("Island Clinic");
  });

  it("falls back to a straight line when the graph is empty", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const empty = serviceFor({ nodes: [], edges: [] }, [bankAtC]);

    const result = await empty.nearestFacility(at(A), "bank");

    expect(result.mode).toBe("straight-line");
  });

  it("logs the fallback", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await service.nearestFacility(NEAR_A, "clinic");

    expect(log).toHaveBeenCalledWith(
      "[routing] No road path to Island Clinic (no-path), using straight line"
    );
  });
});

describe("RoutingService with failing collaborators", () => {
  function failing(overrides: Partial<RoutingCollaborators>): RoutingCollaborators {
    return {
      nearestVertex: async (coord) => ({ id: 1, coordinate: coord }),
      nearestFeature: async () => ({ name: "Bank", category: "Bank", coordinate: at(C) }),
      shortestPath: async () => null,
      geodesicDistance: haversineDistance,
      ...overrides,
    };
  }

  it("propagates a vertex lookup failure", async () => {
    const service = new RoutingService(
      failing({ nearestVertex: () => Promise.reject(new Error("store unavailable")) })
    );
    await expect(service.route(at(A), at(C))).rejects.toThrow("store unavailable");
  });

  it("propagates a path search failure", async () => {
    const service = new RoutingService(
      failing({ shortestPath: () => Promise.reject(new Error("search unavailable")) })
    );
    await expect(service.nearestFacility(at(A), "bank")).rejects.toThrow("search unavailable");
  });

  it("propagates a facility lookup failure", async () => {
    const service = new RoutingService(
      failing({ nearestFeature: () => Promise.reject(new Error("index unavailable")) })
    );
    await expect(service.nearestFacility(at(A), "bank")).rejects.toThrow("index unavailable");
  });
});
