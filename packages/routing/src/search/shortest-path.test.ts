import { describe, it, expect } from "vitest";
import type { LineFeature } from "@street-guide/types";
import { buildTopology } from "@street-guide/builder";
import { RoadGraph } from "../graph/index.js";
import { findShortestPath, pathCost } from "./shortest-path.js";
import { MinHeap } from "./min-heap.js";

function line(coords: [number, number][]): LineFeature {
  return { geometry: { type: "LineString", coordinates: coords }, properties: {} };
}

function graphOf(lines: LineFeature[]): RoadGraph {
  return new RoadGraph(buildTopology(lines).topology);
}

// Corner points of a ~111 m square at the equator
const P1: [number, number] = [0, 0];
const P2: [number, number] = [0.001, 0];
const P3: [number, number] = [0.001, 0.001];
const P4: [number, number] = [0, 0.001];

describe("MinHeap", () => {
  it("pops in comparator order", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    for (const n of [5, 1, 4, 2, 3, 0]) heap.push(n);

    const popped: number[] = [];
    for (let n = heap.pop(); n !== undefined; n = heap.pop()) popped.push(n);

    expect(popped).toEqual([0, 1, 2, 3, 4, 5]);
    expect(heap.size).toBe(0);
  });

  it("returns undefined when empty", () => {
    expect(new MinHeap<number>((a, b) => a - b).pop()).toBeUndefined();
  });
});

describe("findShortestPath", () => {
  it("follows two short edges instead of one long detour", () => {
    // Node ids: P1=1, P3=2 (detour), P2=3
    const graph = graphOf([
      line([P1, [0, 0.003], P3]),
      line([P1, P2]),
      line([P2, P3]),
    ]);

    const path = findShortestPath(graph, 1, 2);

    expect(path?.map((e) => e.id)).toEqual([2, 3]);
    const detour = graph.getEdge(1)!;
    expect(pathCost(path ?? [])).toBeLessThan(detour.cost);
  });

  it("traverses edges against their digitized direction", () => {
    const graph = graphOf([line([P1, P2]), line([P2, P3])]);

    expect(findShortestPath(graph, 3, 1)?.map((e) => e.id)).toEqual([2, 1]);
  });

  it("returns an empty path when start and end coincide", () => {
    const graph = graphOf([line([P1, P2])]);
    expect(findShortestPath(graph, 1, 1)).toEqual([]);
  });

  it("returns null between disconnected components", () => {
    const graph = graphOf([line([P1, P2]), line([P3, P4])]);
    expect(findShortestPath(graph, 1, 3)).toBeNull();
  });

  it("returns null for unknown nodes", () => {
    const graph = graphOf([line([P1, P2])]);
    expect(findShortestPath(graph, 1, 42)).toBeNull();
  });

  it("never routes through an excluded edge", () => {
    const graph = new RoadGraph(
      buildTopology([line([P1, P2]), { geometry: null, properties: {} }, line([P3, P4])]).topology
    );

    expect(graph.getEdge(2)).toBeUndefined();
    expect(findShortestPath(graph, 1, 3)).toBeNull();
  });

  it("sums edge costs along the path", () => {
    const graph = graphOf([line([P1, P2]), line([P2, P3]), line([P3, P4])]);
    const path = findShortestPath(graph, 1, 4) ?? [];

    expect(path.map((e) => e.id)).toEqual([1, 2, 3]);
    expect(pathCost(path)).toBeCloseTo(
      graph.getEdge(1)!.cost + graph.getEdge(2)!.cost + graph.getEdge(3)!.cost,
      9
    );
  });

  it("is never beaten by another path through the graph", () => {
    // Square with a diagonal: P1-P2-P3-P4-P1 plus P1-P3
    const graph = graphOf([
      line([P1, P2]),
      line([P2, P3]),
      line([P3, P4]),
      line([P4, P1]),
      line([P1, P3]),
    ]);

    const best = pathCost(findShortestPath(graph, 1, 3) ?? []);
    const viaP2 = graph.getEdge(1)!.cost + graph.getEdge(2)!.cost;
    const viaP4 = graph.getEdge(3)!.cost + graph.getEdge(4)!.cost;

    expect(best).toBeCloseTo(graph.getEdge(5)!.cost, 9);
    expect(best).toBeLessThanOrEqual(viaP2);
    expect(best).toBeLessThanOrEqual(viaP4);
  });

  it("resolves equal-cost alternatives the same way every time", () => {
    const lines = [line([P1, P2]), line([P2, P3]), line([P3, P4]), line([P4, P1])];

    const first = findShortestPath(graphOf(lines), 1, 3)?.map((e) => e.id);
    const second = findShortestPath(graphOf(lines), 1, 3)?.map((e) => e.id);

    expect(first).toHaveLength(2);
    expect(second).toEqual(first);
  });
});
