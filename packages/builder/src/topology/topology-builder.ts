/**
 * Build a routable Topology from independently digitized road segments.
 *
 * Each segment becomes one edge. Segment endpoints are rounded to a fixed
 * number of decimal digits and deduplicated, so segments that meet at the
 * same rounded coordinate share a node.
 */

import type {
  Coordinate,
  LineFeature,
  Topology,
  TopologyEdge,
  TopologyNode,
} from "@street-guide/types";
import { lineLength, lineParts } from "../geo/index.js";

/** Decimal digits kept when deduplicating endpoints */
export const DEFAULT_COORDINATE_PRECISION = 6;

/** Options for topology building */
export interface TopologyBuildOptions {
  /**
   * Decimal digits kept when rounding endpoints (default 6).
   * Endpoints that differ beyond this precision become separate nodes.
   */
  coordinatePrecision?: number;
}

/**
 * Statistics about the topology building process.
 */
export interface TopologyBuildStats {
  /** Number of nodes in the topology */
  nodesCount: number;
  /** Number of edges, excluded ones included */
  edgesCount: number;
  /** Edges recorded without endpoints (null or empty geometry) */
  excludedEdges: number;
  /** Edges whose start and end share a node */
  selfLoops: number;
  /** Total length of all edges in meters */
  totalLengthMeters: number;
  /** Time taken to build the topology in milliseconds */
  buildTimeMs: number;
}

/**
 * Result of building a topology from line features.
 */
export interface TopologyBuildResult {
  topology: Topology;
  stats: TopologyBuildStats;
}

/**
 * Round a coordinate to the given number of decimal digits.
 * Negative zero collapses to zero, so both round to the same node.
 */
export function roundCoordinate(coord: Coordinate, precision: number): Coordinate {
  return {
    lat: roundTo(coord.lat, precision),
    lng: roundTo(coord.lng, precision),
  };
}

function roundTo(value: number, precision: number): number {
  return Number(value.toFixed(precision)) + 0;
}

function coordinateKey(coord: Coordinate): string {
  return `${coord.lng},${coord.lat}`;
}

/**
 * Build a Topology from road segments.
 *
 * Algorithm:
 * 1. For each segment, in input order, take the first coordinate of its
 *    first non-empty part and the last coordinate of its last non-empty part
 * 2. Round both, then look up or allocate a node id for each
 * 3. Emit an edge whose id is the segment's 1-based position, costed by its
 *    geodesic length in both directions
 *
 * Segments with no geometry (or only empty parts) are still emitted, with
 * no endpoints and a cost of 0, so edge ids keep matching input positions.
 *
 * @param lines - Road segments in source order
 * @returns Topology and build statistics
 */
export function buildTopology(
  lines: Iterable<LineFeature>,
  options: TopologyBuildOptions = {}
): TopologyBuildResult {
  const startTime = Date.now();
  const precision = options.coordinatePrecision ?? DEFAULT_COORDINATE_PRECISION;

  const nodeIds = new Map<string, number>();
  const nodes: TopologyNode[] = [];
  const edges: TopologyEdge[] = [];
  let nextNodeId = 1;

  let excludedEdges = 0;
  let selfLoops = 0;
  let totalLengthMeters = 0;

  function nodeFor(coord: Coordinate): number {
    const rounded = roundCoordinate(coord, precision);
    const key = coordinateKey(rounded);
    const existing = nodeIds.get(key);
    if (existing !== undefined) return existing;

    const id = nextNodeId++;
    nodeIds.set(key, id);
    nodes.push({ id, coordinate: rounded });
    return id;
  }

  let position = 0;
  for (const line of lines) {
    position++;
    const name = line.properties.name;
    const parts = line.geometry
      ? lineParts(line.geometry).filter((part) => part.length > 0)
      : [];

    const firstPart = parts[0];
    const lastPart = parts[parts.length - 1];
    if (!line.geometry || !firstPart || !lastPart) {
      edges.push({
        id: position,
        ...(name !== undefined && { name }),
        source: null,
        target: null,
        geometry: null,
        cost: 0,
        reverseCost: 0,
      });
      excludedEdges++;
      continue;
    }

    const source = nodeFor(firstPart[0]!);
    const target = nodeFor(lastPart[lastPart.length - 1]!);
    const cost = lineLength(line.geometry);

    if (source === target) selfLoops++;
    totalLengthMeters += cost;

    edges.push({
      id: position,
      ...(name !== undefined && { name }),
      source,
      target,
      geometry: line.geometry,
      cost,
      reverseCost: cost,
    });
  }

  return {
    topology: { nodes, edges },
    stats: {
      nodesCount: nodes.length,
      edgesCount: edges.length,
      excludedEdges,
      selfLoops,
      totalLengthMeters,
      buildTimeMs: Date.now() - startTime,
    },
  };
}
