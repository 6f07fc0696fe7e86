/**
 * Road network topology.
 *
 * Raw road segments are digitized as independent polylines. The topology
 * builder promotes each one to an edge and merges coincident endpoints
 * into shared nodes, producing a graph suitable for shortest-path search.
 */

import type { LineString, MultiLineString } from "geojson";
import type { Coordinate } from "./geo.js";

/** Geometry of a road segment */
export type LineGeometry = LineString | MultiLineString;

/** One input road segment, before topology processing */
export interface LineFeature {
  /** Null when the source record carries no geometry */
  geometry: LineGeometry | null;
  properties: {
    /** Road name, if the source has one */
    name?: string;
  };
}

/** A graph vertex: a deduplicated endpoint shared by one or more segments */
export interface TopologyNode {
  /** Sequential id, assigned in first-seen order starting at 1 */
  id: number;
  /** Endpoint coordinate rounded to the build precision */
  coordinate: Coordinate;
}

/**
 * A road segment promoted to a graph edge.
 *
 * Edges without geometry have no endpoints and a cost of 0. They are kept
 * so the edge table lines up with the source records, and are never
 * searched.
 */
export interface TopologyEdge {
  /** 1-based position of the segment in the input sequence */
  id: number;
  name?: string;
  source: number | null;
  target: number | null;
  geometry: LineGeometry | null;
  /** Geodesic length in meters */
  cost: number;
  /** Always equal to cost: the network is traversed undirected */
  reverseCost: number;
}

/** A routable edge: one with both endpoints */
export type ConnectedEdge = TopologyEdge & { source: number; target: number };

/** Node and edge sets produced by one topology build */
export interface Topology {
  nodes: TopologyNode[];
  edges: TopologyEdge[];
}

/** Whether an edge takes part in graph search */
export function isConnectedEdge(edge: TopologyEdge): edge is ConnectedEdge {
  return edge.source !== null && edge.target !== null;
}
