/**
 * Lookups the routing service delegates to. Implementations may be backed
 * by an in-memory graph or by a remote store; the service does not care.
 */

import type { ConnectedEdge, Coordinate, FacilityTarget, TopologyNode } from "@street-guide/types";

export interface RoutingCollaborators {
  /** Nearest graph vertex, or null when the graph has none */
  nearestVertex(coord: Coordinate): Promise<TopologyNode | null>;

  /** Nearest facility whose category matches, or null */
  nearestFeature(coord: Coordinate, category: string): Promise<FacilityTarget | null>;

  /**
   * Least-cost undirected path between two vertices, in traversal order.
   * Null when the vertices are not connected.
   */
  shortestPath(startNodeId: number, endNodeId: number): Promise<ConnectedEdge[] | null>;

  /** Great-circle distance in meters */
  geodesicDistance(a: Coordinate, b: Coordinate): number;
}
