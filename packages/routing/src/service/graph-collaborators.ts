/**
 * RoutingCollaborators backed by an in-memory road graph and facility index.
 */

import type { ConnectedEdge, Coordinate, FacilityTarget, TopologyNode } from "@street-guide/types";
import { haversineDistance } from "@street-guide/builder";
import type { RoadGraph, VertexIndex } from "../graph/index.js";
import { toFacilityTarget } from "../facilities/index.js";
import type { FacilityIndex } from "../facilities/index.js";
import { findShortestPath } from "../search/index.js";
import type { RoutingCollaborators } from "./collaborators.js";

export interface GraphCollaboratorsOptions {
  graph: RoadGraph;
  vertices: VertexIndex;
  facilities: FacilityIndex;
}

export class GraphCollaborators implements RoutingCollaborators {
  private readonly graph: RoadGraph;
  private readonly vertices: VertexIndex;
  private readonly facilities: FacilityIndex;

  constructor(options: GraphCollaboratorsOptions) {
    this.graph = options.graph;
    this.vertices = options.vertices;
    this.facilities = options.facilities;
  }

  async nearestVertex(coord: Coordinate): Promise<TopologyNode | null> {
    return this.vertices.nearest(coord)?.node ?? null;
  }

  async nearestFeature(coord: Coordinate, category: string): Promise<FacilityTarget | null> {
    const match = this.facilities.nearest(coord, category);
    return match ? toFacilityTarget(match.feature) : null;
  }

  async shortestPath(startNodeId: number, endNodeId: number): Promise<ConnectedEdge[] | null> {
    return findShortestPath(this.graph, startNodeId, endNodeId);
  }

  geodesicDistance(a: Coordinate, b: Coordinate): number {
    return haversineDistance(a, b);
  }
}
