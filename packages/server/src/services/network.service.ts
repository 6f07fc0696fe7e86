/**
 * The street network every request reads from.
 *
 * Loaded from the database once at startup, indexed, and frozen. Handlers
 * receive it through createApp() and never mutate it.
 */

import type {
  BoundaryFeature,
  ConnectedEdge,
  DistrictFeature,
  PointFeature,
  Topology,
} from "@street-guide/types";
import type { GeoStore } from "@street-guide/builder";
import {
  FacilityIndex,
  GraphCollaborators,
  RoadGraph,
  RoutingService,
  VertexIndex,
} from "@street-guide/routing";
import type { NetworkStats } from "../models/responses.js";

/** Everything read from the database */
export interface NetworkData {
  topology: Topology;
  points: PointFeature[];
  districts: DistrictFeature[];
  boundary: BoundaryFeature[];
}

export interface StreetNetwork {
  readonly graph: RoadGraph;
  readonly vertices: VertexIndex;
  readonly facilities: FacilityIndex;
  /** Routable road edges, ascending id */
  readonly roads: readonly ConnectedEdge[];
  readonly districts: readonly DistrictFeature[];
  readonly boundary: readonly BoundaryFeature[];
  readonly routing: RoutingService;
}

export function buildStreetNetwork(data: NetworkData): StreetNetwork {
  const graph = new RoadGraph(data.topology);
  const vertices = new VertexIndex(graph.nodes.values());
  const facilities = new FacilityIndex(data.points);

  return Object.freeze({
    graph,
    vertices,
    facilities,
    roads: Object.freeze([...graph.edges.values()]),
    districts: Object.freeze(data.districts.map((d) => Object.freeze({ ...d }))),
    boundary: Object.freeze(data.boundary.map((b) => Object.freeze({ ...b }))),
    routing: new RoutingService(new GraphCollaborators({ graph, vertices, facilities })),
  });
}

/** Read every table from the store and build the network */
export function loadStreetNetwork(store: GeoStore): StreetNetwork {
  const startTime = Date.now();
  const network = buildStreetNetwork({
    topology: store.readTopology(),
    points: store.readPointFeatures(),
    districts: store.readDistricts(),
    boundary: store.readBoundary(),
  });

  const { stats } = network.graph;
  console.log(
    `[server] Network loaded in ${Date.now() - startTime}ms: ` +
      `${stats.nodesCount} nodes, ${stats.edgesCount} edges ` +
      `(${stats.excludedEdges} excluded, ${stats.danglingEdges} dangling), ` +
      `${network.facilities.size} facilities, ${network.districts.length} districts`
  );
  if (stats.danglingEdges > 0) {
    console.warn(`[server] ${stats.danglingEdges} edges reference missing vertices`);
  }
  return network;
}

export function networkStats(network: StreetNetwork): NetworkStats {
  return {
    nodes: network.graph.stats.nodesCount,
    edges: network.graph.stats.edgesCount,
    facilities: network.facilities.size,
    districts: network.districts.length,
  };
}
