/**
 * @street-guide/routing
 *
 * Road routing over a topology built by @street-guide/builder.
 *
 * Key concepts:
 * - RoadGraph: read-only adjacency over the persisted topology
 * - VertexIndex: snaps arbitrary coordinates to graph vertices
 * - FacilityIndex: points of interest filtered by category
 * - RoutingService: point-to-point and nearest-facility routing
 *
 * Pipeline:
 * 1. Load Topology + points -> RoadGraph, VertexIndex, FacilityIndex
 * 2. Wrap them in GraphCollaborators
 * 3. RoutingService answers route / nearestFacility -> RouteResult
 * 4. Export RouteResult -> GeoJSON
 */

export * from "./graph/index.js";
export * from "./search/index.js";
export * from "./facilities/index.js";
export * from "./service/index.js";
export * from "./export/index.js";
