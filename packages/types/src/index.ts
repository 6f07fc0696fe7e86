/**
 * @street-guide/types
 *
 * Shared domain types for the street guide routing engine.
 *
 * - Geo: Coordinates and bounding boxes
 * - Topology: Road segments promoted to a node/edge graph
 * - Features: Points of interest and sub-district polygons
 * - Route: The result of routing
 */

export * from "./geo.js";
export * from "./topology.js";
export * from "./features.js";
export * from "./route.js";
