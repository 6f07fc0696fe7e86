/**
 * Route results - the output of the routing service.
 *
 * Every result is tagged with the mode that produced it, so callers never
 * infer the outcome from which optional fields happen to be present.
 */

import type { Coordinate } from "./geo.js";
import type { ConnectedEdge } from "./topology.js";

/** How a result was produced */
export type RouteMode = "network" | "straight-line" | "empty";

/** Why a query produced no route */
export type EmptyRouteReason = "no-vertex" | "no-path" | "no-facility";

/** The facility a nearest-facility query settled on */
export interface FacilityTarget {
  name: string;
  category: string;
  coordinate: Coordinate;
}

/** A shortest path over the road network */
export interface NetworkRoute {
  mode: "network";
  /** Node the path leaves from */
  startNodeId: number;
  /** Traversed edges, in travel order */
  edges: ConnectedEdge[];
  /** Sum of the traversed edge costs, in meters */
  totalCost: number;
  message: string;
  target?: FacilityTarget;
}

/** Direct line used when no road path connects origin and facility */
export interface StraightLineRoute {
  mode: "straight-line";
  line: [Coordinate, Coordinate];
  /** Geodesic distance in meters */
  distance: number;
  message: string;
  target: FacilityTarget;
}

/** No target, no vertex, or no path */
export interface EmptyRoute {
  mode: "empty";
  reason: EmptyRouteReason;
}

export type RouteResult = NetworkRoute | StraightLineRoute | EmptyRoute;
