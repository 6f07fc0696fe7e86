/**
 * Point-to-point and nearest-facility routing.
 *
 * A nearest-facility query ends in exactly one of three results:
 *
 *   no facility matches        -> empty (no-facility)
 *   facility reachable by road -> network
 *   facility not reachable     -> straight-line
 *
 * Failures raised by the collaborators are not caught here; they reach the
 * caller unchanged.
 */

import type {
  Coordinate,
  EmptyRoute,
  NetworkRoute,
  RouteResult,
  StraightLineRoute,
} from "@street-guide/types";
import { pathCost } from "../search/index.js";
import type { RoutingCollaborators } from "./collaborators.js";

export function roadDistanceMessage(meters: number): string {
  return `Road Distance: ${Math.round(meters)}m`;
}

export function straightDistanceMessage(meters: number): string {
  return `Straight Distance: ${Math.round(meters)}m (No road path)`;
}

export class RoutingService {
  constructor(private readonly collaborators: RoutingCollaborators) {}

  /**
   * Shortest road route between two arbitrary points, each snapped to its
   * nearest vertex first.
   */
  async route(origin: Coordinate, destination: Coordinate): Promise<NetworkRoute | EmptyRoute> {
    const [start, end] = await Promise.all([
      this.collaborators.nearestVertex(origin),
      this.collaborators.nearestVertex(destination),
    ]);
    if (!start || !end) {
      return { mode: "empty", reason: "no-vertex" };
    }

    const edges = await this.collaborators.shortestPath(start.id, end.id);
    // Both points on one vertex leave nothing to draw
    if (!edges || edges.length === 0) {
      return { mode: "empty", reason: "no-path" };
    }

    const totalCost = pathCost(edges);
    return {
      mode: "network",
      startNodeId: start.id,
      edges,
      totalCost,
      message: roadDistanceMessage(totalCost),
    };
  }

  /**
   * Route to the nearest facility of a category, falling back to a straight
   * line when no road path reaches it.
   */
  async nearestFacility(origin: Coordinate, category: string): Promise<RouteResult> {
    const target = await this.collaborators.nearestFeature(origin, category);
    if (!target) {
      return { mode: "empty", reason: "no-facility" };
    }

    const routed = await this.route(origin, target.coordinate);
    if (routed.mode === "network") {
      return { ...routed, target };
    }

    const distance = this.collaborators.geodesicDistance(origin, target.coordinate);
    console.log(
      `[routing] No road path to ${target.name} (${routed.reason}), using straight line`
    );
    const fallback: StraightLineRoute = {
      mode: "straight-line",
      line: [origin, target.coordinate],
      distance,
      message: straightDistanceMessage(distance),
      target,
    };
    return fallback;
  }
}
