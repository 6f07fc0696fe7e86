/**
 * GeoJSON export for route results.
 *
 * Produces the FeatureCollections the web map consumes: the facility as a
 * point flagged `is_target`, and the route as one LineString carrying a
 * `distance_msg`. Straight-line fallbacks are marked `style: "dashed"`.
 * Every collection carries `_meta.mode` so clients can tell the outcomes
 * apart without inspecting features.
 */

import type {
  ConnectedEdge,
  EmptyRoute,
  EmptyRouteReason,
  FacilityTarget,
  LineGeometry,
  NetworkRoute,
  RouteMode,
  RouteResult,
} from "@street-guide/types";
import type { Feature, LineString, Point, Position } from "geojson";
import { lineParts } from "@street-guide/builder";

/** Properties on the route line of a nearest-facility response */
export type RouteLineProperties = {
  type: "route";
  distance_msg: string;
  style?: "dashed";
};

/** Properties on the facility point of a nearest-facility response */
export type TargetPointProperties = {
  name: string;
  category: string;
  is_target: true;
};

/** Properties on each edge feature of a point-to-point route */
export type RouteEdgeProperties = {
  id: number;
  name: string;
};

export interface RouteMeta {
  mode: RouteMode;
  reason?: EmptyRouteReason;
}

export interface RouteFeatureCollection<F extends Feature = Feature> {
  type: "FeatureCollection";
  features: F[];
  _meta: RouteMeta;
}

export type RouteEdgeFeature = Feature<LineGeometry, RouteEdgeProperties>;

export type NearestFeature =
  | Feature<Point, TargetPointProperties>
  | Feature<LineString, RouteLineProperties>;

/** Default label for unnamed roads */
export const UNNAMED_ROAD = "Road";

/**
 * Build the coordinate list of a path, respecting traversal direction.
 *
 * Walks the edges from `startNodeId`, reversing any edge entered at its
 * target. Consecutive duplicate points are dropped.
 */
export function buildDirectedCoords(
  edges: readonly ConnectedEdge[],
  startNodeId: number
): Position[] {
  const coords: Position[] = [];
  let currentNode = startNodeId;

  for (const edge of edges) {
    const reversed = currentNode !== edge.source;
    const points = edge.geometry ? lineParts(edge.geometry).flat() : [];
    if (reversed) points.reverse();

    for (const c of points) {
      const last = coords[coords.length - 1];
      if (last && Math.abs((last[0] ?? 0) - c.lng) < 1e-8 && Math.abs((last[1] ?? 0) - c.lat) < 1e-8) {
        continue;
      }
      coords.push([c.lng, c.lat]);
    }

    currentNode = reversed ? edge.source : edge.target;
  }

  return coords;
}

function targetFeature(target: FacilityTarget): Feature<Point, TargetPointProperties> {
  return {
    type: "Feature",
    geometry: { type: "Point", coordinates: [target.coordinate.lng, target.coordinate.lat] },
    properties: { name: target.name, category: target.category, is_target: true },
  };
}

/**
 * Convert a routing result into the nearest-facility response collection.
 * Empty results become an empty collection.
 */
export function routeResultToGeoJson(result: RouteResult): RouteFeatureCollection<NearestFeature> {
  switch (result.mode) {
    case "empty":
      return {
        type: "FeatureCollection",
        features: [],
        _meta: { mode: "empty", reason: result.reason },
      };

    case "network": {
      const features: NearestFeature[] = [];
      if (result.target) features.push(targetFeature(result.target));
      features.push({
        type: "Feature",
        geometry: {
          type: "LineString",
          coordinates: buildDirectedCoords(result.edges, result.startNodeId),
        },
        properties: { type: "route", distance_msg: result.message },
      });
      return { type: "FeatureCollection", features, _meta: { mode: "network" } };
    }

    case "straight-line": {
      const [from, to] = result.line;
      return {
        type: "FeatureCollection",
        features: [
          targetFeature(result.target),
          {
            type: "Feature",
            geometry: {
              type: "LineString",
              coordinates: [
                [from.lng, from.lat],
                [to.lng, to.lat],
              ],
            },
            properties: { type: "route", style: "dashed", distance_msg: result.message },
          },
        ],
        _meta: { mode: "straight-line" },
      };
    }
  }
}

/**
 * Convert a point-to-point route into one feature per traversed edge, each
 * with its stored geometry. Unnamed edges are labelled "Road".
 */
export function routeEdgesToGeoJson(
  result: NetworkRoute | EmptyRoute
): RouteFeatureCollection<RouteEdgeFeature> {
  if (result.mode === "empty") {
    return {
      type: "FeatureCollection",
      features: [],
      _meta: { mode: "empty", reason: result.reason },
    };
  }

  const features: RouteEdgeFeature[] = [];
  for (const edge of result.edges) {
    if (!edge.geometry) continue;
    features.push({
      type: "Feature",
      geometry: edge.geometry,
      properties: { id: edge.id, name: edge.name ?? UNNAMED_ROAD },
    });
  }
  return { type: "FeatureCollection", features, _meta: { mode: "network" } };
}
