/**
 * Non-road features of the street database.
 */

import type { MultiPolygon, Polygon } from "geojson";
import type { Coordinate } from "./geo.js";

/** A point of interest (bank, hospital, school, ...) */
export interface PointFeature {
  id: number;
  name: string;
  /** Facility category; opaque to the routing core */
  category: string;
  coordinate: Coordinate;
}

/** An administrative sub-district (LCDA) polygon */
export interface DistrictFeature {
  id: number;
  name: string;
  geometry: Polygon | MultiPolygon;
}

/** An outline of the whole project area */
export interface BoundaryFeature {
  id: number;
  properties: Record<string, unknown>;
  geometry: Polygon | MultiPolygon;
}
