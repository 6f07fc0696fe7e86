/**
 * API request/response types for the Street Guide server.
 *
 * These mirror the server's models so the client has no server dependency.
 */

import type {
  Feature,
  FeatureCollection,
  LineString,
  MultiLineString,
  MultiPolygon,
  Point,
  Polygon,
} from "geojson";

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface PointRequest {
  lat: number;
  lng: number;
}

export interface RouteRequest {
  start_lat: number;
  start_lng: number;
  end_lat: number;
  end_lng: number;
}

export interface BufferRequest extends PointRequest {
  /** Radius in meters */
  distance: number;
}

export interface NearestRequest extends PointRequest {
  category: string;
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface NetworkStats {
  nodes: number;
  edges: number;
  facilities: number;
  districts: number;
}

export interface HealthResponse {
  status: "ok";
  uptime: number;
  network: NetworkStats;
}

// ---------------------------------------------------------------------------
// Features and layers
// ---------------------------------------------------------------------------

export type PoiProperties = { name: string; category: string };
export type NamedProperties = { name: string };

export type PoiCollection = FeatureCollection<Point, PoiProperties>;
export type DistrictCollection = FeatureCollection<Polygon | MultiPolygon, NamedProperties>;
export type RoadCollection = FeatureCollection<LineString | MultiLineString, NamedProperties>;
export type BoundaryCollection = FeatureCollection<Polygon | MultiPolygon>;

export interface SearchResult {
  name: string;
  category: string;
  lng: number;
  lat: number;
}

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

export type RouteMode = "network" | "straight-line" | "empty";
export type EmptyRouteReason = "no-vertex" | "no-path" | "no-facility";

export interface RouteMeta {
  mode: RouteMode;
  reason?: EmptyRouteReason;
}

export type RouteEdgeFeature = Feature<LineString | MultiLineString, { id: number; name: string }>;

export type TargetPointFeature = Feature<
  Point,
  { name: string; category: string; is_target: true }
>;

export type RouteLineFeature = Feature<
  LineString,
  { type: "route"; distance_msg: string; style?: "dashed" }
>;

export interface RouteResponse {
  type: "FeatureCollection";
  features: RouteEdgeFeature[];
  _meta: RouteMeta;
}

export interface NearestResponse {
  type: "FeatureCollection";
  features: (TargetPointFeature | RouteLineFeature)[];
  _meta: RouteMeta;
}

// ---------------------------------------------------------------------------
// Statistics
// ---------------------------------------------------------------------------

export interface PoiStat {
  label: string;
  value: number;
}

export interface StatsResponse {
  poi_stats: PoiStat[];
  total_road_km: number;
  total_area_sqkm: number;
}

export interface PoiItem {
  name: string;
  lat: number;
  lng: number;
}

export interface LcdaPoiStat extends PoiStat {
  items: PoiItem[];
}

export interface LcdaStatsResponse {
  lcda_name: string;
  area_sqkm: number;
  road_count: number;
  longest_road: string;
  poi_stats: LcdaPoiStat[];
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  message: string;
  details?: unknown;
}
