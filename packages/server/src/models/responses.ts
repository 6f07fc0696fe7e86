import type { Feature, FeatureCollection, LineString, MultiLineString, MultiPolygon, Point, Polygon } from "geojson";

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

export type PoiProperties = { name: string; category: string };
export type NamedProperties = { name: string };

export type PoiCollection = FeatureCollection<Point, PoiProperties>;
export type DistrictCollection = FeatureCollection<Polygon | MultiPolygon, NamedProperties>;
export type RoadCollection = FeatureCollection<LineString | MultiLineString, NamedProperties>;
export type BoundaryCollection = FeatureCollection<Polygon | MultiPolygon>;
export type PoiFeature = Feature<Point, PoiProperties>;

export interface SearchResult {
  name: string;
  category: string;
  lng: number;
  lat: number;
}

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

export interface ErrorResponse {
  message: string;
  details?: unknown;
}
