/**
 * Spatial queries over the loaded street network: layers for the map,
 * search, point-in-district lookups and descriptive statistics.
 */

import {
  area,
  booleanIntersects,
  booleanPointInPolygon,
  centroid,
  simplify,
  truncate,
} from "@turf/turf";
import type { Coordinate, DistrictFeature, PointFeature } from "@street-guide/types";
import { positionToCoordinate } from "@street-guide/types";
import { UNNAMED_ROAD } from "@street-guide/routing";
import type { Feature, Point } from "geojson";
import type {
  BoundaryCollection,
  DistrictCollection,
  LcdaPoiStat,
  LcdaStatsResponse,
  PoiCollection,
  PoiFeature,
  PoiStat,
  RoadCollection,
  SearchResult,
  StatsResponse,
} from "../models/responses.js";
import type { StreetNetwork } from "./network.service.js";

/** Roads shorter than this (meters) are left off the map layer */
export const ROADS_LAYER_MIN_LENGTH = 50;
/** Simplification tolerance for the roads layer, in degrees */
export const ROADS_LAYER_TOLERANCE = 0.0001;
/** Decimal digits kept in roads layer coordinates */
export const ROADS_LAYER_PRECISION = 5;
/** Shortest accepted search query */
export const SEARCH_MIN_QUERY_LENGTH = 2;
export const SEARCH_MAX_RESULTS = 10;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function toPoiFeature(point: PointFeature): PoiFeature {
  return {
    type: "Feature",
    geometry: { type: "Point", coordinates: [point.coordinate.lng, point.coordinate.lat] },
    properties: { name: point.name, category: point.category },
  };
}

function toPoiCollection(points: PointFeature[]): PoiCollection {
  return { type: "FeatureCollection", features: points.map(toPoiFeature) };
}

function toDistrictCollection(districts: readonly DistrictFeature[]): DistrictCollection {
  return {
    type: "FeatureCollection",
    features: districts.map((d) => ({
      type: "Feature",
      geometry: d.geometry,
      properties: { name: d.name },
    })),
  };
}

function centroidOf(feature: Feature<Point>): Coordinate {
  return positionToCoordinate(feature.geometry.coordinates);
}

/** Group points by category, in first-seen order */
function groupByCategory(points: readonly PointFeature[]): Map<string, PointFeature[]> {
  const groups = new Map<string, PointFeature[]>();
  for (const point of points) {
    const group = groups.get(point.category);
    if (group) {
      group.push(point);
    } else {
      groups.set(point.category, [point]);
    }
  }
  return groups;
}

export class GeoQueryService {
  constructor(private readonly network: StreetNetwork) {}

  /** Points whose category contains `category`, case-insensitively */
  featuresByCategory(category: string): PoiCollection {
    return toPoiCollection(this.network.facilities.byCategory(category));
  }

  /** Points within `distance` meters of a location, nearest first */
  buffer(location: Coordinate, distance: number): PoiCollection {
    return toPoiCollection(
      this.network.facilities.within(location, distance).map((m) => m.feature)
    );
  }

  lcdas(): DistrictCollection {
    return toDistrictCollection(this.network.districts);
  }

  /** Roads for the base map: short segments dropped, shapes simplified */
  roadsLayer(): RoadCollection {
    const collection: RoadCollection = { type: "FeatureCollection", features: [] };
    for (const road of this.network.roads) {
      if (!road.geometry || road.cost <= ROADS_LAYER_MIN_LENGTH) continue;
      const geometry = truncate(simplify(road.geometry, { tolerance: ROADS_LAYER_TOLERANCE }), {
        precision: ROADS_LAYER_PRECISION,
      });
      collection.features.push({
        type: "Feature",
        geometry,
        properties: { name: road.name ?? UNNAMED_ROAD },
      });
    }
    return collection;
  }

  boundary(): BoundaryCollection {
    return {
      type: "FeatureCollection",
      features: this.network.boundary.map((b) => ({
        type: "Feature",
        geometry: b.geometry,
        properties: { ...b.properties },
      })),
    };
  }

  /**
   * Name search across points, roads and districts, in that order.
   * Queries shorter than two characters return nothing.
   */
  search(query: string): SearchResult[] {
    if (query.length < SEARCH_MIN_QUERY_LENGTH) return [];
    const needle = query.toLowerCase();
    const matches = (name: string | undefined): name is string =>
      name !== undefined && name.toLowerCase().includes(needle);

    const results: SearchResult[] = [];
    const add = (result: SearchResult): boolean => {
      results.push(result);
      return results.length >= SEARCH_MAX_RESULTS;
    };

    for (const point of this.network.facilities.all()) {
      if (!matches(point.name)) continue;
      if (add({ name: point.name, category: point.category, ...point.coordinate })) return results;
    }
    for (const road of this.network.roads) {
      if (!road.geometry || !matches(road.name)) continue;
      const center = centroidOf(centroid(road.geometry));
      if (add({ name: road.name, category: "Road", lng: center.lng, lat: center.lat })) {
        return results;
      }
    }
    for (const district of this.network.districts) {
      if (!matches(district.name)) continue;
      const center = centroidOf(centroid(district.geometry));
      if (add({ name: district.name, category: "District", lng: center.lng, lat: center.lat })) {
        return results;
      }
    }
    return results;
  }

  /** Districts containing a location (boundary included) */
  identify(location: Coordinate): DistrictCollection {
    const point = [location.lng, location.lat];
    return toDistrictCollection(
      this.network.districts.filter((d) => booleanPointInPolygon(point, d.geometry))
    );
  }

  stats(): StatsResponse {
    const poiStats: PoiStat[] = [...groupByCategory(this.network.facilities.all())]
      .map(([label, points]) => ({ label, value: points.length }))
      .sort((a, b) => b.value - a.value || a.label.localeCompare(b.label));

    let roadMeters = 0;
    for (const road of this.network.roads) roadMeters += road.cost;

    let areaSquareMeters = 0;
    for (const district of this.network.districts) areaSquareMeters += area(district.geometry);

    return {
      poi_stats: poiStats,
      total_road_km: round2(roadMeters / 1000),
      total_area_sqkm: round2(areaSquareMeters / 1_000_000),
    };
  }

  /**
   * Statistics for one district, matched by exact name. An unknown name
   * yields zero counts rather than an error.
   */
  lcdaStats(name: string): LcdaStatsResponse {
    const polygons = this.network.districts.filter((d) => d.name === name);
    const first = polygons[0];

    const roads = this.network.roads.filter((road) => {
      const geometry = road.geometry;
      return geometry !== null && polygons.some((d) => booleanIntersects(geometry, d.geometry));
    });
    let longest = roads[0];
    for (const road of roads) {
      if (longest && road.cost > longest.cost) longest = road;
    }

    const inside = this.network.facilities
      .all()
      .filter((p) =>
        polygons.some((d) => booleanPointInPolygon([p.coordinate.lng, p.coordinate.lat], d.geometry))
      );
    const poiStats: LcdaPoiStat[] = [...groupByCategory(inside)]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([label, points]) => ({
        label,
        value: points.length,
        items: points.map((p) => ({ name: p.name, lat: p.coordinate.lat, lng: p.coordinate.lng })),
      }));

    return {
      lcda_name: name,
      area_sqkm: round2(first ? area(first.geometry) / 1_000_000 : 0),
      road_count: roads.length,
      longest_road: `${longest?.name ?? "None"} (${Math.round(longest?.cost ?? 0)}m)`,
      poi_stats: poiStats,
    };
  }
}
