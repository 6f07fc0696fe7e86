/**
 * GeoJSON dataset readers.
 *
 * Dataset files are RFC 7946 FeatureCollections (WGS84 lng/lat). A file
 * that cannot be parsed as a whole raises DatasetReadError; a malformed
 * feature inside a readable file never does.
 */

import { readFileSync } from "node:fs";
import type {
  Coordinate,
  LineFeature,
  BoundaryFeature,
  DistrictFeature,
  PointFeature,
} from "@street-guide/types";
import { positionToCoordinate } from "@street-guide/types";
import {
  areaGeometrySchema,
  featureCollectionSchema,
  lineGeometrySchema,
  pointGeometrySchema,
  type RawFeature,
  type RawFeatureCollection,
} from "../geo/index.js";
import { DatasetReadError } from "./errors.js";

/** Property keys tried, in order, for a point of interest's name */
const POINT_NAME_KEYS = ["actual_nam", "actual_name", "name"] as const;

/** Property key holding a road's name */
const ROAD_NAME_KEY = "roadname";

/**
 * Read and validate a GeoJSON FeatureCollection file.
 */
export function readFeatureCollection(filePath: string): RawFeatureCollection {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new DatasetReadError(filePath, err instanceof Error ? err.message : String(err));
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new DatasetReadError(filePath, err instanceof Error ? err.message : String(err));
  }

  const parsed = featureCollectionSchema.safeParse(json);
  if (!parsed.success) {
    throw new DatasetReadError(filePath, "not a GeoJSON FeatureCollection");
  }
  return parsed.data;
}

/**
 * Property keys lower-cased, so ROADNAME, RoadName and roadname all match.
 */
export function normalizeProperties(feature: RawFeature): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(feature.properties ?? {})) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

function stringProperty(props: Record<string, unknown>, key: string): string | undefined {
  const value = props[key];
  if (typeof value === "string" && value.trim() !== "") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

/**
 * Convert road features to LineFeatures, one per input feature.
 *
 * Features whose geometry is missing or is not a valid line are kept with
 * a null geometry, so the topology still accounts for them.
 */
export function toLineFeatures(collection: RawFeatureCollection): LineFeature[] {
  return collection.features.map((feature) => {
    const parsed = lineGeometrySchema.safeParse(feature.geometry);
    const name = stringProperty(normalizeProperties(feature), ROAD_NAME_KEY);
    return {
      geometry: parsed.success ? parsed.data : null,
      properties: name === undefined ? {} : { name },
    };
  });
}

/** Result of converting point features; skipped features are counted */
export interface PointConversion {
  features: Omit<PointFeature, "id">[];
  skipped: number;
}

/**
 * Convert point features of one category.
 *
 * Multi-points use their first point. Features without a usable point
 * geometry are skipped and counted.
 */
export function toPointFeatures(
  collection: RawFeatureCollection,
  category: string,
): PointConversion {
  const features: Omit<PointFeature, "id">[] = [];
  let skipped = 0;

  for (const feature of collection.features) {
    const parsed = pointGeometrySchema.safeParse(feature.geometry);
    let coordinate: Coordinate | undefined;
    if (parsed.success) {
      const position =
        parsed.data.type === "Point" ? parsed.data.coordinates : parsed.data.coordinates[0];
      coordinate = position ? positionToCoordinate(position) : undefined;
    }
    if (!coordinate) {
      skipped++;
      continue;
    }

    const props = normalizeProperties(feature);
    let name: string | undefined;
    for (const key of POINT_NAME_KEYS) {
      name = stringProperty(props, key);
      if (name !== undefined) break;
    }

    features.push({
      name: name ?? `${category} (Unknown)`,
      category,
      coordinate,
    });
  }

  return { features, skipped };
}

/** Convert the polygons of one sub-district file, all named after the district */
export function toDistricts(
  collection: RawFeatureCollection,
  name: string,
): Omit<DistrictFeature, "id">[] {
  const districts: Omit<DistrictFeature, "id">[] = [];
  for (const feature of collection.features) {
    const parsed = areaGeometrySchema.safeParse(feature.geometry);
    if (parsed.success) districts.push({ name, geometry: parsed.data });
  }
  return districts;
}

/** Convert the project boundary polygons, keeping their properties */
export function toBoundary(collection: RawFeatureCollection): Omit<BoundaryFeature, "id">[] {
  const boundary: Omit<BoundaryFeature, "id">[] = [];
  for (const feature of collection.features) {
    const parsed = areaGeometrySchema.safeParse(feature.geometry);
    if (parsed.success) {
      boundary.push({ properties: { ...(feature.properties ?? {}) }, geometry: parsed.data });
    }
  }
  return boundary;
}
