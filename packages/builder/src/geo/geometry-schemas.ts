/**
 * zod schemas for the GeoJSON geometries the street database stores.
 *
 * Used both when reading dataset files and when reading geometry text
 * back out of SQLite.
 */

import { z } from "zod";

const position = z.array(z.number().finite()).min(2);

export const lineStringSchema = z.object({
  type: z.literal("LineString"),
  coordinates: z.array(position),
});

export const multiLineStringSchema = z.object({
  type: z.literal("MultiLineString"),
  coordinates: z.array(z.array(position)),
});

export const lineGeometrySchema = z.discriminatedUnion("type", [
  lineStringSchema,
  multiLineStringSchema,
]);

export const pointGeometrySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Point"), coordinates: position }),
  z.object({ type: z.literal("MultiPoint"), coordinates: z.array(position) }),
]);

export const areaGeometrySchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("Polygon"),
    coordinates: z.array(z.array(position)),
  }),
  z.object({
    type: z.literal("MultiPolygon"),
    coordinates: z.array(z.array(z.array(position))),
  }),
]);

export const featureCollectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(
    z.object({
      type: z.literal("Feature"),
      geometry: z.unknown(),
      properties: z.record(z.unknown()).nullable().optional(),
    })
  ),
});

export type RawFeatureCollection = z.infer<typeof featureCollectionSchema>;
export type RawFeature = RawFeatureCollection["features"][number];
