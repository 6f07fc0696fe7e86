/**
 * Dataset manifest: which GeoJSON files make up the street database.
 *
 * Example:
 * {
 *   "roads": "roads.geojson",
 *   "boundary": "boundary.geojson",
 *   "points": [{ "file": "bank.geojson", "category": "Bank" }],
 *   "districts": [{ "file": "surulere.geojson", "name": "Surulere" }],
 *   "coordinatePrecision": 6
 * }
 *
 * File paths are resolved relative to the manifest's directory.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { DatasetReadError } from "./errors.js";

export const datasetManifestSchema = z.object({
  roads: z.string().min(1).optional(),
  boundary: z.string().min(1).optional(),
  points: z
    .array(z.object({ file: z.string().min(1), category: z.string().min(1) }))
    .default([]),
  districts: z
    .array(z.object({ file: z.string().min(1), name: z.string().min(1) }))
    .default([]),
  coordinatePrecision: z.number().int().min(0).max(15).optional(),
});

export type DatasetManifest = z.infer<typeof datasetManifestSchema>;

export function loadManifest(filePath: string): DatasetManifest {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new DatasetReadError(filePath, err instanceof Error ? err.message : String(err));
  }

  const parsed = datasetManifestSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new DatasetReadError(filePath, `invalid manifest (${issues})`);
  }
  return parsed.data;
}
