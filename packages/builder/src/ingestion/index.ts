/**
 * Data ingestion module.
 *
 * Loads a dataset described by a manifest into a GeoStore.
 *
 * Pipeline:
 * Points -> Districts -> Boundary -> Roads -> Topology -> GeoStore
 */

import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { GeoStore } from "../storage/geo-store.js";
import {
  buildTopology,
  DEFAULT_COORDINATE_PRECISION,
  type TopologyBuildStats,
} from "../topology/topology-builder.js";
import {
  readFeatureCollection,
  toBoundary,
  toDistricts,
  toLineFeatures,
  toPointFeatures,
} from "./geojson-reader.js";
import { loadManifest, type DatasetManifest } from "./manifest.js";

export { DatasetReadError } from "./errors.js";
export {
  readFeatureCollection,
  normalizeProperties,
  toLineFeatures,
  toPointFeatures,
  toDistricts,
  toBoundary,
  type PointConversion,
} from "./geojson-reader.js";
export { datasetManifestSchema, loadManifest, type DatasetManifest } from "./manifest.js";

/** Options for dataset ingestion */
export interface IngestionOptions {
  /** Directory that manifest file paths are relative to */
  baseDir: string;
}

/** Result of ingestion */
export interface IngestionResult {
  /** Point counts by category */
  pointsByCategory: Record<string, number>;
  /** Point features dropped for lacking a usable geometry */
  pointsSkipped: number;
  districts: number;
  boundaryFeatures: number;
  /** Topology statistics, or null when no roads file was ingested */
  topology: TopologyBuildStats | null;
  /** Manifest entries whose file was not found */
  missingFiles: string[];
  ingestionTimeMs: number;
}

/**
 * Ingest a dataset into the store.
 *
 * Missing files are reported and skipped. A roads file that exists but
 * cannot be read is fatal, since the network would be silently empty.
 *
 * @param manifest - Which files to load
 * @param store - Destination store, opened for writing
 */
export function ingestDataset(
  manifest: DatasetManifest,
  store: GeoStore,
  options: IngestionOptions,
): IngestionResult {
  const startTime = Date.now();
  const missingFiles: string[] = [];
  const locate = (file: string): string | null => {
    const path = resolve(options.baseDir, file);
    if (existsSync(path)) return path;
    console.warn(`[ingest] File missing: ${path}`);
    missingFiles.push(file);
    return null;
  };

  // Points of interest
  const pointsByCategory: Record<string, number> = {};
  let pointsSkipped = 0;
  let firstPoints = true;
  for (const entry of manifest.points) {
    const path = locate(entry.file);
    if (!path) continue;
    const { features, skipped } = toPointFeatures(readFeatureCollection(path), entry.category);
    store.writePointFeatures(features, firstPoints ? "replace" : "append");
    firstPoints = false;
    pointsByCategory[entry.category] = (pointsByCategory[entry.category] ?? 0) + features.length;
    pointsSkipped += skipped;
    console.log(`[ingest] Added ${features.length} ${entry.category} point(s)`);
  }

  // Sub-districts
  let districts = 0;
  let firstDistricts = true;
  for (const entry of manifest.districts) {
    const path = locate(entry.file);
    if (!path) continue;
    const features = toDistricts(readFeatureCollection(path), entry.name);
    store.writeDistricts(features, firstDistricts ? "replace" : "append");
    firstDistricts = false;
    districts += features.length;
    console.log(`[ingest] Added district ${entry.name} (${features.length} polygon(s))`);
  }

  // Project boundary
  let boundaryFeatures = 0;
  const boundaryPath = manifest.boundary ? locate(manifest.boundary) : null;
  if (boundaryPath) {
    const features = toBoundary(readFeatureCollection(boundaryPath));
    store.writeBoundary(features);
    boundaryFeatures = features.length;
    console.log(`[ingest] Added project boundary (${features.length} polygon(s))`);
  }

  // Road network
  let topologyStats: TopologyBuildStats | null = null;
  const roadsPath = manifest.roads ? locate(manifest.roads) : null;
  if (roadsPath) {
    const lines = toLineFeatures(readFeatureCollection(roadsPath));
    const { topology, stats } = buildTopology(lines, {
      coordinatePrecision: manifest.coordinatePrecision ?? DEFAULT_COORDINATE_PRECISION,
    });
    store.writeTopology(topology);
    topologyStats = stats;
    console.log(
      `[ingest] Topology: ${stats.nodesCount} nodes, ${stats.edgesCount} edges ` +
        `(${stats.excludedEdges} excluded, ${stats.selfLoops} self-loops), ` +
        `${(stats.totalLengthMeters / 1000).toFixed(1)} km`,
    );
  }

  return {
    pointsByCategory,
    pointsSkipped,
    districts,
    boundaryFeatures,
    topology: topologyStats,
    missingFiles,
    ingestionTimeMs: Date.now() - startTime,
  };
}

/**
 * Ingest the dataset described by a manifest file.
 * Paths inside the manifest are relative to the manifest's directory.
 */
export function ingestFromManifest(manifestPath: string, store: GeoStore): IngestionResult {
  const manifest = loadManifest(manifestPath);
  return ingestDataset(manifest, store, { baseDir: dirname(resolve(manifestPath)) });
}
