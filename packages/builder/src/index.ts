/**
 * @street-guide/builder
 *
 * Turns a street dataset into a persisted, routable database.
 *
 * Pipeline:
 * 1. Read the dataset manifest and its GeoJSON files
 * 2. Store points of interest, sub-districts and the project boundary
 * 3. Build the road topology (nodes + costed edges)
 * 4. Persist the topology alongside the other layers
 *
 * Routing over the stored topology lives in @street-guide/routing.
 */

// Geodesy
export {
  haversineDistance,
  calculatePathLength,
  lineParts,
  lineLength,
  lineGeometrySchema,
  pointGeometrySchema,
  areaGeometrySchema,
  featureCollectionSchema,
  type RawFeatureCollection,
  type RawFeature,
} from "./geo/index.js";

// Topology
export {
  buildTopology,
  roundCoordinate,
  DEFAULT_COORDINATE_PRECISION,
  type TopologyBuildOptions,
  type TopologyBuildStats,
  type TopologyBuildResult,
} from "./topology/index.js";

// Ingestion
export {
  ingestDataset,
  ingestFromManifest,
  DatasetReadError,
  readFeatureCollection,
  normalizeProperties,
  toLineFeatures,
  toPointFeatures,
  toDistricts,
  toBoundary,
  datasetManifestSchema,
  loadManifest,
  type DatasetManifest,
  type IngestionOptions,
  type IngestionResult,
  type PointConversion,
} from "./ingestion/index.js";

// Storage
export {
  GeoStore,
  type GeoStoreOptions,
  type WriteMode,
  type NewPointFeature,
  type NewDistrictFeature,
  type NewBoundaryFeature,
} from "./storage/index.js";
