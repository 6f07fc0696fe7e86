export {
  haversineDistance,
  calculatePathLength,
  lineParts,
  lineLength,
} from "./distance.js";
export {
  lineGeometrySchema,
  pointGeometrySchema,
  areaGeometrySchema,
  featureCollectionSchema,
  type RawFeatureCollection,
  type RawFeature,
} from "./geometry-schemas.js";
