export {
  GeoStore,
  type GeoStoreOptions,
  type WriteMode,
  type NewPointFeature,
  type NewDistrictFeature,
  type NewBoundaryFeature,
} from "./geo-store.js";
