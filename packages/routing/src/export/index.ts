export {
  routeResultToGeoJson,
  routeEdgesToGeoJson,
  buildDirectedCoords,
  UNNAMED_ROAD,
  type RouteFeatureCollection,
  type RouteMeta,
  type NearestFeature,
  type RouteEdgeFeature,
  type RouteEdgeProperties,
  type RouteLineProperties,
  type TargetPointProperties,
} from "./route-geojson.js";
