// Base
export {
  BaseClient,
  ApiError,
  toApiError,
  type ClientConfig,
  type RequestParams,
} from "./baseClient.js";

// Domain clients
export { HealthClient } from "./healthClient.js";
export { FeatureClient } from "./featureClient.js";
export { LayerClient } from "./layerClient.js";
export { RouteClient } from "./routeClient.js";
export { StatsClient } from "./statsClient.js";

// Types
export type {
  // Requests
  PointRequest,
  RouteRequest,
  BufferRequest,
  NearestRequest,
  // Health
  NetworkStats,
  HealthResponse,
  // Features and layers
  PoiProperties,
  NamedProperties,
  PoiCollection,
  DistrictCollection,
  RoadCollection,
  BoundaryCollection,
  SearchResult,
  // Routing
  RouteMode,
  EmptyRouteReason,
  RouteMeta,
  RouteEdgeFeature,
  TargetPointFeature,
  RouteLineFeature,
  RouteResponse,
  NearestResponse,
  // Statistics
  PoiStat,
  StatsResponse,
  PoiItem,
  LcdaPoiStat,
  LcdaStatsResponse,
  // Errors
  ErrorResponse,
} from "./types.js";
