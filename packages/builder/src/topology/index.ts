export {
  buildTopology,
  roundCoordinate,
  DEFAULT_COORDINATE_PRECISION,
  type TopologyBuildOptions,
  type TopologyBuildStats,
  type TopologyBuildResult,
} from "./topology-builder.js";
