export { RoadGraph } from "./road-graph.js";
export type { GraphLink, RoadGraphStats } from "./road-graph.js";
export { VertexIndex } from "./vertex-index.js";
export type { VertexSnap } from "./vertex-index.js";
