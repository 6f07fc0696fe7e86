/**
 * Path search over the road graph.
 */

export { findShortestPath, pathCost } from "./shortest-path.js";
export { MinHeap } from "./min-heap.js";
