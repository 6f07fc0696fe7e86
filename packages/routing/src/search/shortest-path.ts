/**
 * Least-cost path search over a RoadGraph.
 *
 * Dijkstra with a binary heap. Queue entries are ordered by accumulated cost
 * and then by node id, and a node's predecessor is only replaced by a
 * strictly cheaper path, so equal-cost alternatives resolve the same way on
 * every run.
 */

import type { ConnectedEdge } from "@street-guide/types";
import type { RoadGraph } from "../graph/index.js";
import { MinHeap } from "./min-heap.js";

interface QueueEntry {
  nodeId: number;
  cost: number;
}

interface Predecessor {
  nodeId: number;
  edgeId: number;
}

/**
 * Find the least-cost path between two nodes.
 *
 * @returns Edges in traversal order; `[]` when start and end are the same
 *          node; `null` when no path exists or either node is unknown
 */
export function findShortestPath(
  graph: RoadGraph,
  startNodeId: number,
  endNodeId: number
): ConnectedEdge[] | null {
  if (!graph.getNode(startNodeId) || !graph.getNode(endNodeId)) return null;
  if (startNodeId === endNodeId) return [];

  const best = new Map<number, number>([[startNodeId, 0]]);
  const previous = new Map<number, Predecessor>();
  const settled = new Set<number>();
  const queue = new MinHeap<QueueEntry>((a, b) => a.cost - b.cost || a.nodeId - b.nodeId);
  queue.push({ nodeId: startNodeId, cost: 0 });

  for (let entry = queue.pop(); entry !== undefined; entry = queue.pop()) {
    const { nodeId, cost } = entry;
    if (settled.has(nodeId)) continue;
    settled.add(nodeId);
    if (nodeId === endNodeId) break;

    for (const link of graph.linksFrom(nodeId)) {
      if (settled.has(link.toNodeId)) continue;
      const candidate = cost + link.cost;
      const known = best.get(link.toNodeId);
      if (known === undefined || candidate < known) {
        best.set(link.toNodeId, candidate);
        previous.set(link.toNodeId, { nodeId, edgeId: link.edgeId });
        queue.push({ nodeId: link.toNodeId, cost: candidate });
      }
    }
  }

  if (!settled.has(endNodeId)) return null;

  // Walk predecessors back from the end node
  const path: ConnectedEdge[] = [];
  let current = endNodeId;
  while (current !== startNodeId) {
    const step = previous.get(current);
    const edge = step && graph.getEdge(step.edgeId);
    if (!step || !edge) return null;
    path.push(edge);
    current = step.nodeId;
  }
  return path.reverse();
}

/** Sum of forward costs along a path */
export function pathCost(edges: readonly ConnectedEdge[]): number {
  let total = 0;
  for (const edge of edges) total += edge.cost;
  return total;
}
