/**
 * Read-only road graph built once from a persisted Topology.
 *
 * The topology's edges are undirected: each routable edge is indexed from
 * both endpoints, costed by `cost` forward (source -> target) and by
 * `reverseCost` backward. Edges without endpoints, and edges that point at
 * nodes missing from the node set, are left out of the index.
 *
 * Instances are frozen after construction so they can be shared across
 * concurrent requests.
 */

import type { ConnectedEdge, Topology, TopologyNode } from "@street-guide/types";
import { isConnectedEdge } from "@street-guide/types";

/** One traversable direction of an edge */
export interface GraphLink {
  edgeId: number;
  /** Node reached by following the link */
  toNodeId: number;
  cost: number;
}

/** Counts describing what the graph kept and what it left out */
export interface RoadGraphStats {
  nodesCount: number;
  /** Edges taking part in search */
  edgesCount: number;
  /** Edges with no geometry */
  excludedEdges: number;
  /** Edges referencing a node id that is not in the node set */
  danglingEdges: number;
}

export class RoadGraph {
  readonly nodes: ReadonlyMap<number, TopologyNode>;
  readonly edges: ReadonlyMap<number, ConnectedEdge>;
  readonly stats: RoadGraphStats;
  private readonly adjacency: ReadonlyMap<number, readonly GraphLink[]>;

  constructor(topology: Topology) {
    const nodes = new Map<number, TopologyNode>();
    for (const node of topology.nodes) {
      nodes.set(node.id, Object.freeze({ ...node, coordinate: Object.freeze({ ...node.coordinate }) }));
    }

    const edges = new Map<number, ConnectedEdge>();
    const adjacency = new Map<number, GraphLink[]>();
    let excludedEdges = 0;
    let danglingEdges = 0;

    const addLink = (fromNodeId: number, link: GraphLink): void => {
      const existing = adjacency.get(fromNodeId);
      if (existing) {
        existing.push(link);
      } else {
        adjacency.set(fromNodeId, [link]);
      }
    };

    for (const edge of topology.edges) {
      if (!isConnectedEdge(edge)) {
        excludedEdges++;
        continue;
      }
      if (!nodes.has(edge.source) || !nodes.has(edge.target)) {
        danglingEdges++;
        continue;
      }

      edges.set(edge.id, Object.freeze({ ...edge }));
      addLink(edge.source, { edgeId: edge.id, toNodeId: edge.target, cost: edge.cost });
      if (edge.source !== edge.target) {
        addLink(edge.target, { edgeId: edge.id, toNodeId: edge.source, cost: edge.reverseCost });
      }
    }

    for (const links of adjacency.values()) Object.freeze(links);

    this.nodes = nodes;
    this.edges = edges;
    this.adjacency = adjacency;
    this.stats = Object.freeze({
      nodesCount: nodes.size,
      edgesCount: edges.size,
      excludedEdges,
      danglingEdges,
    });
    Object.freeze(this);
  }

  /** Links leaving a node, in edge input order */
  linksFrom(nodeId: number): readonly GraphLink[] {
    return this.adjacency.get(nodeId) ?? [];
  }

  getNode(nodeId: number): TopologyNode | undefined {
    return this.nodes.get(nodeId);
  }

  getEdge(edgeId: number): ConnectedEdge | undefined {
    return this.edges.get(edgeId);
  }
}
