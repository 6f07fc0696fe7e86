/**
 * Grid-based spatial index for snapping coordinates to graph vertices.
 *
 * Uses square grid cells with a flat-earth approximation around the mean
 * latitude of the indexed nodes. Lookups search outward ring by ring from
 * the query's cell and stop once no unvisited cell can hold a closer node.
 */

import type { Coordinate, TopologyNode } from "@street-guide/types";
import { haversineDistance } from "@street-guide/builder";

/** Default grid cell size in meters */
const DEFAULT_CELL_SIZE = 250;

/** Meters per degree of latitude (roughly constant) */
const METERS_PER_DEG_LAT = 111_320;

/** Result of snapping a coordinate to the nearest vertex */
export interface VertexSnap {
  node: TopologyNode;
  /** Geodesic distance from the query coordinate, in meters */
  distanceMeters: number;
}

export class VertexIndex {
  /** cell key -> nodes in that cell, ascending id */
  private readonly grid = new Map<string, TopologyNode[]>();
  private readonly cellSize: number;
  private readonly metersPerDegLng: number;
  private minCellX = Infinity;
  private maxCellX = -Infinity;
  private minCellY = Infinity;
  private maxCellY = -Infinity;
  readonly size: number;

  constructor(nodes: Iterable<TopologyNode>, cellSizeMeters: number = DEFAULT_CELL_SIZE) {
    this.cellSize = cellSizeMeters;
    const list = [...nodes].sort((a, b) => a.id - b.id);
    this.size = list.length;

    // Mid-latitude for lng-to-meters conversion
    let sumLat = 0;
    for (const node of list) sumLat += node.coordinate.lat;
    const midLat = list.length > 0 ? sumLat / list.length : 0;
    this.metersPerDegLng = METERS_PER_DEG_LAT * Math.cos((midLat * Math.PI) / 180);

    for (const node of list) {
      const [cx, cy] = this.cellCoords(node.coordinate);
      this.minCellX = Math.min(this.minCellX, cx);
      this.maxCellX = Math.max(this.maxCellX, cx);
      this.minCellY = Math.min(this.minCellY, cy);
      this.maxCellY = Math.max(this.maxCellY, cy);

      const key = `${cx},${cy}`;
      const cell = this.grid.get(key);
      if (cell) {
        cell.push(node);
      } else {
        this.grid.set(key, [node]);
      }
    }
  }

  /**
   * Nearest vertex to a coordinate, or null when the index is empty.
   * Ties go to the lower node id.
   */
  nearest(coord: Coordinate): VertexSnap | null {
    if (this.size === 0) return null;

    const [cx, cy] = this.cellCoords(coord);
    // Rings closer than this hold no cells at all
    const firstRing = Math.max(
      0,
      this.minCellX - cx,
      cx - this.maxCellX,
      this.minCellY - cy,
      cy - this.maxCellY,
    );
    const lastRing = Math.max(
      Math.abs(cx - this.minCellX),
      Math.abs(cx - this.maxCellX),
      Math.abs(cy - this.minCellY),
      Math.abs(cy - this.maxCellY),
    );

    let best: TopologyNode | null = null;
    let bestId = Infinity;
    let bestDist = Infinity;

    for (let ring = firstRing; ring <= lastRing; ring++) {
      for (const cell of this.ringCells(cx, cy, ring)) {
        for (const node of cell) {
          const dist = this.flatDistance(coord, node.coordinate);
          if (dist < bestDist || (dist === bestDist && node.id < bestId)) {
            best = node;
            bestId = node.id;
            bestDist = dist;
          }
        }
      }
      // Every unvisited node is more than ring * cellSize away
      if (best && bestDist < ring * this.cellSize) break;
    }

    if (!best) return null;
    return { node: best, distanceMeters: haversineDistance(coord, best.coordinate) };
  }

  // ── Internal ──────────────────────────────────────────────────────────

  /** Non-empty cells on the square ring `ring` cells out from (cx, cy) */
  private *ringCells(cx: number, cy: number, ring: number): Generator<TopologyNode[]> {
    // Clip the ring to the grid's extent; cells outside it are always empty
    const xLo = Math.max(-ring, this.minCellX - cx);
    const xHi = Math.min(ring, this.maxCellX - cx);
    const yLo = Math.max(-ring, this.minCellY - cy);
    const yHi = Math.min(ring, this.maxCellY - cy);

    for (let dx = xLo; dx <= xHi; dx++) {
      if (dx === -ring || dx === ring) {
        // Left and right columns span the full height
        for (let dy = yLo; dy <= yHi; dy++) {
          const cell = this.grid.get(`${cx + dx},${cy + dy}`);
          if (cell) yield cell;
        }
        continue;
      }
      // Inner columns touch the ring only at its top and bottom rows
      for (const dy of [-ring, ring]) {
        if (dy < yLo || dy > yHi) continue;
        const cell = this.grid.get(`${cx + dx},${cy + dy}`);
        if (cell) yield cell;
      }
    }
  }

  private cellCoords(coord: Coordinate): [number, number] {
    const mx = coord.lng * this.metersPerDegLng;
    const my = coord.lat * METERS_PER_DEG_LAT;
    return [Math.floor(mx / this.cellSize), Math.floor(my / this.cellSize)];
  }

  private flatDistance(a: Coordinate, b: Coordinate): number {
    const dx = (a.lng - b.lng) * this.metersPerDegLng;
    const dy = (a.lat - b.lat) * METERS_PER_DEG_LAT;
    return Math.sqrt(dx * dx + dy * dy);
  }
}
