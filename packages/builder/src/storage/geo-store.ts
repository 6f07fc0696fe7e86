/**
 * SQLite persistence for the street database.
 *
 * Tables:
 *   roads_vertices: topology nodes (id, lng, lat)
 *   roads         : topology edges (id, name, source, target, cost,
 *                    reverse_cost, geom); source/target reference
 *                    roads_vertices
 *   point_features: points of interest (name, category, lng, lat)
 *   lcda_polygons : sub-district polygons (name, geom)
 *   boundary      : project area outline (properties, geom)
 *
 * Geometries are stored as GeoJSON text.
 */

import Database from "better-sqlite3";
import type {
  BoundaryFeature,
  DistrictFeature,
  PointFeature,
  Topology,
  TopologyEdge,
  TopologyNode,
} from "@street-guide/types";
import type { MultiPolygon, Polygon } from "geojson";
import { areaGeometrySchema, lineGeometrySchema } from "../geo/index.js";

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

interface VertexRow {
  id: number;
  lng: number;
  lat: number;
}

interface RoadRow {
  id: number;
  name: string | null;
  source: number | null;
  target: number | null;
  cost: number;
  reverse_cost: number;
  geom: string | null;
}

interface PointRow {
  id: number;
  name: string;
  category: string;
  lng: number;
  lat: number;
}

interface DistrictRow {
  id: number;
  name: string;
  geom: string;
}

interface BoundaryRow {
  id: number;
  properties: string;
  geom: string;
}

/** A point of interest before it has been assigned a row id */
export type NewPointFeature = Omit<PointFeature, "id">;

/** A sub-district polygon before it has been assigned a row id */
export type NewDistrictFeature = Omit<DistrictFeature, "id">;

/** A boundary polygon before it has been assigned a row id */
export type NewBoundaryFeature = Omit<BoundaryFeature, "id">;

export interface GeoStoreOptions {
  /** Path to the SQLite database file (":memory:" for an in-memory store) */
  filePath: string;
  /** Open an existing database without write access */
  readonly?: boolean;
}

/** How a batch of rows is written: replacing the table, or appended to it */
export type WriteMode = "replace" | "append";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS roads_vertices (
    id INTEGER PRIMARY KEY,
    lng REAL NOT NULL,
    lat REAL NOT NULL
  );
  CREATE TABLE IF NOT EXISTS roads (
    id INTEGER PRIMARY KEY,
    name TEXT,
    source INTEGER REFERENCES roads_vertices(id),
    target INTEGER REFERENCES roads_vertices(id),
    cost REAL NOT NULL,
    reverse_cost REAL NOT NULL,
    geom TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_roads_source ON roads(source);
  CREATE INDEX IF NOT EXISTS idx_roads_target ON roads(target);
  CREATE TABLE IF NOT EXISTS point_features (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    category TEXT NOT NULL,
    lng REAL NOT NULL,
    lat REAL NOT NULL
  );
  CREATE TABLE IF NOT EXISTS lcda_polygons (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    geom TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS boundary (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    properties TEXT NOT NULL,
    geom TEXT NOT NULL
  );
`;

export class GeoStore {
  private readonly db: Database.Database;

  constructor(options: GeoStoreOptions) {
    this.db = options.readonly
      ? new Database(options.filePath, { readonly: true, fileMustExist: true })
      : new Database(options.filePath);
    this.db.pragma("foreign_keys = ON");
    if (!options.readonly) {
      this.db.exec(SCHEMA);
    }
  }

  // ── Writers ───────────────────────────────────────────────────────────

  /**
   * Replace the node and edge tables with a freshly built topology.
   * Both tables are written in one transaction so they never disagree.
   */
  writeTopology(topology: Topology): void {
    const insertVertex = this.db.prepare<[number, number, number]>(
      "INSERT INTO roads_vertices (id, lng, lat) VALUES (?, ?, ?)"
    );
    const insertRoad = this.db.prepare<
      [number, string | null, number | null, number | null, number, number, string | null]
    >(
      `INSERT INTO roads (id, name, source, target, cost, reverse_cost, geom)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    );

    const write = this.db.transaction((t: Topology) => {
      this.db.exec("DELETE FROM roads; DELETE FROM roads_vertices;");
      for (const node of t.nodes) {
        insertVertex.run(node.id, node.coordinate.lng, node.coordinate.lat);
      }
      for (const edge of t.edges) {
        insertRoad.run(
          edge.id,
          edge.name ?? null,
          edge.source,
          edge.target,
          edge.cost,
          edge.reverseCost,
          edge.geometry ? JSON.stringify(edge.geometry) : null
        );
      }
    });
    write(topology);
  }

  writePointFeatures(features: NewPointFeature[], mode: WriteMode = "append"): void {
    const insert = this.db.prepare<[string, string, number, number]>(
      "INSERT INTO point_features (name, category, lng, lat) VALUES (?, ?, ?, ?)"
    );
    const write = this.db.transaction((rows: NewPointFeature[]) => {
      if (mode === "replace") this.db.exec("DELETE FROM point_features");
      for (const f of rows) {
        insert.run(f.name, f.category, f.coordinate.lng, f.coordinate.lat);
      }
    });
    write(features);
  }

  writeDistricts(features: NewDistrictFeature[], mode: WriteMode = "append"): void {
    const insert = this.db.prepare<[string, string]>(
      "INSERT INTO lcda_polygons (name, geom) VALUES (?, ?)"
    );
    const write = this.db.transaction((rows: NewDistrictFeature[]) => {
      if (mode === "replace") this.db.exec("DELETE FROM lcda_polygons");
      for (const f of rows) {
        insert.run(f.name, JSON.stringify(f.geometry));
      }
    });
    write(features);
  }

  /** Replace the project boundary */
  writeBoundary(features: NewBoundaryFeature[]): void {
    const insert = this.db.prepare<[string, string]>(
      "INSERT INTO boundary (properties, geom) VALUES (?, ?)"
    );
    const write = this.db.transaction((rows: NewBoundaryFeature[]) => {
      this.db.exec("DELETE FROM boundary");
      for (const f of rows) {
        insert.run(JSON.stringify(f.properties), JSON.stringify(f.geometry));
      }
    });
    write(features);
  }

  // ── Readers ───────────────────────────────────────────────────────────

  /** Read the persisted topology, nodes and edges ordered by id */
  readTopology(): Topology {
    const nodes: TopologyNode[] = this.db
      .prepare<[], VertexRow>("SELECT id, lng, lat FROM roads_vertices ORDER BY id")
      .all()
      .map((row) => ({ id: row.id, coordinate: { lng: row.lng, lat: row.lat } }));

    const edges: TopologyEdge[] = this.db
      .prepare<[], RoadRow>(
        `SELECT id, name, source, target, cost, reverse_cost, geom
         FROM roads ORDER BY id`
      )
      .all()
      .map(toEdge);

    return { nodes, edges };
  }

  readPointFeatures(): PointFeature[] {
    return this.db
      .prepare<[], PointRow>(
        "SELECT id, name, category, lng, lat FROM point_features ORDER BY id"
      )
      .all()
      .map((row) => ({
        id: row.id,
        name: row.name,
        category: row.category,
        coordinate: { lng: row.lng, lat: row.lat },
      }));
  }

  readDistricts(): DistrictFeature[] {
    return this.db
      .prepare<[], DistrictRow>("SELECT id, name, geom FROM lcda_polygons ORDER BY id")
      .all()
      .map((row) => ({
        id: row.id,
        name: row.name,
        geometry: parseArea(row.geom, `lcda_polygons ${row.id}`),
      }));
  }

  readBoundary(): BoundaryFeature[] {
    return this.db
      .prepare<[], BoundaryRow>("SELECT id, properties, geom FROM boundary ORDER BY id")
      .all()
      .map((row) => ({
        id: row.id,
        properties: parseProperties(row.properties),
        geometry: parseArea(row.geom, `boundary ${row.id}`),
      }));
  }

  close(): void {
    this.db.close();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toEdge(row: RoadRow): TopologyEdge {
  const parsed = row.geom === null ? null : lineGeometrySchema.safeParse(JSON.parse(row.geom));
  return {
    id: row.id,
    ...(row.name !== null && { name: row.name }),
    source: row.source,
    target: row.target,
    geometry: parsed?.success ? parsed.data : null,
    cost: row.cost,
    reverseCost: row.reverse_cost,
  };
}

function parseArea(text: string, label: string): Polygon | MultiPolygon {
  const parsed = areaGeometrySchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new Error(`Invalid polygon geometry in ${label}`);
  }
  return parsed.data;
}

function parseProperties(text: string): Record<string, unknown> {
  const value: unknown = JSON.parse(text);
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}
