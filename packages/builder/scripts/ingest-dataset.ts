/**
 * Load a street dataset into a SQLite database.
 *
 * Usage: npx tsx scripts/ingest-dataset.ts <manifest.json> [database.sqlite]
 *
 * The database defaults to data/street-guide.sqlite in the working directory.
 */
import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { GeoStore } from "../src/storage/index.js";
import { ingestFromManifest } from "../src/ingestion/index.js";

// ── CLI ──────────────────────────────────────────────────────────────

const manifestPath = process.argv[2];
if (!manifestPath) {
  console.error("Usage: npx tsx scripts/ingest-dataset.ts <manifest.json> [database.sqlite]");
  process.exit(1);
}
const databasePath = resolve(process.argv[3] ?? "data/street-guide.sqlite");

function main(manifest: string): void {
  console.log(`Manifest: ${resolve(manifest)}`);
  console.log(`Database: ${databasePath}`);
  console.log("");

  mkdirSync(dirname(databasePath), { recursive: true });
  const store = new GeoStore({ filePath: databasePath });
  try {
    const result = ingestFromManifest(manifest, store);

    console.log("");
    console.log("=== Ingestion Complete ===");
    console.log(`Time: ${(result.ingestionTimeMs / 1000).toFixed(1)}s`);
    for (const [category, count] of Object.entries(result.pointsByCategory)) {
      console.log(`  ${category}: ${count.toLocaleString()}`);
    }
    if (result.pointsSkipped > 0) {
      console.log(`Points without geometry: ${result.pointsSkipped}`);
    }
    console.log(`Districts: ${result.districts}`);
    console.log(`Boundary polygons: ${result.boundaryFeatures}`);
    if (result.topology) {
      console.log(`Nodes: ${result.topology.nodesCount.toLocaleString()}`);
      console.log(`Edges: ${result.topology.edgesCount.toLocaleString()}`);
      console.log(`Total length: ${(result.topology.totalLengthMeters / 1000).toFixed(1)} km`);
    } else {
      console.log("No road network ingested");
    }
    if (result.missingFiles.length > 0) {
      console.log(`Missing files: ${result.missingFiles.join(", ")}`);
    }
  } finally {
    store.close();
  }
}

try {
  main(manifestPath);
} catch (e) {
  console.error(e);
  process.exit(1);
}
