/**
 * Raised when a dataset file cannot be read at all: missing, unreadable,
 * not JSON, or not a GeoJSON FeatureCollection. Individual malformed
 * features never raise this.
 */
export class DatasetReadError extends Error {
  constructor(
    readonly filePath: string,
    reason: string,
  ) {
    super(`Cannot read dataset file ${filePath}: ${reason}`);
    this.name = "DatasetReadError";
  }
}
