/**
 * @street-guide/server
 *
 * Express API over a street database built by @street-guide/builder.
 */

export { createApp, type AppDependencies } from "./app.js";
export { loadConfig, ConfigError, type ServerConfig } from "./config/environment.js";
export { HttpError, NotFoundError } from "./errors.js";
export {
  buildStreetNetwork,
  loadStreetNetwork,
  networkStats,
  type NetworkData,
  type StreetNetwork,
} from "./services/network.service.js";
export { GeoQueryService } from "./services/geo-query.service.js";
export type * from "./models/responses.js";
