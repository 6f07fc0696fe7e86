import express from "express";
import cors from "cors";
import { FeatureController } from "./controllers/feature.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { LayerController } from "./controllers/layer.controller.js";
import { RouteController } from "./controllers/route.controller.js";
import { StatsController } from "./controllers/stats.controller.js";
import { errorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { registerRoutes } from "./routes.js";
import { GeoQueryService } from "./services/geo-query.service.js";
import type { StreetNetwork } from "./services/network.service.js";

export interface AppDependencies {
  network: StreetNetwork;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  const geo = new GeoQueryService(deps.network);
  app.use(
    registerRoutes({
      health: new HealthController(deps.network),
      features: new FeatureController(geo),
      layers: new LayerController(geo),
      routes: new RouteController(deps.network.routing),
      stats: new StatsController(geo),
    }),
  );

  // Fallbacks (must be after routes)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
