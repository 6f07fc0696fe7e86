/**
 * HTTP route table. Each handler validates its input with the request
 * schemas, calls one controller method and sends the result as JSON.
 */

import { Router } from "express";
import type { FeatureController } from "./controllers/feature.controller.js";
import type { HealthController } from "./controllers/health.controller.js";
import type { LayerController } from "./controllers/layer.controller.js";
import type { RouteController } from "./controllers/route.controller.js";
import type { StatsController } from "./controllers/stats.controller.js";
import { asyncHandler } from "./middleware/error-handler.js";
import {
  bufferRequestSchema,
  categoryParamsSchema,
  lcdaParamsSchema,
  nearestRequestSchema,
  pointRequestSchema,
  routeRequestSchema,
  searchQuerySchema,
} from "./models/requests.js";

export interface Controllers {
  health: HealthController;
  features: FeatureController;
  layers: LayerController;
  routes: RouteController;
  stats: StatsController;
}

export function registerRoutes(controllers: Controllers): Router {
  const { health, features, layers, routes, stats } = controllers;
  const router = Router();

  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      res.json(await health.getHealth());
    }),
  );

  // Points of interest
  router.get(
    "/api/features/:category",
    asyncHandler(async (req, res) => {
      const { category } = categoryParamsSchema.parse(req.params);
      res.json(await features.byCategory(category));
    }),
  );
  router.post(
    "/api/buffer",
    asyncHandler(async (req, res) => {
      res.json(await features.buffer(bufferRequestSchema.parse(req.body)));
    }),
  );
  router.get(
    "/api/search",
    asyncHandler(async (req, res) => {
      const { q } = searchQuerySchema.parse(req.query);
      res.json(await features.search(q));
    }),
  );
  router.post(
    "/api/identify",
    asyncHandler(async (req, res) => {
      res.json(await features.identify(pointRequestSchema.parse(req.body)));
    }),
  );

  // Routing
  router.post(
    "/api/route",
    asyncHandler(async (req, res) => {
      res.json(await routes.route(routeRequestSchema.parse(req.body)));
    }),
  );
  router.post(
    "/api/nearest",
    asyncHandler(async (req, res) => {
      res.json(await routes.nearest(nearestRequestSchema.parse(req.body)));
    }),
  );

  // Map layers
  router.get(
    "/api/lcdas",
    asyncHandler(async (_req, res) => {
      res.json(await layers.lcdas());
    }),
  );
  router.get(
    "/api/roads_layer",
    asyncHandler(async (_req, res) => {
      res.json(await layers.roads());
    }),
  );
  router.get(
    "/api/boundary",
    asyncHandler(async (_req, res) => {
      res.json(await layers.boundary());
    }),
  );

  // Statistics
  router.get(
    "/api/stats",
    asyncHandler(async (_req, res) => {
      res.json(await stats.getStats());
    }),
  );
  router.get(
    "/api/stats/:lcda",
    asyncHandler(async (req, res) => {
      const { lcda } = lcdaParamsSchema.parse(req.params);
      res.json(await stats.getLcdaStats(lcda));
    }),
  );

  return router;
}
