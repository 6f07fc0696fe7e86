import { z } from "zod";

const latitude = z.number().min(-90).max(90);
const longitude = z.number().min(-180).max(180);

export const pointRequestSchema = z.object({
  lat: latitude,
  lng: longitude,
});

export const routeRequestSchema = z.object({
  start_lat: latitude,
  start_lng: longitude,
  end_lat: latitude,
  end_lng: longitude,
});

export const bufferRequestSchema = pointRequestSchema.extend({
  /** Radius in meters */
  distance: z.number().nonnegative(),
});

export const nearestRequestSchema = pointRequestSchema.extend({
  category: z.string().trim().min(1),
});

export const searchQuerySchema = z.object({
  q: z.string().default(""),
});

export const categoryParamsSchema = z.object({
  category: z.string().min(1),
});

export const lcdaParamsSchema = z.object({
  lcda: z.string().min(1),
});

export type PointRequest = z.infer<typeof pointRequestSchema>;
export type RouteRequest = z.infer<typeof routeRequestSchema>;
export type BufferRequest = z.infer<typeof bufferRequestSchema>;
export type NearestRequest = z.infer<typeof nearestRequestSchema>;
