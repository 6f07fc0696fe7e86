import {
  routeEdgesToGeoJson,
  routeResultToGeoJson,
  type NearestFeature,
  type RouteEdgeFeature,
  type RouteFeatureCollection,
  type RoutingService,
} from "@street-guide/routing";
import type { NearestRequest, RouteRequest } from "../models/requests.js";

export class RouteController {
  constructor(private readonly routing: RoutingService) {}

  /** Shortest road route between two points, one feature per road edge */
  public async route(body: RouteRequest): Promise<RouteFeatureCollection<RouteEdgeFeature>> {
    const result = await this.routing.route(
      { lat: body.start_lat, lng: body.start_lng },
      { lat: body.end_lat, lng: body.end_lng },
    );
    return routeEdgesToGeoJson(result);
  }

  /** Route to the nearest facility of a category, or a straight line when unreachable */
  public async nearest(body: NearestRequest): Promise<RouteFeatureCollection<NearestFeature>> {
    const result = await this.routing.nearestFacility(
      { lat: body.lat, lng: body.lng },
      body.category,
    );
    return routeResultToGeoJson(result);
  }
}
