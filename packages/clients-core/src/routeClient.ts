import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { NearestRequest, NearestResponse, RouteRequest, RouteResponse } from "./types.js";

export class RouteClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api", config);
  }

  /** Shortest road route between two points */
  public async route(request: RouteRequest): Promise<RouteResponse> {
    return this.client.post<RouteResponse>({ path: "route", body: request });
  }

  /** Route to the nearest facility of a category */
  public async nearest(request: NearestRequest): Promise<NearestResponse> {
    return this.client.post<NearestResponse>({ path: "nearest", body: request });
  }
}
