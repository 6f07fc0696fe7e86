import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { BoundaryCollection, DistrictCollection, RoadCollection } from "./types.js";

export class LayerClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api", config);
  }

  public async getLcdas(): Promise<DistrictCollection> {
    return this.client.get<DistrictCollection>({ path: "lcdas" });
  }

  /** Simplified road network for the base map */
  public async getRoads(): Promise<RoadCollection> {
    return this.client.get<RoadCollection>({ path: "roads_layer" });
  }

  public async getBoundary(): Promise<BoundaryCollection> {
    return this.client.get<BoundaryCollection>({ path: "boundary" });
  }
}
