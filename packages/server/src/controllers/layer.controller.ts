import type {
  BoundaryCollection,
  DistrictCollection,
  RoadCollection,
} from "../models/responses.js";
import type { GeoQueryService } from "../services/geo-query.service.js";

export class LayerController {
  constructor(private readonly geo: GeoQueryService) {}

  public async lcdas(): Promise<DistrictCollection> {
    return this.geo.lcdas();
  }

  /** Simplified road network for the base map */
  public async roads(): Promise<RoadCollection> {
    return this.geo.roadsLayer();
  }

  public async boundary(): Promise<BoundaryCollection> {
    return this.geo.boundary();
  }
}
