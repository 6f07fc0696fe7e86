import type { BufferRequest, PointRequest } from "../models/requests.js";
import type { DistrictCollection, PoiCollection, SearchResult } from "../models/responses.js";
import type { GeoQueryService } from "../services/geo-query.service.js";

export class FeatureController {
  constructor(private readonly geo: GeoQueryService) {}

  /** Points of interest whose category contains the given text */
  public async byCategory(category: string): Promise<PoiCollection> {
    return this.geo.featuresByCategory(category);
  }

  /** Points of interest within a radius in meters */
  public async buffer(body: BufferRequest): Promise<PoiCollection> {
    return this.geo.buffer({ lat: body.lat, lng: body.lng }, body.distance);
  }

  /** Search points, roads and districts by name */
  public async search(q: string): Promise<SearchResult[]> {
    return this.geo.search(q);
  }

  /** Districts containing a point */
  public async identify(body: PointRequest): Promise<DistrictCollection> {
    return this.geo.identify({ lat: body.lat, lng: body.lng });
  }
}
