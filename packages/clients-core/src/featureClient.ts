import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  BufferRequest,
  DistrictCollection,
  PoiCollection,
  PointRequest,
  SearchResult,
} from "./types.js";

export class FeatureClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api", config);
  }

  /** Points of interest whose category contains the given text */
  public async getByCategory(category: string): Promise<PoiCollection> {
    return this.client.get<PoiCollection>({
      path: "features/" + encodeURIComponent(category),
    });
  }

  /** Points of interest within a radius */
  public async buffer(request: BufferRequest): Promise<PoiCollection> {
    return this.client.post<PoiCollection>({ path: "buffer", body: request });
  }

  /** Search points, roads and districts by name */
  public async search(q: string): Promise<SearchResult[]> {
    return this.client.get<SearchResult[]>({ path: "search", query: { q } });
  }

  /** Districts containing a point */
  public async identify(request: PointRequest): Promise<DistrictCollection> {
    return this.client.post<DistrictCollection>({ path: "identify", body: request });
  }
}
