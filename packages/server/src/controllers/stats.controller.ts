import type { LcdaStatsResponse, StatsResponse } from "../models/responses.js";
import type { GeoQueryService } from "../services/geo-query.service.js";

export class StatsController {
  constructor(private readonly geo: GeoQueryService) {}

  /** Totals across the whole dataset */
  public async getStats(): Promise<StatsResponse> {
    return this.geo.stats();
  }

  /** Totals for one district */
  public async getLcdaStats(name: string): Promise<LcdaStatsResponse> {
    return this.geo.lcdaStats(name);
  }
}
