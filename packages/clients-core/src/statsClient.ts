import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { LcdaStatsResponse, StatsResponse } from "./types.js";

export class StatsClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/stats", config);
  }

  /** Totals across the whole dataset */
  public async getStats(): Promise<StatsResponse> {
    return this.client.get<StatsResponse>();
  }

  /** Totals for one district */
  public async getLcdaStats(name: string): Promise<LcdaStatsResponse> {
    return this.client.get<LcdaStatsResponse>({ path: encodeURIComponent(name) });
  }
}
