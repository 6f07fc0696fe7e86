import type { HealthResponse } from "../models/responses.js";
import type { StreetNetwork } from "../services/network.service.js";
import { networkStats } from "../services/network.service.js";

export class HealthController {
  constructor(private readonly network: StreetNetwork) {}

  /** Health check with network statistics */
  public async getHealth(): Promise<HealthResponse> {
    return {
      status: "ok",
      uptime: process.uptime(),
      network: networkStats(this.network),
    };
  }
}
