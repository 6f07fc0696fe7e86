import { describe, it, expect } from "vitest";
import { AxiosError, AxiosHeaders } from "axios";
import { ApiError, BaseClient, toApiError } from "./baseClient.js";

// Expose protected methods for testing via a thin subclass
class TestClient extends BaseClient {
  constructor(resource: string, config: { baseUrl: string; timeout?: number }) {
    super(resource, config);
  }
  public exposedBuildPath(params: { path?: string }) {
    return this.buildPath(params);
  }
  public exposedBuildConfig(params: { path?: string; query?: Record<string, unknown> }) {
    return this.buildConfig(params);
  }
}

function axiosFailure(status: number, data: unknown): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError("Request failed with status code " + status, "ERR_BAD_REQUEST", config, null, {
    status,
    statusText: "",
    headers: {},
    config,
    data,
  });
}

describe("BaseClient", () => {
  describe("buildPath", () => {
    it("returns resource root when no sub-path", () => {
      const client = new TestClient("api/stats", { baseUrl: "http://localhost:3000" });
      expect(client.exposedBuildPath({})).toBe("/api/stats");
    });

    it("appends sub-path to resource", () => {
      const client = new TestClient("api", { baseUrl: "http://localhost:3000" });
      expect(client.exposedBuildPath({ path: "nearest" })).toBe("/api/nearest");
    });
  });

  describe("buildConfig", () => {
    it("sets baseURL and default timeout", () => {
      const client = new TestClient("api", { baseUrl: "http://localhost:3000" });
      const config = client.exposedBuildConfig({});
      expect(config.baseURL).toBe("http://localhost:3000");
      expect(config.timeout).toBe(30000);
    });

    it("uses custom timeout when provided", () => {
      const client = new TestClient("api", { baseUrl: "http://localhost:3000", timeout: 5000 });
      const config = client.exposedBuildConfig({});
      expect(config.timeout).toBe(5000);
    });

    it("sets JSON content headers", () => {
      const client = new TestClient("api", { baseUrl: "http://localhost:3000" });
      const config = client.exposedBuildConfig({});
      expect(config.headers).toMatchObject({
        "Content-Type": "application/json",
        Accept: "application/json",
      });
    });

    it("passes query params through", () => {
      const client = new TestClient("api", { baseUrl: "http://localhost:3000" });
      const config = client.exposedBuildConfig({ query: { q: "surulere" } });
      expect(config.params).toEqual({ q: "surulere" });
    });

    it("omits params when there is no query", () => {
      const client = new TestClient("api", { baseUrl: "http://localhost:3000" });
      expect(client.exposedBuildConfig({}).params).toBeUndefined();
    });
  });
});

describe("toApiError", () => {
  it("keeps the server's message and status", () => {
    const err = toApiError(axiosFailure(422, { message: "Validation failed", details: [] }));

    expect(err).toBeInstanceOf(ApiError);
    if (!(err instanceof ApiError)) return;
    expect(err.message).toBe("Validation failed");
    expect(err.status).toBe(422);
    expect(err.body).toEqual({ message: "Validation failed", details: [] });
  });

  it("falls back to the axios message for bodies without one", () => {
    const err = toApiError(axiosFailure(502, "<html>Bad Gateway</html>"));

    expect(err).toBeInstanceOf(ApiError);
    if (!(err instanceof ApiError)) return;
    expect(err.message).toBe("Request failed with status code 502");
    expect(err.body).toBeUndefined();
  });

  it("passes other errors through untouched", () => {
    const original = new TypeError("boom");
    expect(toApiError(original)).toBe(original);
  });
});
