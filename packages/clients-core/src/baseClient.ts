import axios, { type AxiosRequestConfig } from "axios";
import type { ErrorResponse } from "./types.js";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
  query?: Record<string, unknown>;
}

/** A non-2xx response from the API, or a request that never got one */
export class ApiError extends Error {
  constructor(
    message: string,
    /** HTTP status, or undefined when no response arrived */
    readonly status: number | undefined,
    /** Parsed error body, when the server sent one */
    readonly body: ErrorResponse | undefined,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function isErrorResponse(value: unknown): value is ErrorResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "message" in value &&
    typeof value.message === "string"
  );
}

/** Wrap axios failures in ApiError; anything else is rethrown unchanged */
export function toApiError(err: unknown): unknown {
  if (!axios.isAxiosError(err)) return err;
  const status = err.response?.status;
  const data: unknown = err.response?.data;
  const body = isErrorResponse(data) ? data : undefined;
  return new ApiError(body?.message ?? err.message, status, body);
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 30000;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
    };

    if (params.query) {
      config.params = params.query;
    }

    return config;
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    const path = this.buildPath(params);
    const config = this.buildConfig(params);
    try {
      const response = await axios.get<T>(path, config);
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    const path = this.buildPath(params);
    const config = this.buildConfig(params);
    try {
      const response = await axios.post<T>(path, params.body, config);
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }
}
