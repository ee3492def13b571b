import axios, { type AxiosRequestConfig, type AxiosResponse } from "axios";
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

/** An error response from the server */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
    /** The server's error kind (e.g. "unknown-car"), when it sent one */
    readonly kind?: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function isErrorResponse(data: unknown): data is ErrorResponse {
  return (
    typeof data === "object" &&
    data !== null &&
    "message" in data &&
    typeof data.message === "string"
  );
}

/** Turn an axios failure that carries a response into an ApiError; anything else passes through */
export function toApiError(err: unknown): unknown {
  if (!axios.isAxiosError(err) || !err.response) return err;
  const { status, data } = err.response;
  if (isErrorResponse(data)) {
    return new ApiError(status, data.message, data.kind, data.details);
  }
  return new ApiError(status, err.message);
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

  protected async send<T>(request: Promise<AxiosResponse<T>>): Promise<T> {
    try {
      const response = await request;
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    return this.send(axios.get<T>(this.buildPath(params), this.buildConfig(params)));
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    return this.send(axios.post<T>(this.buildPath(params), params.body, this.buildConfig(params)));
  }

  public async put<T>(params: RequestParams = {}): Promise<T> {
    return this.send(axios.put<T>(this.buildPath(params), params.body, this.buildConfig(params)));
  }

  public async delete<T>(params: RequestParams = {}): Promise<T> {
    return this.send(axios.delete<T>(this.buildPath(params), this.buildConfig(params)));
  }
}
