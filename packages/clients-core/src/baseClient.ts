import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Optional auth token, sent as a bearer token when a proxy needs one */
  token?: string;
}

export interface RequestParams {
  /** Sub-path below the resource; array segments are URL-encoded */
  path?: string | string[];
  body?: unknown;
  query?: Record<string, unknown>;
}

/** A non-2xx answer from the planner API */
export class PlannerApiError extends Error {
  readonly status: number;
  /** Stable error code from the server, when it sent one */
  readonly code: string | undefined;
  readonly details: unknown;

  constructor(status: number, message: string, code?: string, details?: unknown) {
    super(message);
    this.name = "PlannerApiError";
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Translate axios failures with a server response into PlannerApiError. */
export function toPlannerApiError(err: unknown): unknown {
  if (!axios.isAxiosError(err) || !err.response) return err;
  const { status, data } = err.response;
  const message =
    isRecord(data) && typeof data["message"] === "string" ? data["message"] : err.message;
  const code = isRecord(data) && typeof data["code"] === "string" ? data["code"] : undefined;
  const details = isRecord(data) ? data["details"] : undefined;
  return new PlannerApiError(status, message, code, details);
}

export class BaseClient {
  protected resource: string;
  protected token?: string;
  protected http: AxiosInstance;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.token = config.token;
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout ?? 30000,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
    });
  }

  /** Update the auth token */
  public setToken(token: string | undefined): void {
    this.token = token;
  }

  protected buildPath(params: RequestParams): string {
    const { path } = params;
    if (path === undefined) return this.resource;
    const suffix = Array.isArray(path) ? path.map(encodeURIComponent).join("/") : path;
    return this.resource + "/" + suffix;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {};

    if (this.token) {
      config.headers = { Authorization: "Bearer " + this.token };
    }

    if (params.query) {
      config.params = params.query;
    }

    return config;
  }

  private async send<T>(request: () => Promise<{ data: T }>): Promise<T> {
    try {
      const response = await request();
      return response.data;
    } catch (err) {
      throw toPlannerApiError(err);
    }
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    return this.send(() => this.http.get<T>(this.buildPath(params), this.buildConfig(params)));
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    return this.send(() =>
      this.http.post<T>(this.buildPath(params), params.body, this.buildConfig(params)),
    );
  }

  public async put<T>(params: RequestParams = {}): Promise<T> {
    return this.send(() =>
      this.http.put<T>(this.buildPath(params), params.body, this.buildConfig(params)),
    );
  }

  public async delete<T>(params: RequestParams = {}): Promise<T> {
    return this.send(() => this.http.delete<T>(this.buildPath(params), this.buildConfig(params)));
  }
}
