import { describe, it, expect, vi, beforeEach } from "vitest";
import axios, { AxiosError, AxiosHeaders } from "axios";

const http = vi.hoisted(() => ({
  get: vi.fn(),
  post: vi.fn(),
  put: vi.fn(),
  delete: vi.fn(),
}));

vi.mock("axios", async (importOriginal) => {
  const actual = await importOriginal<typeof import("axios")>();
  return { ...actual, default: { ...actual.default, create: vi.fn(() => http) } };
});

import { BaseClient, PlannerApiError, toPlannerApiError } from "./baseClient.js";

// Expose protected methods for testing via a thin subclass
class TestClient extends BaseClient {
  public exposedBuildPath(params: { path?: string | string[] }) {
    return this.buildPath(params);
  }
  public exposedBuildConfig(params: { query?: Record<string, unknown> }) {
    return this.buildConfig(params);
  }
}

function responseError(status: number, data: unknown): AxiosError {
  return new AxiosError("Request failed", "ERR_BAD_REQUEST", undefined, undefined, {
    status,
    statusText: "",
    headers: {},
    config: { headers: new AxiosHeaders() },
    data,
  });
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe("BaseClient", () => {
  describe("constructor", () => {
    it("creates an axios instance with base URL, timeout and JSON headers", () => {
      new TestClient("api/network", { baseUrl: "http://localhost:3000" });
      expect(axios.create).toHaveBeenCalledWith({
        baseURL: "http://localhost:3000",
        timeout: 30000,
        headers: { "Content-Type": "application/json", Accept: "application/json" },
      });
    });

    it("uses custom timeout when provided", () => {
      new TestClient("api/network", { baseUrl: "http://localhost:3000", timeout: 5000 });
      expect(axios.create).toHaveBeenCalledWith(expect.objectContaining({ timeout: 5000 }));
    });
  });

  describe("buildPath", () => {
    it("returns resource root when no sub-path", () => {
      const client = new TestClient("api/overrides", { baseUrl: "http://localhost:3000" });
      expect(client.exposedBuildPath({})).toBe("/api/overrides");
    });

    it("appends a literal sub-path", () => {
      const client = new TestClient("api/plan", { baseUrl: "http://localhost:3000" });
      expect(client.exposedBuildPath({ path: "geojson" })).toBe("/api/plan/geojson");
    });

    it("encodes array segments", () => {
      const client = new TestClient("api/network", { baseUrl: "http://localhost:3000" });
      expect(client.exposedBuildPath({ path: ["nodes", "roof/2 east"] })).toBe(
        "/api/network/nodes/roof%2F2%20east",
      );
    });
  });

  describe("buildConfig", () => {
    it("includes Authorization header when token is set", () => {
      const client = new TestClient("health", {
        baseUrl: "http://localhost:3000",
        token: "test-token",
      });
      expect(client.exposedBuildConfig({}).headers).toEqual({
        Authorization: "Bearer test-token",
      });
    });

    it("omits headers when no token", () => {
      const client = new TestClient("health", { baseUrl: "http://localhost:3000" });
      expect(client.exposedBuildConfig({})).toEqual({});
    });

    it("passes query params through", () => {
      const client = new TestClient("api/config", { baseUrl: "http://localhost:3000" });
      const config = client.exposedBuildConfig({ query: { profile: "capped-gateway" } });
      expect(config.params).toEqual({ profile: "capped-gateway" });
    });

    it("drops the token when set to undefined", () => {
      const client = new TestClient("health", {
        baseUrl: "http://localhost:3000",
        token: "initial",
      });
      client.setToken(undefined);
      expect(client.exposedBuildConfig({}).headers).toBeUndefined();
    });
  });

  describe("requests", () => {
    it("returns the response data", async () => {
      http.get.mockResolvedValueOnce({ data: { status: "ok" } });
      const client = new BaseClient("health", { baseUrl: "http://localhost:3000" });
      await expect(client.get()).resolves.toEqual({ status: "ok" });
      expect(http.get).toHaveBeenCalledWith("/health", {});
    });

    it("sends the body on post", async () => {
      http.post.mockResolvedValueOnce({ data: { a: "A", b: "B" } });
      const client = new BaseClient("api/overrides", { baseUrl: "http://localhost:3000" });
      await client.post({ body: { a: "B", b: "A" } });
      expect(http.post).toHaveBeenCalledWith("/api/overrides", { a: "B", b: "A" }, {});
    });

    it("turns error responses into PlannerApiError", async () => {
      http.delete.mockRejectedValueOnce(
        responseError(404, { message: "Node not found: ghost", code: "node-not-found" }),
      );
      const client = new BaseClient("api/network", { baseUrl: "http://localhost:3000" });
      const err: unknown = await client.delete({ path: ["nodes", "ghost"] }).catch((e) => e);

      expect(err).toBeInstanceOf(PlannerApiError);
      expect(err).toMatchObject({
        status: 404,
        code: "node-not-found",
        message: "Node not found: ghost",
      });
    });
  });
});

describe("toPlannerApiError", () => {
  it("keeps field details from validation failures", () => {
    const details = { "coordinate.lat": { message: "must be a number from -90 to 90" } };
    const err = toPlannerApiError(responseError(422, { message: "Validation failed", details }));
    expect(err).toMatchObject({ status: 422, code: undefined, details });
  });

  it("passes through errors without a response", () => {
    const original = new Error("socket hang up");
    expect(toPlannerApiError(original)).toBe(original);
  });
});
