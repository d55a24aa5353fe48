/**
 * Express wiring for the controllers.
 *
 * Each request gets a fresh controller, so a status set by one handler
 * never leaks into another request.
 */

import { Router } from "express";
import { ValidateError, type Controller } from "@tsoa/runtime";

import { ConfigController } from "./controllers/config.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { NetworkController } from "./controllers/network.controller.js";
import { OverrideController } from "./controllers/override.controller.js";
import { PlanController } from "./controllers/plan.controller.js";
import type { PlanningService } from "./services/planning.service.js";

/** The parts of an Express request the handlers read */
export interface RouteRequest {
  params: Record<string, string>;
  query: Record<string, unknown>;
  body?: unknown;
}

/** The parts of an Express response the handlers write */
export interface RouteResponse {
  status(code: number): RouteResponse;
  json(body: unknown): unknown;
  end(): unknown;
}

export type RouteHandler = (
  req: RouteRequest,
  res: RouteResponse,
  next: (err?: unknown) => void,
) => void;

export interface RouteDefinition {
  method: "get" | "put" | "post" | "delete";
  path: string;
  handler: RouteHandler;
}

/** Run a controller method and send its result with the controller's status. */
export function route<C extends Controller, R>(
  create: () => C,
  invoke: (controller: C, req: RouteRequest) => Promise<R>,
): RouteHandler {
  return (req, res, next) => {
    const controller = create();
    Promise.resolve()
      .then(() => invoke(controller, req))
      .then((body) => {
        const status = controller.getStatus() ?? 200;
        if (body === undefined) {
          res.status(status).end();
        } else {
          res.status(status).json(body);
        }
      })
      .catch(next);
  };
}

function pathParam(req: RouteRequest, name: string): string {
  const value = req.params[name];
  if (value === undefined || value.length === 0) {
    throw new ValidateError({ [name]: { message: "is required" } }, "Validation failed");
  }
  return value;
}

function queryParam(req: RouteRequest, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" ? value : undefined;
}

/** Every API route, in registration order. */
export function buildRoutes(service: PlanningService): RouteDefinition[] {
  const health = () => new HealthController(service);
  const network = () => new NetworkController(service);
  const overrides = () => new OverrideController(service);
  const plans = () => new PlanController(service);
  const config = () => new ConfigController(service);

  return [
    { method: "get", path: "/health", handler: route(health, (c) => c.getHealth()) },

    { method: "get", path: "/api/network", handler: route(network, (c) => c.getNetwork()) },
    {
      method: "put",
      path: "/api/network/gateway",
      handler: route(network, (c, req) => c.setGateway(req.body)),
    },
    {
      method: "put",
      path: "/api/network/nodes/:id",
      handler: route(network, (c, req) => c.upsertNode(pathParam(req, "id"), req.body)),
    },
    {
      method: "delete",
      path: "/api/network/nodes/:id",
      handler: route(network, (c, req) => c.removeNode(pathParam(req, "id"))),
    },

    { method: "get", path: "/api/overrides", handler: route(overrides, (c) => c.listOverrides()) },
    {
      method: "post",
      path: "/api/overrides",
      handler: route(overrides, (c, req) => c.addOverride(req.body)),
    },
    {
      method: "delete",
      path: "/api/overrides/:a/:b",
      handler: route(overrides, (c, req) =>
        c.removeOverride(pathParam(req, "a"), pathParam(req, "b")),
      ),
    },

    { method: "post", path: "/api/plan", handler: route(plans, (c, req) => c.plan(req.body)) },
    {
      method: "post",
      path: "/api/plan/geojson",
      handler: route(plans, (c, req) => c.planGeoJson(req.body)),
    },

    {
      method: "get",
      path: "/api/config/defaults",
      handler: route(config, (c, req) => c.getDefaults(queryParam(req, "profile"))),
    },
    { method: "get", path: "/api/config/profiles", handler: route(config, (c) => c.getProfiles()) },
    {
      method: "post",
      path: "/api/config/profiles",
      handler: route(config, (c, req) => c.saveProfile(req.body)),
    },
  ];
}

export function createRouter(service: PlanningService): Router {
  const router = Router();
  for (const { method, path, handler } of buildRoutes(service)) {
    router.route(path)[method](handler);
  }
  return router;
}
