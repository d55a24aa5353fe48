import type { Request, Response, NextFunction } from "express";
import { ValidateError } from "@tsoa/runtime";
import {
  FrequencyExhaustedError,
  InvalidConfigError,
  PlannerError,
  type PlannerErrorCode,
} from "@lora-planner/planner";

import type { ErrorResponse } from "../models/responses.js";

const STATUS_BY_CODE: Record<PlannerErrorCode, number> = {
  "invalid-override-pair": 404,
  "invalid-node": 422,
  "node-not-found": 404,
  "override-not-found": 404,
  "no-gateway": 409,
  "frequency-exhausted": 409,
  "invalid-config": 400,
  "profile-not-found": 404,
};

/** Map any thrown value to an HTTP status and JSON body. */
export function toErrorResponse(err: unknown): { status: number; body: ErrorResponse } {
  if (err instanceof ValidateError) {
    return { status: 422, body: { message: "Validation failed", details: err.fields } };
  }

  if (err instanceof PlannerError) {
    const body: ErrorResponse = { message: err.message, code: err.code };
    if (err instanceof InvalidConfigError) {
      body.details = err.fields;
    } else if (err instanceof FrequencyExhaustedError) {
      body.details = { nodeId: err.nodeId, unassignedCount: err.unassignedCount };
    }
    return { status: STATUS_BY_CODE[err.code], body };
  }

  if (err instanceof Error) {
    // body-parser and friends attach an HTTP status
    const status =
      "status" in err && typeof err.status === "number" && err.status >= 400 ? err.status : 500;
    return { status, body: { message: err.message } };
  }

  return { status: 500, body: { message: "Internal server error" } };
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const { status, body } = toErrorResponse(err);
  if (err instanceof ValidateError) {
    console.warn(`[validation] ${JSON.stringify(err.fields)}`);
  } else if (status >= 500) {
    console.error(`[error] ${err instanceof Error ? (err.stack ?? err.message) : String(err)}`);
  } else {
    console.warn(`[error] ${status} ${body.message}`);
  }
  res.status(status).json(body);
}
