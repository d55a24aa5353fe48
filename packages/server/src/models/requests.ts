/**
 * Request bodies accepted by the HTTP API, and their validators.
 *
 * Validators take the raw JSON body and throw a tsoa `ValidateError` naming
 * every bad field, which the error handler turns into a 422.
 */

import { ValidateError, type FieldErrors } from "@tsoa/runtime";
import type { Coordinate } from "@lora-planner/planner";

export interface SetGatewayRequest {
  coordinate: Coordinate;
}

export interface UpsertNodeRequest {
  coordinate: Coordinate;
  /** Derived from the current network when omitted */
  gatewayEligible?: boolean;
}

export interface AddOverrideRequest {
  a: string;
  b: string;
}

export interface PlanRequest {
  /** Named config profile to start from */
  profileName?: string;
  /** Per-run config overrides, merged over the profile or base */
  config?: Record<string, unknown>;
}

export interface PlanGeoJsonRequest extends PlanRequest {
  /** Include nodes that could not be attached (default: true) */
  includeUnreachable?: boolean;
  /** Also emit feasible links the tree does not use (default: false) */
  includeFeasibleLinks?: boolean;
}

export interface SaveProfileRequest {
  name: string;
  description?: string;
  /** Settings that differ from the base config */
  config?: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new ValidateError(
      { body: { message: "must be a JSON object", value: body } },
      "Validation failed",
    );
  }
  return body;
}

function readCoordinate(
  body: Record<string, unknown>,
  key: string,
  errors: FieldErrors,
): Coordinate | undefined {
  const value = body[key];
  if (!isRecord(value)) {
    errors[key] = { message: "must be an object with lat and lng", value };
    return undefined;
  }
  const { lat, lng } = value;
  if (typeof lat !== "number" || !Number.isFinite(lat) || lat < -90 || lat > 90) {
    errors[`${key}.lat`] = { message: "must be a number from -90 to 90", value: lat };
  }
  if (typeof lng !== "number" || !Number.isFinite(lng) || lng < -180 || lng > 180) {
    errors[`${key}.lng`] = { message: "must be a number from -180 to 180", value: lng };
  }
  if (typeof lat !== "number" || typeof lng !== "number") return undefined;
  return { lat, lng };
}

function readOptionalBoolean(
  body: Record<string, unknown>,
  key: string,
  errors: FieldErrors,
): boolean | undefined {
  const value = body[key];
  if (value === undefined || typeof value === "boolean") return value;
  errors[key] = { message: "must be a boolean", value };
  return undefined;
}

function readString(
  body: Record<string, unknown>,
  key: string,
  errors: FieldErrors,
): string {
  const value = body[key];
  if (typeof value === "string" && value.trim().length > 0) return value;
  errors[key] = { message: "must be a non-empty string", value };
  return "";
}

function throwIfInvalid(errors: FieldErrors): void {
  if (Object.keys(errors).length > 0) {
    throw new ValidateError(errors, "Validation failed");
  }
}

export function parseSetGatewayRequest(raw: unknown): SetGatewayRequest {
  const body = requireBody(raw);
  const errors: FieldErrors = {};
  const coordinate = readCoordinate(body, "coordinate", errors);
  throwIfInvalid(errors);
  if (!coordinate) throw new ValidateError(errors, "Validation failed");
  return { coordinate };
}

export function parseUpsertNodeRequest(raw: unknown): UpsertNodeRequest {
  const body = requireBody(raw);
  const errors: FieldErrors = {};
  const coordinate = readCoordinate(body, "coordinate", errors);
  const gatewayEligible = readOptionalBoolean(body, "gatewayEligible", errors);
  throwIfInvalid(errors);
  if (!coordinate) throw new ValidateError(errors, "Validation failed");
  return gatewayEligible === undefined ? { coordinate } : { coordinate, gatewayEligible };
}

export function parseAddOverrideRequest(raw: unknown): AddOverrideRequest {
  const body = requireBody(raw);
  const errors: FieldErrors = {};
  const a = readString(body, "a", errors);
  const b = readString(body, "b", errors);
  throwIfInvalid(errors);
  return { a, b };
}

export function parsePlanRequest(raw: unknown): PlanRequest {
  if (raw === undefined || raw === null) return {};
  const body = requireBody(raw);
  const errors: FieldErrors = {};
  const request: PlanRequest = {};

  const { profileName, config } = body;
  if (typeof profileName === "string") {
    request.profileName = profileName;
  } else if (profileName !== undefined) {
    errors["profileName"] = { message: "must be a string", value: profileName };
  }
  if (isRecord(config)) {
    request.config = config;
  } else if (config !== undefined) {
    errors["config"] = { message: "must be an object", value: config };
  }

  throwIfInvalid(errors);
  return request;
}

export function parsePlanGeoJsonRequest(raw: unknown): PlanGeoJsonRequest {
  const request: PlanGeoJsonRequest = parsePlanRequest(raw);
  if (!isRecord(raw)) return request;

  const errors: FieldErrors = {};
  const includeUnreachable = readOptionalBoolean(raw, "includeUnreachable", errors);
  const includeFeasibleLinks = readOptionalBoolean(raw, "includeFeasibleLinks", errors);
  throwIfInvalid(errors);

  if (includeUnreachable !== undefined) request.includeUnreachable = includeUnreachable;
  if (includeFeasibleLinks !== undefined) request.includeFeasibleLinks = includeFeasibleLinks;
  return request;
}

export function parseSaveProfileRequest(raw: unknown): SaveProfileRequest {
  const body = requireBody(raw);
  const errors: FieldErrors = {};
  const name = readString(body, "name", errors);
  if (name && !/[a-z0-9]/i.test(name)) {
    errors["name"] = { message: "must contain a letter or digit", value: name };
  }

  const request: SaveProfileRequest = { name };
  const { description, config } = body;
  if (typeof description === "string") {
    request.description = description;
  } else if (description !== undefined) {
    errors["description"] = { message: "must be a string", value: description };
  }
  if (isRecord(config)) {
    request.config = config;
  } else if (config !== undefined) {
    errors["config"] = { message: "must be an object", value: config };
  }

  throwIfInvalid(errors);
  return request;
}
