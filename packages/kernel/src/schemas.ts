import { existsSync, readFileSync } from "node:fs";

import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";

import { GateRequestError, type GateRequestErrorCode } from "./errors.js";
import type { LadderStartDocument, RefinementPlanDocument } from "./refinement.js";
import type { GateRequest } from "./types.js";

function loadSchema(name: string): Record<string, unknown> {
  const candidates = [`../../../schema/${name}`, `../../../../schema/${name}`];
  for (const candidate of candidates) {
    const location = new URL(candidate, import.meta.url);
    if (!existsSync(location)) continue;
    const parsed: unknown = JSON.parse(readFileSync(location, "utf8"));
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    throw new Error(`Schema ${name} is not a JSON object`);
  }
  throw new Error(`Unable to load schema ${name}`);
}

export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ["unknown error"];
  }
  return errors.map((error) => {
    const instance = error.instancePath || "/";
    const message = error.message ?? "validation error";
    return `${instance} ${message}`;
  });
}

function assertValid<T>(value: unknown, validator: ValidateFunction<T>, code: GateRequestErrorCode): T {
  if (validator(value)) {
    return value;
  }
  throw new GateRequestError(code, formatErrors(validator.errors));
}

const ajv = new Ajv({ allErrors: true, strict: true });
// Plan and ladder schemas refer into the request schema by $id, so compile order matters.
const validateRequestFn = ajv.compile<GateRequest>(loadSchema("gate-request.schema.json"));
const validatePlanFn = ajv.compile<RefinementPlanDocument>(loadSchema("refinement-plan.schema.json"));
const validateLadderStartFn = ajv.compile<LadderStartDocument>(loadSchema("ladder-start.schema.json"));

export function parseGateRequest(value: unknown): GateRequest {
  return assertValid(value, validateRequestFn, "E_REQUEST_SCHEMA");
}

export function parseRefinementPlan(value: unknown): RefinementPlanDocument {
  return assertValid(value, validatePlanFn, "E_PLAN_SCHEMA");
}

export function parseLadderStart(value: unknown): LadderStartDocument {
  return assertValid(value, validateLadderStartFn, "E_LADDER_SCHEMA");
}

export function parseJsonText(text: string, label: string): unknown {
  try {
    return JSON.parse(text);
  } catch (caught) {
    if (caught instanceof SyntaxError) {
      throw new GateRequestError("E_REQUEST_JSON", [`${label}: ${caught.message}`]);
    }
    throw caught;
  }
}
