export type GateRequestErrorCode = "E_REQUEST_SCHEMA" | "E_PLAN_SCHEMA" | "E_LADDER_SCHEMA" | "E_REQUEST_JSON";

export class GateRequestError extends Error {
  readonly code: GateRequestErrorCode;
  readonly issues: readonly string[];

  constructor(code: GateRequestErrorCode, issues: readonly string[]) {
    super(`${code}: ${issues.join("; ")}`);
    this.name = "GateRequestError";
    this.code = code;
    this.issues = issues;
  }
}

export type RefinementInvariantCode = "E_REFINE_NO_AXIS" | "E_REFINE_MULTI_AXIS" | "E_REFINE_AXIS_MISMATCH" | "E_REFINE_PARENT";

export class RefinementInvariantError extends Error {
  readonly code: RefinementInvariantCode;
  readonly changedAxes: readonly string[];

  constructor(code: RefinementInvariantCode, message: string, changedAxes: readonly string[] = []) {
    super(`${code}: ${message}`);
    this.name = "RefinementInvariantError";
    this.code = code;
    this.changedAxes = changedAxes;
  }
}

export class LedgerConflictError extends Error {
  readonly code = "E_LEDGER_CONFLICT";
  readonly runId: string;

  constructor(runId: string, existingDigest: string, incomingDigest: string) {
    super(`E_LEDGER_CONFLICT: run ${runId} already recorded as ${existingDigest}, got ${incomingDigest}`);
    this.name = "LedgerConflictError";
    this.runId = runId;
  }
}
