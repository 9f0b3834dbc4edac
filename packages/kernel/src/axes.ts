import type { RunIdentity } from "@descent/identity";

import { RefinementInvariantError } from "./errors.js";
import type { FailureClass } from "./failures.js";

/** Ladder order: cover, then context, then evidence, then policy. */
export const REFINEMENT_AXES = ["cover_id", "ctx_ref", "adapter_version", "mode"] as const;

export type RefinementAxis = (typeof REFINEMENT_AXES)[number];

export interface RefinementStep {
  readonly parentRunId: string;
  readonly runId: string;
  readonly refinementAxis: RefinementAxis;
  readonly candidateIndex: number;
}

const STARTING_RUNG: Readonly<Record<FailureClass, number>> = {
  locality_failure: 0,
  descent_failure: 0,
  stability_failure: 1,
  glue_non_contractible: 2,
};

export function startingRung(classes: readonly FailureClass[]): number {
  return classes.reduce((rung, failureClass) => Math.min(rung, STARTING_RUNG[failureClass]), REFINEMENT_AXES.length - 1);
}

export function changedAxes(parent: RunIdentity, child: RunIdentity): RefinementAxis[] {
  const changed: RefinementAxis[] = [];
  if (parent.coverId !== child.coverId) changed.push("cover_id");
  if (parent.ctxRef !== child.ctxRef) changed.push("ctx_ref");
  if (parent.adapterVersion !== child.adapterVersion) changed.push("adapter_version");
  if (parent.normalizerId !== child.normalizerId || parent.policyDigest !== child.policyDigest) {
    changed.push("mode");
  }
  return changed;
}

/** Identity fields no refinement may touch. */
export function foreignChanges(parent: RunIdentity, child: RunIdentity): string[] {
  const fields = ["worldId", "contextId", "adapterId"] as const;
  return fields.filter((field) => parent[field] !== child[field]);
}

export function assertOneAxis(parent: RunIdentity, child: RunIdentity, expected?: RefinementAxis): RefinementAxis {
  const foreign = foreignChanges(parent, child);
  if (foreign.length > 0) {
    throw new RefinementInvariantError("E_REFINE_PARENT", `refinement changes ${foreign.join(", ")}`, foreign);
  }
  const changed = changedAxes(parent, child);
  const [axis, ...rest] = changed;
  if (axis === undefined) {
    throw new RefinementInvariantError("E_REFINE_NO_AXIS", "refinement changes no identity axis");
  }
  if (rest.length > 0) {
    throw new RefinementInvariantError("E_REFINE_MULTI_AXIS", `refinement changes ${changed.join(", ")}`, changed);
  }
  if (expected !== undefined && axis !== expected) {
    throw new RefinementInvariantError(
      "E_REFINE_AXIS_MISMATCH",
      `refinement recorded as ${expected} but changes ${axis}`,
      changed,
    );
  }
  return axis;
}
