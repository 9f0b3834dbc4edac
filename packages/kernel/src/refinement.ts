import type { GatePolicy } from "@descent/identity";

import type { DescentAdapter, GateEnv } from "./adapter.js";
import {
  REFINEMENT_AXES,
  changedAxes,
  foreignChanges,
  startingRung,
  type RefinementAxis,
  type RefinementStep,
} from "./axes.js";
import { resolveRun, runGate } from "./gate.js";
import { RunLedger } from "./ledger.js";
import { materializeRequest } from "./materialize.js";
import type { WorldProfile } from "./normalizers.js";
import { nullTraceSink, type TraceSink } from "./trace.js";
import type { ContextSnapshot, CoverStrategy, GateRequest } from "./types.js";
import { witnessIdentity, type GateWitness } from "./witness.js";

export const DEFAULT_MAX_REFINEMENT_STEPS = 8;

export interface ModeCandidate {
  readonly normalizerId: string;
  readonly policy: GatePolicy;
}

/** Ordered candidates per axis; each is tried at most once. */
export interface RefinementPlan {
  readonly covers?: readonly CoverStrategy[];
  readonly contexts?: readonly ContextSnapshot[];
  readonly adapters?: readonly DescentAdapter[];
  readonly modes?: readonly ModeCandidate[];
}

/** JSON form of a plan; adapters are named by version and resolved by the host. */
export interface RefinementPlanDocument {
  readonly covers?: readonly CoverStrategy[];
  readonly contexts?: readonly ContextSnapshot[];
  readonly adapterVersions?: readonly string[];
  readonly modes?: readonly ModeCandidate[];
  readonly maxSteps?: number;
}

/** JSON form of a ladder start; the adapter is named by a host-resolved spec. */
export interface LadderStartDocument {
  readonly context: ContextSnapshot;
  readonly coverStrategy: CoverStrategy;
  readonly normalizerId: string;
  readonly policy: GatePolicy;
  readonly adapter: string;
}

export interface LadderState {
  readonly context: ContextSnapshot;
  readonly coverStrategy: CoverStrategy;
  readonly normalizerId: string;
  readonly policy: GatePolicy;
  readonly adapter: DescentAdapter;
}

export interface LadderOptions {
  readonly world: WorldProfile;
  readonly trace?: TraceSink;
  readonly maxSteps?: number;
  readonly ledger?: RunLedger;
}

export interface LadderRun {
  readonly witness: GateWitness;
  readonly step?: RefinementStep;
}

export interface SkippedCandidate {
  readonly axis: RefinementAxis;
  readonly candidateIndex: number;
  readonly reason: string;
}

export type LadderStatus = "accepted" | "exhausted" | "step_limit";

export interface LadderOutcome {
  readonly status: LadderStatus;
  readonly final: GateWitness;
  readonly runs: readonly LadderRun[];
  readonly skipped: readonly SkippedCandidate[];
}

type Cursor = Readonly<Record<RefinementAxis, number>>;

const INITIAL_CURSOR: Cursor = { cover_id: 0, ctx_ref: 0, adapter_version: 0, mode: 0 };

function candidateCount(plan: RefinementPlan, axis: RefinementAxis): number {
  switch (axis) {
    case "cover_id":
      return plan.covers?.length ?? 0;
    case "ctx_ref":
      return plan.contexts?.length ?? 0;
    case "adapter_version":
      return plan.adapters?.length ?? 0;
    case "mode":
      return plan.modes?.length ?? 0;
  }
}

function applyCandidate(
  state: LadderState,
  plan: RefinementPlan,
  axis: RefinementAxis,
  index: number,
): LadderState | undefined {
  switch (axis) {
    case "cover_id": {
      const coverStrategy = plan.covers?.[index];
      return coverStrategy === undefined ? undefined : { ...state, coverStrategy };
    }
    case "ctx_ref": {
      const context = plan.contexts?.[index];
      return context === undefined ? undefined : { ...state, context };
    }
    case "adapter_version": {
      const adapter = plan.adapters?.[index];
      return adapter === undefined ? undefined : { ...state, adapter };
    }
    case "mode": {
      const mode = plan.modes?.[index];
      return mode === undefined ? undefined : { ...state, normalizerId: mode.normalizerId, policy: mode.policy };
    }
  }
}

export function requestFor(state: LadderState): GateRequest {
  return materializeRequest(
    {
      context: state.context,
      coverStrategy: state.coverStrategy,
      normalizerId: state.normalizerId,
      policy: state.policy,
    },
    state.adapter,
  );
}

export interface PlannedStep {
  readonly axis: RefinementAxis;
  readonly candidateIndex: number;
  readonly state: LadderState;
  readonly request: GateRequest;
}

export interface NextRefinement {
  readonly planned?: PlannedStep;
  readonly skipped: readonly SkippedCandidate[];
  readonly cursor: Cursor;
}

/**
 * Picks the next one-axis candidate at or below `rung`. Candidates that
 * would change no axis, several axes, or a non-axis identity field are
 * consumed and reported as skipped.
 */
export function nextRefinement(
  parent: GateWitness,
  state: LadderState,
  plan: RefinementPlan,
  world: WorldProfile,
  rung: number,
  cursor: Cursor,
): NextRefinement {
  const skipped: SkippedCandidate[] = [];
  const next: Record<RefinementAxis, number> = { ...cursor };
  const parentIdentity = witnessIdentity(parent);
  for (const axis of REFINEMENT_AXES.slice(rung)) {
    while (next[axis] < candidateCount(plan, axis)) {
      const candidateIndex = next[axis];
      next[axis] += 1;
      const candidate = applyCandidate(state, plan, axis, candidateIndex);
      if (candidate === undefined) continue;
      const request = requestFor(candidate);
      const env: GateEnv = { world, adapter: candidate.adapter };
      const identity = resolveRun(request, env).identity;
      const foreign = foreignChanges(parentIdentity, identity);
      const changed = changedAxes(parentIdentity, identity);
      let reason: string | undefined;
      if (foreign.length > 0) {
        reason = `changes ${foreign.join(", ")}`;
      } else if (changed.length === 0) {
        reason = "changes no identity axis";
      } else if (changed.length > 1 || changed[0] !== axis) {
        reason = `changes ${changed.join(", ")}`;
      }
      if (reason === undefined) {
        return { planned: { axis, candidateIndex, state: candidate, request }, skipped, cursor: next };
      }
      skipped.push({ axis, candidateIndex, reason });
    }
  }
  return { skipped, cursor: next };
}

/**
 * Runs the gate, then refines one axis at a time until a run is accepted,
 * the plan is exhausted, or the step bound is reached.
 */
export function runLadder(start: LadderState, plan: RefinementPlan, options: LadderOptions): LadderOutcome {
  const trace = options.trace ?? nullTraceSink;
  const ledger = options.ledger ?? new RunLedger();
  const maxSteps = options.maxSteps ?? start.policy.maxRefinementSteps ?? DEFAULT_MAX_REFINEMENT_STEPS;
  const runs: LadderRun[] = [];
  const skipped: SkippedCandidate[] = [];

  let state = start;
  let witness = runGate(requestFor(state), { world: options.world, adapter: state.adapter, trace });
  ledger.append({ witness });
  runs.push({ witness });

  let rung = 0;
  let cursor = INITIAL_CURSOR;
  let steps = 0;
  while (witness.result === "rejected") {
    if (steps >= maxSteps) {
      return { status: "step_limit", final: witness, runs, skipped };
    }
    rung = Math.max(rung, startingRung(witness.failureClasses));
    const next = nextRefinement(witness, state, plan, options.world, rung, cursor);
    for (const entry of next.skipped) {
      trace.emit({ kind: "refine_skip", axis: entry.axis, candidateIndex: entry.candidateIndex, reason: entry.reason });
    }
    skipped.push(...next.skipped);
    cursor = next.cursor;
    if (next.planned === undefined) {
      return { status: "exhausted", final: witness, runs, skipped };
    }
    const { planned } = next;
    const child = runGate(planned.request, { world: options.world, adapter: planned.state.adapter, trace });
    const step: RefinementStep = {
      parentRunId: witness.runId,
      runId: child.runId,
      refinementAxis: planned.axis,
      candidateIndex: planned.candidateIndex,
    };
    ledger.append({ witness: child, step });
    trace.emit({ kind: "refine", parentRunId: step.parentRunId, axis: step.refinementAxis, runId: step.runId });
    runs.push({ witness: child, step });
    state = planned.state;
    witness = child;
    steps += 1;
  }
  return { status: "accepted", final: witness, runs, skipped };
}
