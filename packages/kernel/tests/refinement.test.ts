import { describe, expect, it } from "vitest";
import * as fc from "fast-check";

import { DEFAULT_POLICY } from "@descent/identity";

import {
  RunLedger,
  changedAxes,
  defined,
  memoryTraceSink,
  runLadder,
  startingRung,
  witnessIdentity,
  type ContextSnapshot,
  type CoverStrategy,
  type LadderState,
  type ModeCandidate,
} from "../src/index.js";
import { policyWith, recordAdapter, testWorld } from "./helpers/records.js";

const full = { a: 1, b: 2, c: 3 };
const snapshots = { snap1: full, partial: { a: 1, b: 2 }, snap2: full };

const context = (ctxRef: string, contextId = "ctx.ladder"): ContextSnapshot => ({
  contextId,
  ctxRef,
  elements: ["a", "b", "c"],
});

const incomplete: CoverStrategy = { kind: "explicit", parts: [{ label: "A", support: ["a", "b"] }] };
const windowed: CoverStrategy = { kind: "windowed", size: 2, stride: 1 };

const start = (overrides: Partial<LadderState> = {}): LadderState => ({
  context: context("snap1"),
  coverStrategy: incomplete,
  normalizerId: "canonical-json.v1",
  policy: DEFAULT_POLICY,
  adapter: recordAdapter(snapshots),
  ...overrides,
});

const world = testWorld();

describe("startingRung", () => {
  it("starts at the lowest rung any failure class asks for", () => {
    expect(startingRung(["glue_non_contractible"])).toBe(2);
    expect(startingRung(["stability_failure"])).toBe(1);
    expect(startingRung(["glue_non_contractible", "locality_failure"])).toBe(0);
  });
});

describe("runLadder", () => {
  it("refines the cover first and skips candidates that change nothing", () => {
    const ledger = new RunLedger();
    const outcome = runLadder(start(), { covers: [incomplete, windowed] }, { world, ledger });
    expect(outcome.status).toBe("accepted");
    expect(outcome.runs).toHaveLength(2);
    const [root, refined] = outcome.runs;
    expect(root?.witness.failureClasses).toEqual(["descent_failure"]);
    expect(refined?.step).toEqual({
      parentRunId: root?.witness.runId,
      runId: refined?.witness.runId,
      refinementAxis: "cover_id",
      candidateIndex: 1,
    });
    expect(outcome.skipped).toEqual([{ axis: "cover_id", candidateIndex: 0, reason: "changes no identity axis" }]);
    expect(ledger.lineage(outcome.final.runId)).toHaveLength(2);
  });

  it("moves down to the context axis once covers run out", () => {
    const outcome = runLadder(
      start({ context: context("partial"), coverStrategy: windowed }),
      { contexts: [context("snap2", "ctx.elsewhere"), context("snap2")] },
      { world },
    );
    expect(outcome.runs[0]?.witness.failureClasses).toEqual(["locality_failure"]);
    expect(outcome.status).toBe("accepted");
    expect(outcome.runs[1]?.step?.refinementAxis).toBe("ctx_ref");
    expect(outcome.skipped).toEqual([{ axis: "ctx_ref", candidateIndex: 0, reason: "changes contextId" }]);
  });

  it("enriches evidence with a newer adapter version", () => {
    const silent = recordAdapter(snapshots, { proposeGlue: () => [] });
    const outcome = runLadder(
      start({ coverStrategy: windowed, adapter: silent }),
      {
        adapters: [
          recordAdapter(snapshots, { adapterId: "test.other", adapterVersion: "2" }),
          recordAdapter(snapshots, { adapterVersion: "2" }),
        ],
      },
      { world },
    );
    expect(outcome.status).toBe("accepted");
    expect(outcome.runs[1]?.step?.refinementAxis).toBe("adapter_version");
    expect(outcome.skipped).toEqual([{ axis: "adapter_version", candidateIndex: 0, reason: "changes adapterId" }]);
  });

  it("starts ambiguous runs at the evidence rung and falls through to policy", () => {
    const ambiguous = recordAdapter(
      {},
      {
        project: () => defined({}),
        restrict: (payload, from, to) => defined(to.length === from.length ? payload : {}),
        compatibility: () => defined({}),
        proposeGlue: () => [
          { proposalId: "p1", payload: { a: [1, 2] } },
          { proposalId: "p2", payload: { a: [2, 1] } },
        ],
      },
    );
    const trace = memoryTraceSink();
    const outcome = runLadder(
      start({ coverStrategy: windowed, adapter: ambiguous }),
      { covers: [incomplete], modes: [{ normalizerId: "sorted-arrays.v1", policy: DEFAULT_POLICY }] },
      { world, trace },
    );
    expect(outcome.runs[0]?.witness.failureClasses).toEqual(["glue_non_contractible"]);
    expect(outcome.status).toBe("accepted");
    expect(outcome.runs[1]?.step?.refinementAxis).toBe("mode");
    expect(outcome.skipped).toEqual([]);
    expect(trace.take().filter((tag) => tag.kind === "refine")).toHaveLength(1);
  });

  it("returns the last rejection when the plan is exhausted", () => {
    const outcome = runLadder(start(), {}, { world });
    expect(outcome.status).toBe("exhausted");
    expect(outcome.runs).toHaveLength(1);
    expect(outcome.final.result).toBe("rejected");
  });

  it("stops at the step bound", () => {
    const outcome = runLadder(start(), { covers: [windowed] }, { world, maxSteps: 0 });
    expect(outcome.status).toBe("step_limit");
    expect(outcome.runs).toHaveLength(1);
  });

  it("reads the step bound from the policy when no option is given", () => {
    const policy = policyWith({ maxRefinementSteps: 0 });
    const outcome = runLadder(start({ policy }), { covers: [windowed] }, { world });
    expect(outcome.status).toBe("step_limit");
  });

  it("changes exactly one axis between consecutive runs", () => {
    const coverPool: CoverStrategy[] = [
      incomplete,
      { kind: "singleton" },
      { kind: "windowed", size: 3, stride: 1 },
      windowed,
    ];
    const contextPool: ContextSnapshot[] = [context("snap1"), context("partial"), context("snap2", "ctx.elsewhere")];
    const modePool: ModeCandidate[] = [
      { normalizerId: "sorted-arrays.v1", policy: DEFAULT_POLICY },
      { normalizerId: "canonical-json.v1", policy: policyWith({ stabilityCheck: false }) },
    ];
    fc.assert(
      fc.property(
        fc.subarray(coverPool),
        fc.subarray(contextPool),
        fc.subarray(modePool),
        fc.integer({ min: 0, max: 5 }),
        (covers, contexts, modes, maxSteps) => {
          const plan = { covers, contexts, modes };
          const outcome = runLadder(start({ context: context("partial") }), plan, { world, maxSteps });
          expect(outcome.runs.length).toBeLessThanOrEqual(maxSteps + 1);
          for (const [index, run] of outcome.runs.entries()) {
            const parent = outcome.runs[index - 1];
            if (parent === undefined) continue;
            expect(changedAxes(witnessIdentity(parent.witness), witnessIdentity(run.witness))).toEqual([
              run.step?.refinementAxis,
            ]);
          }
          const again = runLadder(start({ context: context("partial") }), plan, { world, maxSteps });
          expect(again.runs.map((run) => run.witness.runId)).toEqual(outcome.runs.map((run) => run.witness.runId));
        },
      ),
      { numRuns: 40 },
    );
  });
});
