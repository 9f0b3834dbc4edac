import { describe, expect, it } from "vitest";

import { createMode } from "@descent/identity";

import { LedgerConflictError, RunLedger, runGate, type GateWitness, type RefinementAxis } from "../src/index.js";
import { recordAdapter, testWorld, twoPartRequest } from "./helpers/records.js";

const env = { world: testWorld(), adapter: recordAdapter() };

const root = runGate(twoPartRequest(), env);
const moved = runGate(twoPartRequest({ ctxRef: "snap2" }), env);

const stepTo = (parent: GateWitness, child: GateWitness, refinementAxis: RefinementAxis) => ({
  parentRunId: parent.runId,
  runId: child.runId,
  refinementAxis,
  candidateIndex: 0,
});

describe("RunLedger", () => {
  it("records a one-axis child under its parent", () => {
    const ledger = new RunLedger();
    expect(ledger.append({ witness: root })).toBe("appended");
    expect(ledger.append({ witness: moved, step: stepTo(root, moved, "ctx_ref") })).toBe("appended");
    expect(ledger.size).toBe(2);
    expect(ledger.get(moved.runId)?.step?.refinementAxis).toBe("ctx_ref");
  });

  it("treats a repeated identical run as a duplicate", () => {
    const ledger = new RunLedger();
    ledger.append({ witness: root });
    expect(ledger.append({ witness: runGate(twoPartRequest(), env) })).toBe("duplicate");
    expect(ledger.size).toBe(1);
  });

  it("records a new step that reaches an already recorded run", () => {
    const ledger = new RunLedger();
    ledger.append({ witness: root });
    ledger.append({ witness: moved, step: stepTo(root, moved, "ctx_ref") });
    const back = stepTo(moved, root, "ctx_ref");
    expect(ledger.append({ witness: root, step: back })).toBe("duplicate");
    expect(ledger.append({ witness: root, step: back })).toBe("duplicate");
    expect(ledger.size).toBe(2);
    expect(ledger.steps()).toEqual([stepTo(root, moved, "ctx_ref"), back]);
    expect(ledger.get(root.runId)?.step).toBeUndefined();
  });

  it("checks a step even when its run is already recorded", () => {
    const ledger = new RunLedger();
    ledger.append({ witness: root });
    ledger.append({ witness: moved, step: stepTo(root, moved, "ctx_ref") });
    expect(() => ledger.append({ witness: root, step: stepTo(moved, root, "mode") })).toThrow(/E_REFINE_AXIS_MISMATCH/);
    expect(() => ledger.append({ witness: root, step: stepTo(root, root, "ctx_ref") })).toThrow(/E_REFINE_NO_AXIS/);
    expect(ledger.steps()).toHaveLength(1);
  });

  it("refuses a different witness under an existing run id", () => {
    const ledger = new RunLedger();
    ledger.append({ witness: root });
    expect(() => ledger.append({ witness: { ...root, witnessDigest: "gw1_forged" } })).toThrow(LedgerConflictError);
  });

  it("requires the parent to be recorded first", () => {
    const ledger = new RunLedger();
    expect(() => ledger.append({ witness: moved, step: stepTo(root, moved, "ctx_ref") })).toThrow(/E_REFINE_PARENT/);
  });

  it("refuses steps whose axis does not match the identity change", () => {
    const ledger = new RunLedger();
    ledger.append({ witness: root });
    expect(() => ledger.append({ witness: moved, step: stepTo(root, moved, "mode") })).toThrow(
      /E_REFINE_AXIS_MISMATCH/,
    );
  });

  it("refuses steps that change several axes, none, or the context", () => {
    const ledger = new RunLedger();
    ledger.append({ witness: root });
    const both = runGate(twoPartRequest({ ctxRef: "snap2", mode: createMode("sorted-arrays.v1") }), env);
    expect(() => ledger.append({ witness: both, step: stepTo(root, both, "ctx_ref") })).toThrow(/E_REFINE_MULTI_AXIS/);
    const pinned = runGate(twoPartRequest({ dataHeadRef: "data1_pinned" }), env);
    expect(() => ledger.append({ witness: pinned, step: stepTo(root, pinned, "ctx_ref") })).toThrow(/E_REFINE_NO_AXIS/);
    const elsewhere = runGate(twoPartRequest({ contextId: "ctx.elsewhere" }), env);
    expect(() => ledger.append({ witness: elsewhere, step: stepTo(root, elsewhere, "cover_id") })).toThrow(
      /E_REFINE_PARENT/,
    );
    expect(ledger.size).toBe(1);
  });

  it("walks lineage back to the root", () => {
    const ledger = new RunLedger();
    const sorted = runGate(twoPartRequest({ ctxRef: "snap2", mode: createMode("sorted-arrays.v1") }), env);
    ledger.append({ witness: root });
    ledger.append({ witness: moved, step: stepTo(root, moved, "ctx_ref") });
    ledger.append({ witness: sorted, step: stepTo(moved, sorted, "mode") });
    expect(ledger.lineage(sorted.runId).map((entry) => entry.witness.runId)).toEqual([
      root.runId,
      moved.runId,
      sorted.runId,
    ]);
    expect(ledger.entries().map((entry) => entry.witness.runId)).toEqual([root.runId, moved.runId, sorted.runId]);
    expect(ledger.lineage("run1_unknown")).toEqual([]);
  });
});
