import { assertOneAxis, type RefinementStep } from "./axes.js";
import { LedgerConflictError, RefinementInvariantError } from "./errors.js";
import { witnessIdentity, type GateWitness } from "./witness.js";

export interface LedgerEntry {
  readonly witness: GateWitness;
  readonly step?: RefinementStep;
}

const sameStep = (left: RefinementStep, right: RefinementStep): boolean =>
  left.parentRunId === right.parentRunId &&
  left.runId === right.runId &&
  left.refinementAxis === right.refinementAxis &&
  left.candidateIndex === right.candidateIndex;

/**
 * Append-only run table keyed by run id. A parent run id is a lookup key;
 * entries never hold each other. A run reached again by a new step keeps its
 * first entry; the new step is still checked and recorded.
 */
export class RunLedger {
  private readonly byRunId = new Map<string, LedgerEntry>();
  private readonly order: string[] = [];
  private readonly recordedSteps: RefinementStep[] = [];

  get size(): number {
    return this.order.length;
  }

  append(entry: LedgerEntry): "appended" | "duplicate" {
    const { witness, step } = entry;
    const existing = this.byRunId.get(witness.runId);
    if (existing !== undefined && existing.witness.witnessDigest !== witness.witnessDigest) {
      throw new LedgerConflictError(witness.runId, existing.witness.witnessDigest, witness.witnessDigest);
    }
    if (step !== undefined) {
      this.checkStep(step, witness);
      if (!this.recordedSteps.some((recorded) => sameStep(recorded, step))) this.recordedSteps.push(step);
    }
    if (existing !== undefined) return "duplicate";
    this.byRunId.set(witness.runId, entry);
    this.order.push(witness.runId);
    return "appended";
  }

  private checkStep(step: RefinementStep, witness: GateWitness): void {
    if (step.runId !== witness.runId) {
      throw new RefinementInvariantError("E_REFINE_PARENT", `step names run ${step.runId}, witness is ${witness.runId}`);
    }
    const parent = this.byRunId.get(step.parentRunId);
    if (parent === undefined) {
      throw new RefinementInvariantError("E_REFINE_PARENT", `parent run ${step.parentRunId} is not recorded`);
    }
    assertOneAxis(witnessIdentity(parent.witness), witnessIdentity(witness), step.refinementAxis);
  }

  /** Every distinct step in append order, including those that reached an already recorded run. */
  steps(): RefinementStep[] {
    return [...this.recordedSteps];
  }

  get(runId: string): LedgerEntry | undefined {
    return this.byRunId.get(runId);
  }

  entries(): LedgerEntry[] {
    return this.order.flatMap((runId) => {
      const entry = this.byRunId.get(runId);
      return entry === undefined ? [] : [entry];
    });
  }

  /** The chain of runs ending at `runId`, root first. */
  lineage(runId: string): LedgerEntry[] {
    const chain: LedgerEntry[] = [];
    let cursor: string | undefined = runId;
    while (cursor !== undefined) {
      const entry = this.byRunId.get(cursor);
      if (entry === undefined) break;
      chain.unshift(entry);
      cursor = entry.step?.parentRunId;
    }
    return chain;
  }
}
