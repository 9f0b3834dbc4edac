import { digestRef } from "./digest.js";

export type OverlapLevel = "pairwise" | "higher_cech";

/** The binding that fixes every comparison made during one run. */
export interface Mode {
  readonly normalizerId: string;
  readonly policyDigest: string;
}

export interface GatePolicy {
  readonly overlapLevel: OverlapLevel;
  readonly stabilityCheck: boolean;
  readonly includeCoverStrategyDigest: boolean;
  /** Scheduling only; never part of the policy digest. */
  readonly maxRefinementSteps?: number;
}

export const DEFAULT_POLICY: GatePolicy = Object.freeze({
  overlapLevel: "pairwise",
  stabilityCheck: true,
  includeCoverStrategyDigest: false,
});

export type PolicyIdentity = Pick<GatePolicy, "overlapLevel" | "stabilityCheck" | "includeCoverStrategyDigest">;

export function policyIdentity(policy: GatePolicy): PolicyIdentity {
  return {
    overlapLevel: policy.overlapLevel,
    stabilityCheck: policy.stabilityCheck,
    includeCoverStrategyDigest: policy.includeCoverStrategyDigest,
  };
}

export function computePolicyDigest(policy: GatePolicy): string {
  return digestRef("pol1", { schema: 1, policy: policyIdentity(policy) });
}

export function createMode(normalizerId: string, policy: GatePolicy = DEFAULT_POLICY): Mode {
  return { normalizerId, policyDigest: computePolicyDigest(policy) };
}

export function overlapLevelRank(level: OverlapLevel): number {
  return level === "pairwise" ? 2 : 3;
}
