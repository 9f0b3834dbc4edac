import { digestRef, type OverlapLevel, type RunIdentity } from "@descent/identity";

import type { GlueResult } from "./contractibility.js";
import { failureClassesOf, orderFailures, type FailureClass, type GateFailure } from "./failures.js";

export type NonEmpty<T> = readonly [T, ...T[]];

export const isNonEmpty = <T>(items: readonly T[]): items is NonEmpty<T> => items.length > 0;

export interface OverlapLevelRecord {
  readonly requested: OverlapLevel;
  /** Absent when negotiation failed. */
  readonly negotiated?: OverlapLevel;
}

export interface WitnessHeader {
  readonly runId: string;
  readonly worldId: string;
  readonly contextId: string;
  readonly adapterId: string;
  readonly adapterVersion: string;
  readonly ctxRef: string;
  readonly dataHeadRef: string;
  readonly coverId: string;
  readonly coverStrategyDigest: string;
  readonly normalizerId: string;
  readonly policyDigest: string;
  readonly overlapLevel: OverlapLevelRecord;
}

interface SealedHeader extends WitnessHeader {
  readonly witnessSchema: 1;
  readonly witnessKind: "gate";
  readonly witnessDigest: string;
}

export interface AcceptedWitness extends SealedHeader {
  readonly result: "accepted";
  readonly failureClasses: readonly [];
  readonly failures: readonly [];
  readonly glueResult: GlueResult;
}

export interface RejectedWitness extends SealedHeader {
  readonly result: "rejected";
  readonly failureClasses: NonEmpty<FailureClass>;
  readonly failures: NonEmpty<GateFailure>;
  readonly glueResult?: undefined;
}

/** Either a glue result and no failures, or failures and no glue result. */
export type GateWitness = AcceptedWitness | RejectedWitness;

const sealDigest = (unsealed: object): string => digestRef("gw1", unsealed);

export function emitAccepted(header: WitnessHeader, glueResult: GlueResult): AcceptedWitness {
  const body = {
    witnessSchema: 1,
    witnessKind: "gate",
    ...header,
    result: "accepted",
    failureClasses: [],
    failures: [],
    glueResult,
  } as const;
  return { ...body, witnessDigest: sealDigest(body) };
}

export function emitRejected(header: WitnessHeader, failures: NonEmpty<GateFailure>): RejectedWitness {
  const ordered = orderFailures(failures);
  const classes = failureClassesOf(ordered);
  if (!isNonEmpty(ordered) || !isNonEmpty(classes)) {
    throw new Error("rejected witness needs at least one failure");
  }
  const body = {
    witnessSchema: 1,
    witnessKind: "gate",
    ...header,
    result: "rejected",
    failureClasses: classes,
    failures: ordered,
  } as const;
  return { ...body, witnessDigest: sealDigest(body) };
}

/** Re-derives the digest of a witness, e.g. one read back from storage. */
export function witnessDigestOf(witness: GateWitness): string {
  const { witnessDigest: _sealed, ...body } = witness;
  return sealDigest(body);
}

export function holdsExactlyOne(witness: GateWitness): boolean {
  const hasGlue = witness.glueResult !== undefined;
  const hasFailures = witness.failureClasses.length > 0 && witness.failures.length > 0;
  return hasGlue !== hasFailures && (witness.result === "accepted") === hasGlue;
}

export function witnessIdentity(witness: GateWitness): RunIdentity {
  return {
    worldId: witness.worldId,
    contextId: witness.contextId,
    coverId: witness.coverId,
    ctxRef: witness.ctxRef,
    dataHeadRef: witness.dataHeadRef,
    adapterId: witness.adapterId,
    adapterVersion: witness.adapterVersion,
    normalizerId: witness.normalizerId,
    policyDigest: witness.policyDigest,
    coverStrategyDigest: witness.coverStrategyDigest,
  };
}
