import { digestRef } from "./digest.js";

/** Identity material of one run; nothing derived (logs, caches, timings) belongs here. */
export interface RunIdentity {
  readonly worldId: string;
  readonly contextId: string;
  readonly coverId: string;
  readonly ctxRef: string;
  readonly dataHeadRef: string;
  readonly adapterId: string;
  readonly adapterVersion: string;
  readonly normalizerId: string;
  readonly policyDigest: string;
  /** Audit material unless `includeCoverStrategyDigest` hardens it into identity. */
  readonly coverStrategyDigest?: string;
}

export interface RunIdOptions {
  readonly includeCoverStrategyDigest: boolean;
}

export function computeRunId(identity: RunIdentity, options: RunIdOptions): string {
  const { coverStrategyDigest, ...rest } = identity;
  const material =
    options.includeCoverStrategyDigest && coverStrategyDigest !== undefined
      ? { ...rest, coverStrategyDigest }
      : rest;
  return digestRef("run1", { schema: 1, identity: material });
}

export interface CoverPartMaterial {
  readonly id: string;
  readonly support: readonly string[];
}

export function computeCoverId(contextId: string, parts: readonly CoverPartMaterial[]): string {
  return digestRef("cov1", {
    schema: 1,
    contextId,
    parts: parts.map((part) => ({ id: part.id, support: [...part.support] })),
  });
}

export function computeOverlapId(coverId: string, parts: readonly string[], support: readonly string[]): string {
  return digestRef("ov1", { schema: 1, coverId, parts: [...parts], support: [...support] });
}

export function computeStrategyDigest(strategy: unknown): string {
  return digestRef("strat1", { schema: 1, strategy });
}

export function computeDataHeadRef(material: unknown): string {
  return digestRef("data1", { schema: 1, material });
}
