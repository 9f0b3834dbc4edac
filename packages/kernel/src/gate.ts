import {
  CanonicalizeError,
  DEFAULT_POLICY,
  compareLabels,
  computeDataHeadRef,
  computePolicyDigest,
  computeRunId,
  digest,
  type GatePolicy,
  type OverlapLevel,
  type Result,
  type RunIdentity,
} from "@descent/identity";

import type { GateEnv } from "./adapter.js";
import { selectGlue } from "./contractibility.js";
import { buildCover, rejectedCoverId, strategyDigestOf } from "./cover.js";
import { checkCocycles, checkCompatibility, evaluateProposals, type CheckScope } from "./descent.js";
import { makeFailure, selectionFailure, type GateFailure } from "./failures.js";
import { checkLocality } from "./locality.js";
import { createComparator, highestSupportedLevel, supportsLevel, type ModeComparator } from "./normalizers.js";
import { enumerateObligations } from "./overlap.js";
import { checkStability } from "./stability.js";
import { nullTraceSink, type GateStage, type TraceSink } from "./trace.js";
import type { Cover, GateRequest } from "./types.js";
import { emitAccepted, emitRejected, isNonEmpty, type GateWitness, type WitnessHeader } from "./witness.js";

export function effectivePolicy(request: GateRequest): GatePolicy {
  return request.policy ?? { ...DEFAULT_POLICY, overlapLevel: request.overlapLevelRequested };
}

const contentRef = (value: unknown): string => {
  try {
    return digest(value);
  } catch (caught) {
    if (caught instanceof CanonicalizeError) return `invalid:${caught.code}`;
    throw caught;
  }
};

/** Data head derived from the inputs themselves; insensitive to their order. */
export function deriveDataHeadRef(request: GateRequest): string {
  return computeDataHeadRef({
    locals: Object.fromEntries(Object.entries(request.locals).map(([key, local]) => [key, contentRef(local)])),
    compat: request.compat.map(contentRef).sort(compareLabels),
    glueProposals: request.glueProposals.map(contentRef).sort(compareLabels),
    certificate: request.certificate === undefined ? undefined : contentRef(request.certificate),
  });
}

export interface ResolvedRun {
  readonly identity: RunIdentity;
  readonly header: WitnessHeader;
  readonly cover: Result<Cover>;
  readonly policy: GatePolicy;
}

/** Everything that names a run, computed before any check executes. */
export function resolveRun(request: GateRequest, env: GateEnv): ResolvedRun {
  const policy = effectivePolicy(request);
  const coverStrategyDigest = strategyDigestOf(request.coverStrategy);
  const cover = buildCover(
    { contextId: request.contextId, ctxRef: request.ctxRef, elements: request.elements },
    request.coverStrategy,
  );
  const identity: RunIdentity = {
    worldId: env.world.worldId,
    contextId: request.contextId,
    coverId: cover.ok ? cover.value.coverId : rejectedCoverId(request.contextId, request.coverStrategy),
    ctxRef: request.ctxRef,
    dataHeadRef: request.dataHeadRef ?? deriveDataHeadRef(request),
    adapterId: env.adapter.adapterId,
    adapterVersion: env.adapter.adapterVersion,
    normalizerId: request.mode.normalizerId,
    policyDigest: request.mode.policyDigest,
    coverStrategyDigest,
  };
  const runId = computeRunId(identity, { includeCoverStrategyDigest: policy.includeCoverStrategyDigest });
  return {
    identity,
    cover,
    policy,
    header: {
      runId,
      worldId: identity.worldId,
      contextId: identity.contextId,
      adapterId: identity.adapterId,
      adapterVersion: identity.adapterVersion,
      ctxRef: identity.ctxRef,
      dataHeadRef: identity.dataHeadRef,
      coverId: identity.coverId,
      coverStrategyDigest,
      normalizerId: identity.normalizerId,
      policyDigest: identity.policyDigest,
      overlapLevel: { requested: request.overlapLevelRequested },
    },
  };
}

type Negotiation =
  | { readonly ok: true; readonly level: OverlapLevel; readonly comparator: ModeComparator }
  | { readonly ok: false; readonly failures: GateFailure[] };

function negotiate(request: GateRequest, policy: GatePolicy, env: GateEnv): Negotiation {
  const failures: GateFailure[] = [];
  const world = { phase: "normalize", responsibleComponent: "world" } as const;
  const { mode } = request;
  if (mode.normalizerId.trim().length === 0 || mode.policyDigest.trim().length === 0) {
    failures.push(makeFailure({ ...world, class: "descent_failure", message: "mode is missing a normalizer or policy digest" }));
  } else {
    const expected = computePolicyDigest(policy);
    if (expected !== mode.policyDigest || policy.overlapLevel !== request.overlapLevelRequested) {
      failures.push(
        makeFailure({
          ...world,
          class: "descent_failure",
          message: "policy digest does not bind the declared policy and overlap level",
          details: { expected, actual: mode.policyDigest, policyLevel: policy.overlapLevel },
        }),
      );
    }
  }
  if (!supportsLevel(env.world, request.overlapLevelRequested)) {
    failures.push(
      makeFailure({
        ...world,
        class: "descent_failure",
        message: `world ${env.world.worldId} does not support ${request.overlapLevelRequested} overlaps`,
        overlapLevelRequested: request.overlapLevelRequested,
        overlapLevelSupported: highestSupportedLevel(env.world),
      }),
    );
  }
  const comparator = createComparator(env.world, mode);
  if (!comparator.ok) {
    failures.push(
      selectionFailure("mode_comparison_unavailable", {
        ...world,
        message: comparator.error.explain,
        details: comparator.error.details,
      }),
    );
  }
  if (failures.length > 0 || !comparator.ok) return { ok: false, failures };
  return { ok: true, level: request.overlapLevelRequested, comparator: comparator.value };
}

/** Overlap level to enumerate under: the negotiated one, or the best stand-in when negotiation failed. */
function enumerationLevel(request: GateRequest, env: GateEnv, negotiated: Negotiation): OverlapLevel {
  if (negotiated.ok) return negotiated.level;
  return supportsLevel(env.world, request.overlapLevelRequested) ? request.overlapLevelRequested : "pairwise";
}

/**
 * The gate: a pure function from request and environment to one terminal
 * witness. Stages run in a fixed order and the first stage that fails
 * decides the verdict, except that locality is always checked beside
 * negotiation so a missing witness is never hidden by a mode problem.
 */
export function runGate(request: GateRequest, env: GateEnv): GateWitness {
  const trace: TraceSink = env.trace ?? nullTraceSink;
  const resolved = resolveRun(request, env);
  let header = resolved.header;

  const stage = (name: GateStage, failures: readonly GateFailure[]): boolean => {
    trace.emit({ kind: "stage", stage: name, failures: failures.length });
    return failures.length === 0;
  };
  const reject = (failures: readonly GateFailure[]): GateWitness => {
    if (!isNonEmpty(failures)) {
      throw new Error("gate rejected without a failure");
    }
    const witness = emitRejected(header, failures);
    trace.emit({
      kind: "verdict",
      runId: witness.runId,
      result: witness.result,
      failureClasses: witness.failureClasses,
    });
    return witness;
  };

  if (!resolved.cover.ok) {
    const { code, explain, details } = resolved.cover.error;
    const failures = [
      makeFailure({
        class: "descent_failure",
        phase: "restrict",
        responsibleComponent: "adapter",
        message: `cover rejected: ${explain}`,
        details: { code, ...(details === undefined ? {} : { cause: details }) },
      }),
    ];
    stage("cover", failures);
    return reject(failures);
  }
  const cover = resolved.cover.value;
  trace.emit({ kind: "cover", coverId: cover.coverId, parts: cover.parts.length });

  const check = (): GateWitness => {
    const negotiated = negotiate(request, resolved.policy, env);
    stage("negotiate", negotiated.ok ? [] : negotiated.failures);
    const level = enumerationLevel(request, env, negotiated);

    const obligations = enumerateObligations(cover, level);
    trace.emit({ kind: "overlaps", level, count: obligations.length });

    const locality = checkLocality(cover, obligations, request.locals, request.compat);
    const localityHolds = stage("locality", locality.failures);
    if (!negotiated.ok) return reject([...locality.failures, ...negotiated.failures]);
    if (!localityHolds) return reject(locality.failures);
    header = { ...header, overlapLevel: { requested: request.overlapLevelRequested, negotiated: negotiated.level } };

    const scope: CheckScope = {
      cover,
      adapter: env.adapter,
      comparator: negotiated.comparator,
      locals: locality.locals,
    };
    const coherence = [
      ...checkCompatibility(scope, obligations, locality.witnesses),
      ...(negotiated.level === "higher_cech" ? checkCocycles(scope, obligations, locality.witnesses) : []),
    ];
    if (coherence.length > 0) {
      stage("descent", coherence);
      return reject(coherence);
    }
    const evaluation = evaluateProposals(scope, request.glueProposals);
    if (!stage("descent", evaluation.unavailable)) return reject(evaluation.unavailable);

    if (resolved.policy.stabilityCheck) {
      const unstable = checkStability(scope, evaluation.valid, obligations);
      if (!stage("stability", unstable)) return reject(unstable);
    }

    const selection = selectGlue({
      mode: request.mode,
      cover,
      obligations,
      valid: evaluation.valid,
      rejected: evaluation.rejected,
      supplied: request.glueProposals.length,
      certificate: request.certificate,
    });
    if (selection.kind === "failed") {
      stage("contractibility", [selection.failure]);
      return reject([selection.failure]);
    }
    stage("contractibility", []);
    const witness = emitAccepted(header, selection.glue);
    trace.emit({ kind: "verdict", runId: witness.runId, result: witness.result, failureClasses: [] });
    return witness;
  };

  try {
    return check();
  } catch (caught) {
    if (!(caught instanceof CanonicalizeError)) throw caught;
    return reject([
      makeFailure({
        class: "descent_failure",
        phase: "normalize",
        responsibleComponent: "world",
        message: `input is not canonical data: ${caught.detail}`,
        details: { code: caught.code },
      }),
    ]);
  }
}
