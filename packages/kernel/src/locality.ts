import { CanonicalizeError, canonicalLabel, canonicalize, compareLabels } from "@descent/identity";

import { normalizePartId } from "./cover.js";
import { makeFailure, type GateFailure } from "./failures.js";
import type { CompatWitness, Cover, CoverPartId, LocalState, OverlapId, OverlapObligation } from "./types.js";

export interface LocalityOutcome {
  readonly failures: readonly GateFailure[];
  readonly locals: ReadonlyMap<CoverPartId, LocalState>;
  readonly witnesses: ReadonlyMap<OverlapId, CompatWitness>;
}

const isCanonical = (value: unknown): boolean => {
  try {
    canonicalize(value);
    return true;
  } catch (caught) {
    if (caught instanceof CanonicalizeError) return false;
    throw caught;
  }
};

const sameParts = (left: readonly string[], right: readonly string[]): boolean =>
  left.length === right.length && left.every((part, index) => part === right[index]);

function collectLocals(
  cover: Cover,
  supplied: Readonly<Record<string, unknown>>,
  failures: GateFailure[],
): Map<CoverPartId, LocalState> {
  const byPart = new Map<CoverPartId, string[]>();
  for (const key of Object.keys(supplied).sort(compareLabels)) {
    const id = normalizePartId(key);
    byPart.set(id, [...(byPart.get(id) ?? []), key]);
  }
  const locals = new Map<CoverPartId, LocalState>();
  for (const part of cover.parts) {
    const keys = byPart.get(part.id) ?? [];
    const [key] = keys;
    if (key === undefined) {
      failures.push(
        makeFailure({
          class: "locality_failure",
          phase: "restrict",
          responsibleComponent: "adapter",
          message: `no local state for cover part ${part.id}`,
          coverPartId: part.id,
        }),
      );
      continue;
    }
    if (keys.length > 1) {
      failures.push(
        makeFailure({
          class: "locality_failure",
          phase: "restrict",
          responsibleComponent: "adapter",
          message: `several local states claim cover part ${part.id}`,
          coverPartId: part.id,
          details: { keys },
        }),
      );
      continue;
    }
    const payload = supplied[key];
    if (payload === undefined || !isCanonical(payload)) {
      failures.push(
        makeFailure({
          class: "locality_failure",
          phase: "restrict",
          responsibleComponent: "adapter",
          message: `local state for cover part ${part.id} is not canonical data`,
          coverPartId: part.id,
        }),
      );
      continue;
    }
    locals.set(part.id, { partId: part.id, payload });
  }
  return locals;
}

function witnessProblem(obligation: OverlapObligation, witness: CompatWitness): string | undefined {
  const parts = witness.parts.map(normalizePartId).sort(compareLabels);
  if (!sameParts(parts, obligation.parts)) {
    return `names parts [${parts.join(", ")}] instead of [${obligation.parts.join(", ")}]`;
  }
  if (!isCanonical({ agreed: witness.agreed, payload: witness.payload })) {
    return "carries a payload that is not canonical data";
  }
  return undefined;
}

function collectWitnesses(
  obligations: readonly OverlapObligation[],
  supplied: readonly CompatWitness[],
  failures: GateFailure[],
): Map<OverlapId, CompatWitness> {
  const byOverlap = new Map<OverlapId, CompatWitness[]>();
  for (const witness of supplied) {
    byOverlap.set(witness.overlapId, [...(byOverlap.get(witness.overlapId) ?? []), witness]);
  }
  const witnesses = new Map<OverlapId, CompatWitness>();
  for (const obligation of obligations) {
    const located = {
      class: "locality_failure" as const,
      phase: "compat" as const,
      responsibleComponent: "adapter" as const,
      overlapId: obligation.overlapId,
      overlapArity: obligation.arity,
    };
    const candidates = byOverlap.get(obligation.overlapId) ?? [];
    const distinct = new Map<string, CompatWitness>();
    for (const candidate of candidates) {
      const label = isCanonical(candidate) ? canonicalLabel(candidate) : `#${distinct.size}`;
      if (!distinct.has(label)) distinct.set(label, candidate);
    }
    const [witness] = distinct.values();
    if (witness === undefined) {
      failures.push(
        makeFailure({
          ...located,
          message: `no compatibility witness for overlap of [${obligation.parts.join(", ")}]`,
        }),
      );
      continue;
    }
    if (distinct.size > 1) {
      failures.push(
        makeFailure({
          ...located,
          message: `${distinct.size} conflicting compatibility witnesses for overlap of [${obligation.parts.join(", ")}]`,
        }),
      );
      continue;
    }
    const problem = witnessProblem(obligation, witness);
    if (problem !== undefined) {
      failures.push(makeFailure({ ...located, message: `compatibility witness ${problem}` }));
      continue;
    }
    witnesses.set(obligation.overlapId, witness);
  }
  return witnesses;
}

/**
 * Structural check only: every part has a local and every obligation has one
 * well-formed witness. Whether the witnesses hold is decided later.
 */
export function checkLocality(
  cover: Cover,
  obligations: readonly OverlapObligation[],
  locals: Readonly<Record<string, unknown>>,
  compat: readonly CompatWitness[],
): LocalityOutcome {
  const failures: GateFailure[] = [];
  return {
    locals: collectLocals(cover, locals, failures),
    witnesses: collectWitnesses(obligations, compat, failures),
    failures,
  };
}
