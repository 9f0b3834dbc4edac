import { compareLabels, computeOverlapId, overlapLevelRank, type OverlapLevel } from "@descent/identity";

import type { Cover, CoverPart, OverlapObligation } from "./types.js";

const intersect = (parts: readonly CoverPart[]): string[] => {
  const [first, ...rest] = parts;
  if (first === undefined) return [];
  return first.support.filter((element) => rest.every((part) => part.support.includes(element)));
};

function* combinations(parts: readonly CoverPart[], arity: number, start = 0): Generator<CoverPart[]> {
  if (arity === 0) {
    yield [];
    return;
  }
  for (let index = start; index <= parts.length - arity; index += 1) {
    const head = parts[index];
    if (head === undefined) continue;
    for (const tail of combinations(parts, arity - 1, index + 1)) {
      yield [head, ...tail];
    }
  }
}

const compareTuples = (left: readonly string[], right: readonly string[]): number => {
  const length = Math.min(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const order = compareLabels(left[index] ?? "", right[index] ?? "");
    if (order !== 0) return order;
  }
  return left.length - right.length;
};

/** Ordering key: arity, then the part-id tuple, then the overlap id. */
export function compareObligations(left: OverlapObligation, right: OverlapObligation): number {
  return (
    left.arity - right.arity ||
    compareTuples(left.parts, right.parts) ||
    compareLabels(left.overlapId, right.overlapId)
  );
}

/**
 * Every pair (and, at `higher_cech`, every triple) of parts whose supports
 * share at least one element becomes an obligation.
 */
export function enumerateObligations(cover: Cover, level: OverlapLevel): OverlapObligation[] {
  const maxArity = overlapLevelRank(level);
  const obligations: OverlapObligation[] = [];
  for (let arity = 2; arity <= maxArity; arity += 1) {
    for (const group of combinations(cover.parts, arity)) {
      const support = intersect(group);
      if (support.length === 0) continue;
      const parts = group.map((part) => part.id).sort(compareLabels);
      obligations.push({
        overlapId: computeOverlapId(cover.coverId, parts, support),
        arity,
        parts,
        support,
      });
    }
  }
  return obligations.sort(compareObligations);
}
