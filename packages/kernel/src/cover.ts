import {
  CanonicalizeError,
  compareLabels,
  computeCoverId,
  computeStrategyDigest,
  digestRef,
  err,
  ok,
  type Result,
} from "@descent/identity";

import type { ContextSnapshot, Cover, CoverPart, CoverStrategy, ExplicitPartSpec } from "./types.js";

interface DraftPart {
  readonly id: string;
  readonly support: readonly string[];
}

export const normalizePartId = (label: string): string => label.normalize("NFC").trim();

const sortedUnique = (items: Iterable<string>): string[] => [...new Set(items)].sort(compareLabels);

function explicitParts(context: ContextSnapshot, specs: readonly ExplicitPartSpec[]): Result<DraftPart[]> {
  const known = new Set(context.elements);
  const seen = new Set<string>();
  const parts: DraftPart[] = [];
  for (const [position, spec] of specs.entries()) {
    const id = normalizePartId(spec.label);
    if (id.length === 0) {
      return err("E_COVER_PART_ID", `part #${position} has an empty id`, { position });
    }
    if (seen.has(id)) {
      return err("E_COVER_PART_ID", `duplicate part id ${id}`, { partId: id });
    }
    seen.add(id);
    const outside = spec.support.filter((element) => !known.has(element));
    if (outside.length > 0) {
      return err("E_COVER_SUPPORT", `part ${id} names elements outside the context`, {
        partId: id,
        elements: sortedUnique(outside),
      });
    }
    if (spec.support.length === 0) {
      return err("E_COVER_SUPPORT", `part ${id} has an empty support`, { partId: id });
    }
    parts.push({ id, support: sortedUnique(spec.support) });
  }
  return ok(parts);
}

function windowedParts(context: ContextSnapshot, size: number, stride: number): Result<DraftPart[]> {
  if (!Number.isSafeInteger(size) || !Number.isSafeInteger(stride) || size < 1 || stride < 1) {
    return err("E_COVER_WINDOW", "window size and stride must be positive safe integers", {
      size: String(size),
      stride: String(stride),
    });
  }
  if (stride > size) {
    return err("E_COVER_WINDOW", `stride ${stride} exceeds size ${size} and leaves gaps`, { size, stride });
  }
  const windows: string[][] = [];
  for (let start = 0; start < context.elements.length; start += stride) {
    windows.push(context.elements.slice(start, start + size));
    if (start + size >= context.elements.length) break;
  }
  const width = String(Math.max(windows.length - 1, 0)).length;
  return ok(
    windows.map((window, index) => ({ id: `w${String(index).padStart(width, "0")}`, support: sortedUnique(window) })),
  );
}

function draftParts(context: ContextSnapshot, strategy: CoverStrategy): Result<DraftPart[]> {
  switch (strategy.kind) {
    case "explicit":
      return explicitParts(context, strategy.parts);
    case "windowed":
      return windowedParts(context, strategy.size, strategy.stride);
    case "singleton":
      return ok(context.elements.map((element) => ({ id: normalizePartId(`e:${element}`), support: [element] })));
  }
}

/** Builds the kernel-owned cover of a context; parts are ordered by id. */
export function buildCover(context: ContextSnapshot, strategy: CoverStrategy): Result<Cover> {
  if (context.elements.length === 0) {
    return err("E_COVER_CONTEXT", `context ${context.contextId} has no elements`);
  }
  const support = sortedUnique(context.elements);
  if (support.length !== context.elements.length) {
    return err("E_COVER_CONTEXT", `context ${context.contextId} repeats elements`);
  }
  const drafted = draftParts(context, strategy);
  if (!drafted.ok) return drafted;
  const ids = drafted.value.map((part) => part.id);
  const clash = ids.find((id, index) => ids.indexOf(id) !== index);
  if (clash !== undefined) {
    return err("E_COVER_PART_ID", `duplicate part id ${clash}`, { partId: clash });
  }

  const covered = new Set(drafted.value.flatMap((part) => part.support));
  const uncovered = support.filter((element) => !covered.has(element));
  if (uncovered.length > 0) {
    return err("E_COVER_INCOMPLETE", "cover misses context elements", { elements: uncovered });
  }

  const parts: CoverPart[] = [...drafted.value]
    .sort((a, b) => compareLabels(a.id, b.id))
    .map((part, index) => ({ id: part.id, index, support: part.support }));
  return ok({
    coverId: computeCoverId(context.contextId, parts),
    contextId: context.contextId,
    support,
    parts,
    strategyDigest: strategyDigestOf(strategy),
  });
}

/** Digest of a strategy; one that is not canonical data digests its canonicalization error instead. */
export function strategyDigestOf(strategy: CoverStrategy): string {
  try {
    return computeStrategyDigest(strategy);
  } catch (caught) {
    if (caught instanceof CanonicalizeError) {
      return computeStrategyDigest({ uncanonical: caught.code, detail: caught.detail });
    }
    throw caught;
  }
}

/** Stand-in cover id for a strategy the kernel could not turn into a cover. */
export function rejectedCoverId(contextId: string, strategy: CoverStrategy): string {
  return digestRef("cov1", { schema: 1, contextId, rejectedStrategy: strategyDigestOf(strategy) });
}
