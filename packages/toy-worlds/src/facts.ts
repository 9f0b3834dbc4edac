import { compareLabels, err, isPlainObject, ok, type Result } from "@descent/identity";
import {
  defined,
  undefinedRestriction,
  type ContextSnapshot,
  type CoverPart,
  type DescentAdapter,
  type DescentCore,
  type GlueProposal,
  type LocalState,
  type OverlapObligation,
  type Restriction,
} from "@descent/kernel";

export type FactValue = string | number | boolean | null;

/** Facts of one context snapshot, keyed by context element. */
export type FactSheet = Readonly<Record<string, FactValue>>;

/** Snapshots by `ctxRef`. */
export type SnapshotStore = Readonly<Record<string, FactSheet>>;

export const FACTS_VARIANTS = ["sheaf", "stale", "partial", "non_separated", "unstable"] as const;

export type FactsVariant = (typeof FACTS_VARIANTS)[number];

export const FACTS_ADAPTER_ID = "toy.facts";

export interface FactsAdapterOptions {
  readonly snapshots: SnapshotStore;
  readonly variant?: FactsVariant;
  readonly version?: string;
  /** Snapshot the `stale` variant reads odd parts from. */
  readonly staleRef?: string;
}

export const isFactsVariant = (value: string): value is FactsVariant =>
  FACTS_VARIANTS.some((variant) => variant === value);

const isFactValue = (value: unknown): value is FactValue =>
  value === null || typeof value === "string" || typeof value === "boolean" || Number.isSafeInteger(value);

function asSheet(payload: unknown): Record<string, FactValue> | undefined {
  if (!isPlainObject(payload)) return undefined;
  const sheet: Record<string, FactValue> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!isFactValue(value)) return undefined;
    sheet[key] = value;
  }
  return sheet;
}

function pick(sheet: FactSheet, keys: readonly string[]): Record<string, FactValue> | undefined {
  const out: Record<string, FactValue> = {};
  for (const key of keys) {
    const value = sheet[key];
    if (value === undefined) return undefined;
    out[key] = value;
  }
  return out;
}

/** Reads a snapshot store from JSON: `{ctxRef: {element: fact}}`. */
export function parseSnapshotStore(value: unknown): Result<SnapshotStore> {
  if (!isPlainObject(value)) return err("E_SNAPSHOTS", "snapshot store must be an object keyed by ctxRef");
  const store: Record<string, FactSheet> = {};
  for (const [ctxRef, candidate] of Object.entries(value)) {
    const sheet = asSheet(candidate);
    if (sheet === undefined) {
      return err("E_SNAPSHOTS", `snapshot ${ctxRef} must map elements to strings, integers, booleans or null`, {
        ctxRef,
      });
    }
    store[ctxRef] = sheet;
  }
  return ok(store);
}

/** Plain restriction of a sheet: its keys must be exactly `from`. */
export function restrictSheet(payload: unknown, from: readonly string[], to: readonly string[]): Restriction {
  const sheet = asSheet(payload);
  if (sheet === undefined) return undefinedRestriction("payload is not a fact sheet");
  const keys = Object.keys(sheet).sort(compareLabels);
  const expected = [...from].sort(compareLabels);
  if (keys.length !== expected.length || keys.some((key, index) => key !== expected[index])) {
    return undefinedRestriction(`sheet covers [${keys.join(", ")}], not [${expected.join(", ")}]`);
  }
  const picked = pick(sheet, to);
  return picked === undefined ? undefinedRestriction("target is not a subset of the source") : defined(picked);
}

const blank = (keys: readonly string[]): Record<string, FactValue> =>
  Object.fromEntries(keys.map((key) => [key, null]));

function mergeLocals(locals: ReadonlyMap<string, LocalState>, order: readonly string[]): Record<string, FactValue> {
  const merged: Record<string, FactValue> = {};
  for (const partId of order) {
    const sheet = asSheet(locals.get(partId)?.payload);
    if (sheet === undefined) continue;
    for (const [key, value] of Object.entries(sheet)) {
      if (!(key in merged)) merged[key] = value;
    }
  }
  return merged;
}

/**
 * Keyed-fact adapter. `sheaf` is the well-behaved world; the other variants
 * each break one descent law on purpose.
 */
export function createFactsAdapter(options: FactsAdapterOptions): DescentAdapter {
  const variant = options.variant ?? "sheaf";
  const version = options.version ?? (variant === "sheaf" ? "1.0.0" : `1.0.0-${variant}`);

  const project = (context: ContextSnapshot, part: CoverPart): Restriction => {
    if (variant === "partial" && part.index % 2 === 1) {
      return undefinedRestriction(`part ${part.id} is not projected`);
    }
    const ref = variant === "stale" && part.index % 2 === 1 ? (options.staleRef ?? context.ctxRef) : context.ctxRef;
    const sheet = options.snapshots[ref];
    if (sheet === undefined) return undefinedRestriction(`no snapshot ${ref}`);
    const picked = pick(sheet, part.support);
    if (picked === undefined) return undefinedRestriction(`snapshot ${ref} lacks facts for ${part.id}`);
    return defined(variant === "non_separated" ? blank(part.support) : picked);
  };

  const restrict = (payload: unknown, from: readonly string[], to: readonly string[]): Restriction => {
    const plain = restrictSheet(payload, from, to);
    if (!plain.defined) return plain;
    if (variant === "non_separated" && to.length < from.length) return defined(blank(to));
    if (variant === "unstable" && from.length >= 3 && to.length === 1) {
      return defined(Object.fromEntries(to.map((key) => [key, "drift"])));
    }
    return plain;
  };

  const compatibility = (obligation: OverlapObligation, locals: readonly LocalState[]): Restriction => {
    const [first] = locals;
    if (first === undefined) return undefinedRestriction("no locals");
    const sheet = asSheet(first.payload);
    if (sheet === undefined) return undefinedRestriction("local is not a fact sheet");
    return restrict(sheet, Object.keys(sheet), obligation.support);
  };

  const proposeGlue = (core: DescentCore): readonly GlueProposal[] => {
    const merged = mergeLocals(
      core.locals,
      core.cover.parts.map((part) => part.id),
    );
    const proposals: GlueProposal[] = [{ proposalId: "merge", payload: merged }];
    if (variant === "non_separated") {
      proposals.push({
        proposalId: "merge-shadow",
        payload: Object.fromEntries(Object.keys(merged).map((key) => [key, "shadow"])),
      });
    }
    return proposals;
  };

  return {
    adapterId: FACTS_ADAPTER_ID,
    adapterVersion: version,
    project,
    restrict,
    compatibility,
    proposeGlue,
  };
}
