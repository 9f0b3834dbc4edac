import {
  CanonicalizeError,
  canonicalLabel,
  canonicalize,
  compareLabels,
  digestRef,
  err,
  isPlainObject,
  ok,
  type Mode,
  type OverlapLevel,
  type Result,
} from "@descent/identity";

export type Normalizer = (value: unknown) => unknown;

export interface WorldProfile {
  readonly worldId: string;
  readonly overlapLevels: readonly OverlapLevel[];
  readonly normalizers: ReadonlyMap<string, Normalizer>;
}

export const CANONICAL_JSON_NORMALIZER = "canonical-json.v1";
export const SORTED_ARRAYS_NORMALIZER = "sorted-arrays.v1";

const sortArrays = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value
      .map((item) => sortArrays(item))
      .map((item) => ({ item, label: canonicalLabel(item) }))
      .sort((a, b) => compareLabels(a.label, b.label))
      .map(({ item }) => item);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, sortArrays(entry)]));
  }
  return value;
};

export function builtinNormalizers(): Map<string, Normalizer> {
  return new Map<string, Normalizer>([
    [CANONICAL_JSON_NORMALIZER, (value) => canonicalize(value)],
    [SORTED_ARRAYS_NORMALIZER, (value) => sortArrays(canonicalize(value))],
  ]);
}

export function supportsLevel(world: WorldProfile, level: OverlapLevel): boolean {
  return level === "pairwise" || world.overlapLevels.includes(level);
}

export function highestSupportedLevel(world: WorldProfile): OverlapLevel {
  return supportsLevel(world, "higher_cech") ? "higher_cech" : "pairwise";
}

/** Compares payloads under one Mode by the digest of their normal forms. */
export interface ModeComparator {
  readonly mode: Mode;
  normalForm(value: unknown): Result<string>;
}

export function createComparator(world: WorldProfile, mode: Mode): Result<ModeComparator> {
  const normalizer = world.normalizers.get(mode.normalizerId);
  if (normalizer === undefined) {
    return err("E_NORMALIZER_UNKNOWN", `world ${world.worldId} has no normalizer ${mode.normalizerId}`, {
      normalizerId: mode.normalizerId,
    });
  }
  return ok({
    mode,
    normalForm(value: unknown): Result<string> {
      try {
        return ok(digestRef("nf1", { normalizerId: mode.normalizerId, value: canonicalize(normalizer(value)) }));
      } catch (caught) {
        if (caught instanceof CanonicalizeError) {
          return err("E_NORMALIZE", caught.message, { code: caught.code });
        }
        if (caught instanceof Error) {
          return err("E_NORMALIZE", caught.message);
        }
        throw caught;
      }
    },
  });
}
