import { builtinNormalizers, type DescentAdapter, type WorldProfile } from "@descent/kernel";
import type { OverlapLevel } from "@descent/identity";

import { createFactsAdapter, isFactsVariant, type FactsVariant, type SnapshotStore } from "./facts.js";

export const TOY_WORLD_ID = "toy.world";

export interface ToyWorldOptions {
  readonly worldId?: string;
  readonly higherCech?: boolean;
}

export function createToyWorld(options: ToyWorldOptions = {}): WorldProfile {
  const overlapLevels: OverlapLevel[] = options.higherCech ? ["pairwise", "higher_cech"] : ["pairwise"];
  return {
    worldId: options.worldId ?? TOY_WORLD_ID,
    overlapLevels,
    normalizers: builtinNormalizers(),
  };
}

export interface AdapterSpec {
  readonly variant: FactsVariant;
  readonly version?: string;
}

/**
 * Reads `variant`, `variant@version` or a bare `version` (the sheaf variant
 * at that version). A bare version starts with a digit.
 */
export function parseAdapterSpec(spec: string): AdapterSpec | undefined {
  const trimmed = spec.trim();
  if (trimmed.length === 0) return undefined;
  const at = trimmed.indexOf("@");
  if (at < 0) {
    if (isFactsVariant(trimmed)) return { variant: trimmed };
    return /^\d/.test(trimmed) ? { variant: "sheaf", version: trimmed } : undefined;
  }
  const variant = trimmed.slice(0, at);
  const version = trimmed.slice(at + 1);
  if (!isFactsVariant(variant) || version.length === 0) return undefined;
  return { variant, version };
}

export function adapterFromSpec(spec: AdapterSpec, snapshots: SnapshotStore, staleRef?: string): DescentAdapter {
  return createFactsAdapter({
    snapshots,
    variant: spec.variant,
    ...(spec.version === undefined ? {} : { version: spec.version }),
    ...(staleRef === undefined ? {} : { staleRef }),
  });
}
