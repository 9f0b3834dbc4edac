export {
  FACTS_ADAPTER_ID,
  FACTS_VARIANTS,
  createFactsAdapter,
  isFactsVariant,
  parseSnapshotStore,
  restrictSheet,
} from "./facts.js";
export type { FactSheet, FactValue, FactsAdapterOptions, FactsVariant, SnapshotStore } from "./facts.js";
export { TOY_WORLD_ID, adapterFromSpec, createToyWorld, parseAdapterSpec } from "./worlds.js";
export type { AdapterSpec, ToyWorldOptions } from "./worlds.js";
