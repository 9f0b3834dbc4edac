import { describe, expect, it } from "vitest";

import { DEFAULT_POLICY } from "@descent/identity";
import {
  materializeRequest,
  runGate,
  runLadder,
  type ContextSnapshot,
  type CoverStrategy,
  type DescentAdapter,
  type GateFailure,
  type GateWitness,
} from "@descent/kernel";

import {
  adapterFromSpec,
  createFactsAdapter,
  createToyWorld,
  parseAdapterSpec,
  parseSnapshotStore,
  restrictSheet,
  type FactsVariant,
} from "../src/index.js";

const snapshots = {
  snap0: { a: 1, b: 9, c: 3 },
  snap1: { a: 1, b: 2, c: 3 },
};

const context: ContextSnapshot = { contextId: "ctx.facts", ctxRef: "snap1", elements: ["a", "b", "c"] };
const coverStrategy: CoverStrategy = { kind: "windowed", size: 2, stride: 1 };
const world = createToyWorld();

const adapterFor = (variant: FactsVariant): DescentAdapter =>
  createFactsAdapter({ snapshots, variant, staleRef: "snap0" });

const failuresOf = (witness: GateWitness): readonly GateFailure[] => witness.failures;

function gate(adapter: DescentAdapter): GateWitness {
  const request = materializeRequest(
    { context, coverStrategy, normalizerId: "canonical-json.v1", policy: DEFAULT_POLICY },
    adapter,
  );
  return runGate(request, { world, adapter });
}

describe("facts adapter variants", () => {
  it("glues a well-behaved world", () => {
    const witness = gate(adapterFor("sheaf"));
    expect(witness.result).toBe("accepted");
    expect(witness.glueResult?.selected).toBe("merge");
    expect(witness.adapterId).toBe("toy.facts");
    expect(witness.adapterVersion).toBe("1.0.0");
  });

  it("catches stale projections on re-evaluation", () => {
    const witness = gate(adapterFor("stale"));
    expect(witness.failureClasses).toEqual(["descent_failure"]);
    expect(failuresOf(witness).map((failure) => failure.phase)).toEqual(["compat"]);
    expect(witness.adapterVersion).toBe("1.0.0-stale");
  });

  it("reports missing projections as locality failures", () => {
    const witness = gate(adapterFor("partial"));
    expect(witness.failureClasses).toEqual(["locality_failure"]);
    expect(failuresOf(witness)).toHaveLength(2);
  });

  it("cannot pick between proposals its restrictions do not separate", () => {
    const witness = gate(adapterFor("non_separated"));
    expect(witness.failureClasses).toEqual(["glue_non_contractible"]);
    expect(failuresOf(witness)[0]?.glueSelectionFailure).toBe("non_contractible_selection");
  });

  it("forgets facts only on proper restrictions when not separated", () => {
    const adapter = adapterFor("non_separated");
    expect(adapter.restrict({ a: 1, b: 2 }, ["a", "b"], ["a", "b"])).toEqual({ defined: true, value: { a: 1, b: 2 } });
    expect(adapter.restrict({ a: 1, b: 2 }, ["a", "b"], ["b"])).toEqual({ defined: true, value: { b: null } });
  });

  it("fails stability when direct restriction drifts", () => {
    const witness = gate(adapterFor("unstable"));
    expect(witness.failureClasses).toEqual(["stability_failure"]);
    expect(failuresOf(witness).map((failure) => failure.coverPartId)).toEqual(["w0", "w1"]);
  });

  it("is repaired by a newer adapter version on the ladder", () => {
    const outcome = runLadder(
      {
        context,
        coverStrategy,
        normalizerId: "canonical-json.v1",
        policy: DEFAULT_POLICY,
        adapter: adapterFor("stale"),
      },
      { adapters: [adapterFromSpec({ variant: "sheaf", version: "2.0.0" }, snapshots)] },
      { world },
    );
    expect(outcome.status).toBe("accepted");
    expect(outcome.final.adapterVersion).toBe("2.0.0");
    expect(outcome.runs.map((run) => run.step?.refinementAxis)).toEqual([undefined, "adapter_version"]);
  });
});

describe("restrictSheet", () => {
  it("restricts a sheet whose keys are exactly the source", () => {
    expect(restrictSheet({ a: 1, b: 2 }, ["b", "a"], ["b"])).toEqual({ defined: true, value: { b: 2 } });
  });

  it("is undefined for the wrong source or a target outside it", () => {
    expect(restrictSheet({ a: 1 }, ["a", "b"], ["a"]).defined).toBe(false);
    expect(restrictSheet({ a: 1 }, ["a"], ["z"]).defined).toBe(false);
    expect(restrictSheet({ a: 1.5 }, ["a"], ["a"]).defined).toBe(false);
    expect(restrictSheet([1], ["a"], ["a"]).defined).toBe(false);
  });
});

describe("parseSnapshotStore", () => {
  it("keeps fact sheets keyed by ctxRef", () => {
    expect(parseSnapshotStore(snapshots)).toEqual({ ok: true, value: snapshots });
  });

  it("names the first snapshot that is not a fact sheet", () => {
    const parsed = parseSnapshotStore({ snap1: { a: 1 }, snap2: { a: [1] } });
    expect(parsed.ok ? undefined : parsed.error).toEqual({
      code: "E_SNAPSHOTS",
      explain: "snapshot snap2 must map elements to strings, integers, booleans or null",
      details: { ctxRef: "snap2" },
    });
    expect(parseSnapshotStore([]).ok).toBe(false);
  });
});

describe("parseAdapterSpec", () => {
  it("reads variants, versions or both", () => {
    expect(parseAdapterSpec("stale")).toEqual({ variant: "stale" });
    expect(parseAdapterSpec("2")).toEqual({ variant: "sheaf", version: "2" });
    expect(parseAdapterSpec("2.0.0")).toEqual({ variant: "sheaf", version: "2.0.0" });
    expect(parseAdapterSpec(" unstable@3 ")).toEqual({ variant: "unstable", version: "3" });
  });

  it("rejects unknown variants and empty versions", () => {
    expect(parseAdapterSpec("")).toBeUndefined();
    expect(parseAdapterSpec("wobbly@1")).toBeUndefined();
    expect(parseAdapterSpec("wobbly")).toBeUndefined();
    expect(parseAdapterSpec("sheaf@")).toBeUndefined();
  });
});

describe("createToyWorld", () => {
  it("supports higher overlaps only when asked", () => {
    expect(createToyWorld().overlapLevels).toEqual(["pairwise"]);
    expect(createToyWorld({ higherCech: true, worldId: "toy.alt" })).toMatchObject({
      worldId: "toy.alt",
      overlapLevels: ["pairwise", "higher_cech"],
    });
  });
});
