import { describe, expect, it } from "vitest";
import * as fc from "fast-check";

import { canonicalJson, compareLabels, createMode } from "@descent/identity";

import { holdsExactlyOne, runGate, type GateRequest, type GlueProposal } from "../src/index.js";
import { overlapIds, policyWith, recordAdapter, testWorld, threePartStrategy, twoPartRequest } from "./helpers/records.js";

const proposalArb = fc.record({
  proposalId: fc.constantFrom("p1", "p2", "p3"),
  c: fc.integer({ min: 2, max: 4 }),
});

const toProposals = (items: readonly { proposalId: string; c: number }[]): GlueProposal[] =>
  items.map(({ proposalId, c }) => ({ proposalId, payload: { a: 1, b: 2, c } }));

const scenarioArb = fc.record({
  dropWitness: fc.boolean(),
  dropLocal: fc.boolean(),
  conflictingLocal: fc.boolean(),
  higher: fc.boolean(),
  worldHigher: fc.boolean(),
  proposals: fc.array(proposalArb, { maxLength: 4 }),
});

type Scenario = typeof scenarioArb extends fc.Arbitrary<infer T> ? T : never;

function scenarioRequest(scenario: Scenario): GateRequest {
  const base = twoPartRequest();
  const level = scenario.higher ? "higher_cech" : "pairwise";
  return {
    ...base,
    locals: scenario.dropLocal
      ? { A: { a: 1, b: 2 } }
      : { A: { a: 1, b: 2 }, B: { b: scenario.conflictingLocal ? 5 : 2, c: 3 } },
    compat: scenario.dropWitness ? [] : base.compat,
    glueProposals: toProposals(scenario.proposals),
    mode: createMode("canonical-json.v1", policyWith({ overlapLevel: level })),
    overlapLevelRequested: level,
  };
}

const worldFor = (scenario: Scenario) => testWorld(scenario.worldHigher ? ["pairwise", "higher_cech"] : ["pairwise"]);

describe("gate properties", () => {
  it("always emits exactly one of a glue result or failures", () => {
    fc.assert(
      fc.property(scenarioArb, (scenario) => {
        const witness = runGate(scenarioRequest(scenario), { world: worldFor(scenario), adapter: recordAdapter() });
        expect(holdsExactlyOne(witness)).toBe(true);
        const classes: readonly string[] = witness.failureClasses;
        expect(classes).toEqual([...new Set(classes)].sort(compareLabels));
      }),
      { numRuns: 120 },
    );
  });

  it("is byte-identical across repeated runs", () => {
    fc.assert(
      fc.property(scenarioArb, (scenario) => {
        const env = { world: worldFor(scenario), adapter: recordAdapter() };
        const first = runGate(scenarioRequest(scenario), env);
        const second = runGate(scenarioRequest(scenario), env);
        expect(canonicalJson(second)).toBe(canonicalJson(first));
      }),
      { numRuns: 60 },
    );
  });

  it("reports locality_failure whenever a witness is missing, whatever the proposals", () => {
    fc.assert(
      fc.property(fc.array(proposalArb, { maxLength: 4 }), fc.boolean(), (proposals, conflictingLocal) => {
        const witness = runGate(
          scenarioRequest({
            dropWitness: true,
            dropLocal: false,
            conflictingLocal,
            higher: false,
            worldHigher: false,
            proposals,
          }),
          { world: testWorld(), adapter: recordAdapter() },
        );
        expect(witness.failureClasses).toEqual(["locality_failure"]);
      }),
      { numRuns: 80 },
    );
  });

  it("reports a missing witness even when the mode or level cannot be negotiated", () => {
    const modeArb = fc.constantFrom("bound", "unbound", "unknown");
    fc.assert(
      fc.property(modeArb, fc.boolean(), fc.array(proposalArb, { maxLength: 3 }), (modeShape, higher, proposals) => {
        const request = scenarioRequest({
          dropWitness: true,
          dropLocal: false,
          conflictingLocal: false,
          higher,
          worldHigher: false,
          proposals,
        });
        const mode =
          modeShape === "unbound"
            ? { ...request.mode, policyDigest: "pol1_unbound" }
            : modeShape === "unknown"
              ? { ...request.mode, normalizerId: "missing.v1" }
              : request.mode;
        const witness = runGate({ ...request, mode }, { world: testWorld(), adapter: recordAdapter() });
        expect(witness.failureClasses).toContain("locality_failure");
        expect(witness.glueResult).toBeUndefined();
      }),
      { numRuns: 60 },
    );
  });

  it("does not depend on the order of locals, witnesses or proposals", () => {
    const elements = ["a", "b", "c", "d"];
    const ids = overlapIds({ elements, coverStrategy: threePartStrategy }, "higher_cech");
    const parts = [["A", "B"], ["A", "C"], ["B", "C"], ["A", "B", "C"]];
    const compat = ids.map((overlapId, index) => ({ overlapId, parts: parts[index] ?? [], agreed: { b: 2 } }));
    const locals: [string, unknown][] = [
      ["A", { a: 1, b: 2 }],
      ["B", { b: 2, c: 3 }],
      ["C", { b: 2, d: 4 }],
    ];
    const higher = policyWith({ overlapLevel: "higher_cech" });
    const request = (order: readonly number[], reversed: boolean, proposals: readonly GlueProposal[]): GateRequest => ({
      ...twoPartRequest(),
      elements,
      coverStrategy: threePartStrategy,
      locals: Object.fromEntries(reversed ? [...locals].reverse() : locals),
      compat: order.flatMap((index) => {
        const witness = compat[index];
        return witness === undefined ? [] : [witness];
      }),
      glueProposals: proposals,
      mode: createMode("canonical-json.v1", higher),
      overlapLevelRequested: "higher_cech",
    });
    const env = { world: testWorld(["pairwise", "higher_cech"]), adapter: recordAdapter() };
    const glue = (d: number): GlueProposal[] => [
      { proposalId: "p1", payload: { a: 1, b: 2, c: 3, d: 4 } },
      { proposalId: "p2", payload: { a: 1, b: 2, c: 3, d } },
      { proposalId: "p3", payload: { a: 1, b: 2, c: 3, d: 4 } },
    ];

    fc.assert(
      fc.property(
        fc.shuffledSubarray([0, 1, 2, 3], { minLength: 4, maxLength: 4 }),
        fc.boolean(),
        fc.shuffledSubarray([0, 1, 2], { minLength: 3, maxLength: 3 }),
        fc.integer({ min: 4, max: 5 }),
        (order, reversed, proposalOrder, d) => {
          const proposals = glue(d);
          const shuffled = proposalOrder.flatMap((index) => {
            const proposal = proposals[index];
            return proposal === undefined ? [] : [proposal];
          });
          const baseline = runGate(request([0, 1, 2, 3], false, proposals), env);
          const permuted = runGate(request(order, reversed, shuffled), env);
          expect(permuted.witnessDigest).toBe(baseline.witnessDigest);
        },
      ),
      { numRuns: 60 },
    );
  });
});
