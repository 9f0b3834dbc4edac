import { describe, expect, it } from "vitest";

import { admitAcrossBoundary, inspectDelivery, runGate } from "../src/index.js";
import { recordAdapter, testWorld, twoPartRequest } from "./helpers/records.js";

const env = { world: testWorld(), adapter: recordAdapter() };
const accepted = runGate(twoPartRequest(), env);
const rejected = runGate(twoPartRequest({ compat: [] }), env);

const overTheWire = (value: unknown): unknown => JSON.parse(JSON.stringify(value));

describe("inspectDelivery", () => {
  it("confirms an intact delivery", () => {
    const transport = inspectDelivery(accepted, overTheWire(accepted));
    expect(transport).toEqual({
      witnessKind: "transport",
      runId: accepted.runId,
      gateWitnessDigest: accepted.witnessDigest,
      result: "delivered",
      failures: [],
    });
  });

  it("classifies damaged deliveries", () => {
    const classOf = (received: unknown) => inspectDelivery(accepted, received).failures.map((failure) => failure.class);
    expect(classOf("not a witness")).toEqual(["transport_schema_mismatch"]);
    expect(classOf({ ...accepted, witnessSchema: 2 })).toEqual(["transport_schema_mismatch"]);
    expect(classOf({ ...accepted, runId: rejected.runId })).toEqual(["transport_identity_drift"]);
    expect(classOf({ ...accepted, ctxRef: "snap9" })).toEqual(["transport_digest_mismatch"]);
  });
});

describe("admitAcrossBoundary", () => {
  it("admits an accepted witness that arrived intact", () => {
    const verdict = admitAcrossBoundary(accepted, inspectDelivery(accepted, overTheWire(accepted)));
    expect(verdict.admitted).toBe(true);
  });

  it("never admits a rejected witness, however clean the transport", () => {
    const verdict = admitAcrossBoundary(rejected, inspectDelivery(rejected, overTheWire(rejected)));
    expect(verdict.admitted ? [] : verdict.reasons).toEqual(["locality_failure"]);
  });

  it("withholds admission when transport saw damage or another run", () => {
    const damaged = admitAcrossBoundary(accepted, inspectDelivery(accepted, { ...accepted, ctxRef: "snap9" }));
    expect(damaged.admitted ? [] : damaged.reasons).toEqual(["transport_digest_mismatch"]);
    const foreign = admitAcrossBoundary(accepted, inspectDelivery(rejected, overTheWire(rejected)));
    expect(foreign.admitted ? [] : foreign.reasons).toEqual(["transport_identity_drift"]);
  });
});
