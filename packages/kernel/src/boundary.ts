import { CanonicalizeError, canonicalJson, isPlainObject } from "@descent/identity";

import type { AcceptedWitness, GateWitness } from "./witness.js";

export type TransportFailureClass =
  | "transport_schema_mismatch"
  | "transport_digest_mismatch"
  | "transport_identity_drift";

export interface TransportFailure {
  readonly class: TransportFailureClass;
  readonly message: string;
}

/** What a boundary observed about one delivered gate witness. Never a gate verdict. */
export interface TransportWitness {
  readonly witnessKind: "transport";
  readonly runId: string;
  readonly gateWitnessDigest: string;
  readonly result: "delivered" | "damaged";
  readonly failures: readonly TransportFailure[];
}

const sameBytes = (left: unknown, right: unknown): boolean => {
  try {
    return canonicalJson(left) === canonicalJson(right);
  } catch (caught) {
    if (caught instanceof CanonicalizeError) return false;
    throw caught;
  }
};

export function inspectDelivery(sent: GateWitness, received: unknown): TransportWitness {
  const failures: TransportFailure[] = [];
  if (!isPlainObject(received) || received.witnessKind !== "gate" || received.witnessSchema !== sent.witnessSchema) {
    failures.push({ class: "transport_schema_mismatch", message: "delivered value is not a gate witness of the sent schema" });
  } else if (received.runId !== sent.runId) {
    failures.push({ class: "transport_identity_drift", message: `delivered run ${String(received.runId)} for ${sent.runId}` });
  } else if (received.witnessDigest !== sent.witnessDigest || !sameBytes(received, sent)) {
    failures.push({ class: "transport_digest_mismatch", message: "delivered witness bytes differ from the sent witness" });
  }
  return {
    witnessKind: "transport",
    runId: sent.runId,
    gateWitnessDigest: sent.witnessDigest,
    result: failures.length === 0 ? "delivered" : "damaged",
    failures,
  };
}

export type BoundaryVerdict =
  | { readonly admitted: true; readonly gate: AcceptedWitness; readonly transport: TransportWitness }
  | {
      readonly admitted: false;
      readonly gate: GateWitness;
      readonly transport: TransportWitness;
      readonly reasons: readonly string[];
    };

/**
 * Combines a gate witness with what transport observed. Transport can only
 * withhold admission; a rejected gate witness is never admitted.
 */
export function admitAcrossBoundary(gate: GateWitness, transport: TransportWitness): BoundaryVerdict {
  const reasons: string[] = [];
  if (gate.result === "rejected") {
    reasons.push(...gate.failureClasses);
  }
  if (transport.runId !== gate.runId || transport.gateWitnessDigest !== gate.witnessDigest) {
    reasons.push("transport_identity_drift");
  }
  reasons.push(...transport.failures.map((failure) => failure.class));
  if (gate.result === "accepted" && reasons.length === 0) {
    return { admitted: true, gate, transport };
  }
  return { admitted: false, gate, transport, reasons: [...new Set(reasons)] };
}
