import { err, firstDivergence, ok, type Result } from "@descent/identity";

import type { GateEnv } from "./adapter.js";
import { runGate } from "./gate.js";
import type { GateRequest } from "./types.js";
import { witnessDigestOf, type GateWitness } from "./witness.js";

/** Re-runs a recorded request and confirms it reproduces the recorded witness byte for byte. */
export function verifyReplay(recorded: GateWitness, request: GateRequest, env: GateEnv): Result<GateWitness> {
  const sealed = witnessDigestOf(recorded);
  if (sealed !== recorded.witnessDigest) {
    return err("E_WITNESS_SEAL", "recorded witness does not match its own digest", {
      recorded: recorded.witnessDigest,
      recomputed: sealed,
    });
  }
  const replayed = runGate(request, env);
  if (replayed.witnessDigest === recorded.witnessDigest) {
    return ok(replayed);
  }
  const divergence = firstDivergence(recorded, replayed);
  return err("E_REPLAY_DIVERGED", `replay diverges at ${divergence?.pointer ?? "/"}`, {
    pointer: divergence?.pointer ?? "/",
    recorded: divergence?.left ?? null,
    replayed: divergence?.right ?? null,
  });
}
