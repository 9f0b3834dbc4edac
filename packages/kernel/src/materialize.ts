import { createMode, type GatePolicy } from "@descent/identity";

import type { DescentAdapter } from "./adapter.js";
import { buildCover } from "./cover.js";
import { enumerateObligations } from "./overlap.js";
import type {
  CompatWitness,
  ContextSnapshot,
  CoverPartId,
  CoverStrategy,
  GateRequest,
  LocalState,
} from "./types.js";

export interface MaterializeInput {
  readonly context: ContextSnapshot;
  readonly coverStrategy: CoverStrategy;
  readonly normalizerId: string;
  readonly policy: GatePolicy;
  readonly dataHeadRef?: string;
}

/**
 * Asks the adapter for locals, witnesses and glue proposals for a context.
 * Whatever the adapter cannot produce is left out; the gate reports the gap.
 */
export function materializeRequest(input: MaterializeInput, adapter: DescentAdapter): GateRequest {
  const { context, policy } = input;
  const mode = createMode(input.normalizerId, policy);
  const request = {
    contextId: context.contextId,
    ctxRef: context.ctxRef,
    elements: [...context.elements],
    coverStrategy: input.coverStrategy,
    mode,
    overlapLevelRequested: policy.overlapLevel,
    policy,
    ...(input.dataHeadRef === undefined ? {} : { dataHeadRef: input.dataHeadRef }),
  };

  const cover = buildCover(context, input.coverStrategy);
  if (!cover.ok) {
    return { ...request, locals: {}, compat: [], glueProposals: [] };
  }

  const locals = new Map<CoverPartId, LocalState>();
  for (const part of cover.value.parts) {
    const projected = adapter.project(context, part);
    if (projected.defined) locals.set(part.id, { partId: part.id, payload: projected.value });
  }

  const obligations = enumerateObligations(cover.value, policy.overlapLevel);
  const compat: CompatWitness[] = [];
  for (const obligation of obligations) {
    const participants = obligation.parts.flatMap((partId) => {
      const local = locals.get(partId);
      return local === undefined ? [] : [local];
    });
    if (participants.length !== obligation.parts.length) continue;
    const agreed = adapter.compatibility(obligation, participants);
    if (agreed.defined) {
      compat.push({ overlapId: obligation.overlapId, parts: obligation.parts, agreed: agreed.value });
    }
  }

  const glueProposals = adapter.proposeGlue({
    cover: cover.value,
    obligations,
    locals,
    compat,
    mode,
    overlapLevel: policy.overlapLevel,
  });

  return {
    ...request,
    locals: Object.fromEntries([...locals].map(([partId, local]) => [partId, local.payload])),
    compat,
    glueProposals: [...glueProposals],
  };
}
