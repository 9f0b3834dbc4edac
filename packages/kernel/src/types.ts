import type { GatePolicy, Mode, OverlapLevel } from "@descent/identity";

export type CoverPartId = string;
export type OverlapId = string;
export type GlueProposalId = string;

/** The unit of work being partitioned. Owned by the caller; never mutated here. */
export interface ContextSnapshot {
  readonly contextId: string;
  readonly ctxRef: string;
  readonly elements: readonly string[];
}

export interface ExplicitPartSpec {
  readonly label: string;
  readonly support: readonly string[];
}

export type CoverStrategy =
  | { readonly kind: "explicit"; readonly parts: readonly ExplicitPartSpec[] }
  | { readonly kind: "windowed"; readonly size: number; readonly stride: number }
  | { readonly kind: "singleton" };

export interface CoverPart {
  readonly id: CoverPartId;
  readonly index: number;
  readonly support: readonly string[];
}

export interface Cover {
  readonly coverId: string;
  readonly contextId: string;
  readonly support: readonly string[];
  readonly parts: readonly CoverPart[];
  readonly strategyDigest: string;
}

export interface OverlapObligation {
  readonly overlapId: OverlapId;
  readonly arity: number;
  readonly parts: readonly CoverPartId[];
  readonly support: readonly string[];
}

export interface LocalState {
  readonly partId: CoverPartId;
  readonly payload: unknown;
}

export interface CompatWitness {
  readonly overlapId: OverlapId;
  readonly parts: readonly CoverPartId[];
  /** The value both sides claim to agree on over the overlap support. */
  readonly agreed?: unknown;
  readonly payload?: unknown;
}

export interface GlueProposal {
  readonly proposalId: GlueProposalId;
  readonly payload: unknown;
}

export interface DescentCore {
  readonly cover: Cover;
  readonly obligations: readonly OverlapObligation[];
  readonly locals: ReadonlyMap<CoverPartId, LocalState>;
  readonly compat: readonly CompatWitness[];
  readonly mode: Mode;
  readonly overlapLevel: OverlapLevel;
}

/** A claim that one proposal is the unique glue, checked under a named proof scheme. */
export interface ContractibilityCertificate {
  readonly schemeId: string;
  readonly proposalId: GlueProposalId;
  readonly proof: string;
}

/** Inbound request, as a host hands it to the gate. */
export interface GateRequest {
  readonly contextId: string;
  readonly ctxRef: string;
  readonly elements: readonly string[];
  readonly dataHeadRef?: string;
  readonly coverStrategy: CoverStrategy;
  readonly locals: Readonly<Record<CoverPartId, unknown>>;
  readonly compat: readonly CompatWitness[];
  readonly glueProposals: readonly GlueProposal[];
  readonly mode: Mode;
  readonly overlapLevelRequested: OverlapLevel;
  readonly policy?: GatePolicy;
  /** Takes the certified path through glue selection instead of plain enumeration. */
  readonly certificate?: ContractibilityCertificate;
}

export type Restriction =
  | { readonly defined: true; readonly value: unknown }
  | { readonly defined: false; readonly reason?: string };

export const defined = (value: unknown): Restriction => ({ defined: true, value });

export const undefinedRestriction = (reason?: string): Restriction =>
  reason === undefined ? { defined: false } : { defined: false, reason };
