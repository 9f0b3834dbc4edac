import { CanonicalizeError, canonicalLabel, compareLabels } from "@descent/identity";

import type { DescentAdapter } from "./adapter.js";
import { makeFailure, selectionFailure, type GateFailure } from "./failures.js";
import type { ModeComparator } from "./normalizers.js";
import type {
  CompatWitness,
  Cover,
  CoverPart,
  CoverPartId,
  GlueProposal,
  GlueProposalId,
  LocalState,
  OverlapId,
  OverlapObligation,
} from "./types.js";

export interface CheckScope {
  readonly cover: Cover;
  readonly adapter: DescentAdapter;
  readonly comparator: ModeComparator;
  readonly locals: ReadonlyMap<CoverPartId, LocalState>;
}

export type SectionForm =
  | { readonly kind: "form"; readonly normalForm: string }
  | { readonly kind: "undefined"; readonly reason: string }
  | { readonly kind: "unavailable"; readonly reason: string };

/** Restricts a payload and returns the digest of its normal form. */
export function restrictedForm(
  scope: CheckScope,
  payload: unknown,
  from: readonly string[],
  to: readonly string[],
): SectionForm {
  const restricted = scope.adapter.restrict(payload, from, to);
  if (!restricted.defined) {
    return { kind: "undefined", reason: restricted.reason ?? "restriction is undefined" };
  }
  return formOf(scope, restricted.value);
}

export function formOf(scope: CheckScope, value: unknown): SectionForm {
  const normal = scope.comparator.normalForm(value);
  if (!normal.ok) return { kind: "unavailable", reason: normal.error.explain };
  return { kind: "form", normalForm: normal.value };
}

export function partById(cover: Cover, partId: CoverPartId): CoverPart {
  const part = cover.parts.find((candidate) => candidate.id === partId);
  if (part === undefined) {
    throw new Error(`cover ${cover.coverId} has no part ${partId}`);
  }
  return part;
}

function localOf(scope: CheckScope, partId: CoverPartId): LocalState {
  const local = scope.locals.get(partId);
  if (local === undefined) {
    throw new Error(`descent check reached part ${partId} without a local state`);
  }
  return local;
}

function evaluateObligation(
  scope: CheckScope,
  obligation: OverlapObligation,
  witness: CompatWitness | undefined,
): GateFailure[] {
  const located = { overlapId: obligation.overlapId, overlapArity: obligation.arity };
  const label = `[${obligation.parts.join(", ")}]`;
  const forms = new Map<CoverPartId, string>();
  const failures: GateFailure[] = [];
  for (const partId of obligation.parts) {
    const part = partById(scope.cover, partId);
    const form = restrictedForm(scope, localOf(scope, partId).payload, part.support, obligation.support);
    if (form.kind === "undefined") {
      failures.push(
        makeFailure({
          ...located,
          class: "descent_failure",
          phase: "restrict",
          responsibleComponent: "adapter",
          coverPartId: partId,
          message: `local of ${partId} cannot be restricted to the overlap of ${label}: ${form.reason}`,
        }),
      );
    } else if (form.kind === "unavailable") {
      failures.push(
        selectionFailure("mode_comparison_unavailable", {
          ...located,
          phase: "normalize",
          responsibleComponent: "world",
          coverPartId: partId,
          message: `restriction of ${partId} to the overlap of ${label} cannot be compared: ${form.reason}`,
        }),
      );
    } else {
      forms.set(partId, form.normalForm);
    }
  }
  if (failures.length > 0) return failures;

  const distinct = [...new Set(forms.values())].sort(compareLabels);
  if (distinct.length > 1) {
    const subject = obligation.arity > 2 ? "cocycle" : "compatibility";
    return [
      makeFailure({
        ...located,
        class: "descent_failure",
        phase: "compat",
        responsibleComponent: "adapter",
        message: `${subject} of ${label} fails on re-evaluation: restrictions disagree`,
        details: { normalForms: Object.fromEntries(forms) },
      }),
    ];
  }

  if (witness !== undefined && witness.agreed !== undefined) {
    const claimed = formOf(scope, witness.agreed);
    if (claimed.kind !== "form") {
      return [
        selectionFailure("mode_comparison_unavailable", {
          ...located,
          phase: "normalize",
          responsibleComponent: "world",
          message: `agreed value of the witness for ${label} cannot be compared: ${claimed.reason}`,
        }),
      ];
    }
    if (claimed.normalForm !== distinct[0]) {
      return [
        makeFailure({
          ...located,
          class: "descent_failure",
          phase: "compat",
          responsibleComponent: "adapter",
          message: `witness for ${label} claims an agreed value the locals do not restrict to`,
        }),
      ];
    }
  }
  return [];
}

/** Re-evaluates every pairwise obligation against the locals. */
export function checkCompatibility(
  scope: CheckScope,
  obligations: readonly OverlapObligation[],
  witnesses: ReadonlyMap<OverlapId, CompatWitness>,
): GateFailure[] {
  return obligations
    .filter((obligation) => obligation.arity === 2)
    .flatMap((obligation) => evaluateObligation(scope, obligation, witnesses.get(obligation.overlapId)));
}

/** Triple-overlap coherence; only meaningful once `higher_cech` is negotiated. */
export function checkCocycles(
  scope: CheckScope,
  obligations: readonly OverlapObligation[],
  witnesses: ReadonlyMap<OverlapId, CompatWitness>,
): GateFailure[] {
  return obligations
    .filter((obligation) => obligation.arity > 2)
    .flatMap((obligation) => evaluateObligation(scope, obligation, witnesses.get(obligation.overlapId)));
}

export interface ValidProposal {
  readonly proposalId: GlueProposalId;
  readonly payload: unknown;
  readonly normalForm: string;
}

export interface RejectedProposal {
  readonly proposalId: GlueProposalId;
  readonly reason: string;
}

export interface ProposalEvaluation {
  readonly valid: readonly ValidProposal[];
  readonly rejected: readonly RejectedProposal[];
  readonly unavailable: readonly GateFailure[];
}

const safeLabel = (value: unknown): string | undefined => {
  try {
    return canonicalLabel(value);
  } catch (caught) {
    if (caught instanceof CanonicalizeError) return undefined;
    throw caught;
  }
};

function dedupeProposals(proposals: readonly GlueProposal[]): {
  unique: GlueProposal[];
  rejected: RejectedProposal[];
} {
  const byId = new Map<GlueProposalId, GlueProposal[]>();
  for (const proposal of proposals) {
    byId.set(proposal.proposalId, [...(byId.get(proposal.proposalId) ?? []), proposal]);
  }
  const unique: GlueProposal[] = [];
  const rejected: RejectedProposal[] = [];
  for (const proposalId of [...byId.keys()].sort(compareLabels)) {
    const group = byId.get(proposalId) ?? [];
    const labels = new Set(group.map((proposal) => safeLabel(proposal.payload)));
    const [first] = group;
    if (first === undefined) continue;
    if (proposalId.trim().length === 0) {
      rejected.push({ proposalId, reason: "empty proposal id" });
    } else if (labels.size > 1) {
      rejected.push({ proposalId, reason: `${group.length} proposals share this id with different payloads` });
    } else {
      unique.push(first);
    }
  }
  return { unique, rejected };
}

type Judgement =
  | { readonly kind: "valid"; readonly normalForm: string }
  | { readonly kind: "rejected"; readonly reason: string }
  | { readonly kind: "unavailable"; readonly failure: GateFailure };

function judgeProposal(
  scope: CheckScope,
  proposal: GlueProposal,
  localForms: ReadonlyMap<CoverPartId, string>,
): Judgement {
  const whole = formOf(scope, proposal.payload);
  if (whole.kind !== "form") {
    return {
      kind: "unavailable",
      failure: selectionFailure("mode_comparison_unavailable", {
        phase: "normalize",
        responsibleComponent: "world",
        proposalId: proposal.proposalId,
        message: `proposal ${proposal.proposalId} cannot be compared: ${whole.reason}`,
      }),
    };
  }
  for (const part of scope.cover.parts) {
    const form = restrictedForm(scope, proposal.payload, scope.cover.support, part.support);
    if (form.kind === "unavailable") {
      return {
        kind: "unavailable",
        failure: selectionFailure("mode_comparison_unavailable", {
          phase: "normalize",
          responsibleComponent: "world",
          proposalId: proposal.proposalId,
          coverPartId: part.id,
          message: `restriction of proposal ${proposal.proposalId} to ${part.id} cannot be compared: ${form.reason}`,
        }),
      };
    }
    if (form.kind === "undefined") {
      return { kind: "rejected", reason: `restriction to ${part.id} is undefined: ${form.reason}` };
    }
    if (form.normalForm !== localForms.get(part.id)) {
      return { kind: "rejected", reason: `restriction to ${part.id} differs from its local` };
    }
  }
  return { kind: "valid", normalForm: whole.normalForm };
}

/**
 * A proposal is valid when its restriction to every part is defined and equal
 * to that part's local under the Mode.
 */
export function evaluateProposals(scope: CheckScope, proposals: readonly GlueProposal[]): ProposalEvaluation {
  const { unique, rejected } = dedupeProposals(proposals);
  const valid: ValidProposal[] = [];
  const unavailable: GateFailure[] = [];

  const localForms = new Map<CoverPartId, string>();
  for (const part of scope.cover.parts) {
    const form = formOf(scope, localOf(scope, part.id).payload);
    if (form.kind === "form") {
      localForms.set(part.id, form.normalForm);
    } else {
      unavailable.push(
        selectionFailure("mode_comparison_unavailable", {
          phase: "normalize",
          responsibleComponent: "world",
          coverPartId: part.id,
          message: `local of ${part.id} cannot be compared: ${form.reason}`,
        }),
      );
    }
  }
  if (unavailable.length > 0) return { valid, rejected, unavailable };

  for (const proposal of unique) {
    const judged = judgeProposal(scope, proposal, localForms);
    if (judged.kind === "valid") {
      valid.push({ proposalId: proposal.proposalId, payload: proposal.payload, normalForm: judged.normalForm });
    } else if (judged.kind === "rejected") {
      rejected.push({ proposalId: proposal.proposalId, reason: judged.reason });
    } else {
      unavailable.push(judged.failure);
    }
  }
  return {
    valid,
    rejected: rejected.sort((a, b) => compareLabels(a.proposalId, b.proposalId)),
    unavailable,
  };
}
