import { formOf, partById, restrictedForm, type CheckScope, type SectionForm, type ValidProposal } from "./descent.js";
import { makeFailure, selectionFailure, type GateFailure } from "./failures.js";
import type { CoverPartId, GlueProposalId, OverlapObligation } from "./types.js";

interface Subject {
  readonly coverPartId?: CoverPartId;
  readonly proposalId?: GlueProposalId;
  readonly label: string;
}

function identityFailure(subject: Subject, restricted: SectionForm, own: SectionForm): GateFailure | undefined {
  const located = { coverPartId: subject.coverPartId, proposalId: subject.proposalId };
  if (restricted.kind === "unavailable" || own.kind === "unavailable") {
    return selectionFailure("mode_comparison_unavailable", {
      ...located,
      phase: "normalize",
      responsibleComponent: "world",
      message: `identity restriction of ${subject.label} cannot be compared`,
    });
  }
  if (restricted.kind === "form" && own.kind === "form" && restricted.normalForm === own.normalForm) {
    return undefined;
  }
  return makeFailure({
    ...located,
    class: "stability_failure",
    phase: "restrict",
    responsibleComponent: "adapter",
    message: `restricting ${subject.label} to its own support changes it`,
  });
}

/** Identity law: restricting a section to the support it already lives on is a no-op. */
export function checkIdentity(scope: CheckScope, proposals: readonly ValidProposal[]): GateFailure[] {
  const failures: GateFailure[] = [];
  for (const part of scope.cover.parts) {
    const local = scope.locals.get(part.id);
    if (local === undefined) continue;
    const failure = identityFailure(
      { coverPartId: part.id, label: `local of ${part.id}` },
      restrictedForm(scope, local.payload, part.support, part.support),
      formOf(scope, local.payload),
    );
    if (failure !== undefined) failures.push(failure);
  }
  for (const proposal of proposals) {
    const failure = identityFailure(
      { proposalId: proposal.proposalId, label: `proposal ${proposal.proposalId}` },
      restrictedForm(scope, proposal.payload, scope.cover.support, scope.cover.support),
      { kind: "form", normalForm: proposal.normalForm },
    );
    if (failure !== undefined) failures.push(failure);
  }
  return failures;
}

/**
 * Reindexing pass: restricting a glued payload straight to an overlap must
 * agree with restricting it through each participating part. Runs only once
 * the identity law holds.
 */
export function checkStability(
  scope: CheckScope,
  proposals: readonly ValidProposal[],
  obligations: readonly OverlapObligation[],
): GateFailure[] {
  const identity = checkIdentity(scope, proposals);
  if (identity.length > 0) return identity;

  const failures: GateFailure[] = [];
  const pairwise = obligations.filter((obligation) => obligation.arity === 2);
  for (const proposal of proposals) {
    for (const obligation of pairwise) {
      const direct = restrictedForm(scope, proposal.payload, scope.cover.support, obligation.support);
      for (const partId of obligation.parts) {
        const located = {
          overlapId: obligation.overlapId,
          overlapArity: obligation.arity,
          coverPartId: partId,
          proposalId: proposal.proposalId,
        };
        const part = partById(scope.cover, partId);
        const viaPart = scope.adapter.restrict(proposal.payload, scope.cover.support, part.support);
        const via: SectionForm = viaPart.defined
          ? restrictedForm(scope, viaPart.value, part.support, obligation.support)
          : { kind: "undefined", reason: viaPart.reason ?? "restriction is undefined" };
        if (direct.kind === "unavailable" || via.kind === "unavailable") {
          failures.push(
            selectionFailure("mode_comparison_unavailable", {
              ...located,
              phase: "normalize",
              responsibleComponent: "world",
              message: `restrictions of proposal ${proposal.proposalId} over ${partId} cannot be compared`,
            }),
          );
          continue;
        }
        if (direct.kind === "form" && via.kind === "form" && direct.normalForm === via.normalForm) {
          continue;
        }
        failures.push(
          makeFailure({
            ...located,
            class: "stability_failure",
            phase: "restrict",
            responsibleComponent: "adapter",
            message: `restricting proposal ${proposal.proposalId} to the overlap directly and through ${partId} disagree`,
          }),
        );
      }
    }
  }
  return failures;
}
