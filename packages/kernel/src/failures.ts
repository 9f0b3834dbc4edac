import { canonicalize, compareLabels, digestRef, type OverlapLevel } from "@descent/identity";

import type { CoverPartId, GlueProposalId, OverlapId } from "./types.js";

export const FAILURE_CLASSES = [
  "descent_failure",
  "glue_non_contractible",
  "locality_failure",
  "stability_failure",
] as const;

export type FailureClass = (typeof FAILURE_CLASSES)[number];

export const PHASES = ["restrict", "compat", "propose_glue", "select_glue", "normalize"] as const;

export type Phase = (typeof PHASES)[number];

export const RESPONSIBLE_COMPONENTS = ["world", "adapter", "context_provider", "event_store"] as const;

export type ResponsibleComponent = (typeof RESPONSIBLE_COMPONENTS)[number];

export type LawRef = "GATE-3.1" | "GATE-3.2" | "GATE-3.3" | "GATE-3.4";

export type GlueSelectionFailure = "no_valid_proposal" | "non_contractible_selection" | "mode_comparison_unavailable";

const LAW_REFS: Readonly<Record<FailureClass, LawRef>> = {
  stability_failure: "GATE-3.1",
  locality_failure: "GATE-3.2",
  descent_failure: "GATE-3.3",
  glue_non_contractible: "GATE-3.4",
};

export const lawRefFor = (failureClass: FailureClass): LawRef => LAW_REFS[failureClass];

export function classForSelectionFailure(failure: GlueSelectionFailure): FailureClass {
  switch (failure) {
    case "non_contractible_selection":
      return "glue_non_contractible";
    case "no_valid_proposal":
    case "mode_comparison_unavailable":
      return "descent_failure";
  }
}

export interface GateFailure {
  readonly witnessId: string;
  readonly class: FailureClass;
  readonly lawRef: LawRef;
  readonly phase: Phase;
  readonly responsibleComponent: ResponsibleComponent;
  readonly message: string;
  readonly glueSelectionFailure?: GlueSelectionFailure;
  readonly overlapId?: OverlapId;
  readonly overlapArity?: number;
  readonly overlapLevelRequested?: OverlapLevel;
  readonly overlapLevelSupported?: OverlapLevel;
  readonly coverPartId?: CoverPartId;
  readonly proposalId?: GlueProposalId;
  readonly details?: unknown;
}

export type FailureDraft = Omit<GateFailure, "witnessId" | "lawRef" | "details"> & { readonly details?: unknown };

/** Fills in the law reference and the deterministic failure id. */
export function makeFailure(draft: FailureDraft): GateFailure {
  const details = draft.details === undefined ? undefined : canonicalize(draft.details);
  const lawRef = lawRefFor(draft.class);
  const witnessId = digestRef("w1", {
    schema: 1,
    class: draft.class,
    lawRef,
    phase: draft.phase,
    responsibleComponent: draft.responsibleComponent,
    glueSelectionFailure: draft.glueSelectionFailure,
    overlapId: draft.overlapId,
    overlapLevelRequested: draft.overlapLevelRequested,
    coverPartId: draft.coverPartId,
    proposalId: draft.proposalId,
    details,
  });
  return { ...draft, witnessId, lawRef, ...(details === undefined ? {} : { details }) };
}

export function selectionFailure(
  failure: GlueSelectionFailure,
  draft: Omit<FailureDraft, "class" | "glueSelectionFailure">,
): GateFailure {
  return makeFailure({ ...draft, class: classForSelectionFailure(failure), glueSelectionFailure: failure });
}

export function compareFailures(left: GateFailure, right: GateFailure): number {
  return (
    compareLabels(left.class, right.class) ||
    compareLabels(left.lawRef, right.lawRef) ||
    compareLabels(left.phase, right.phase) ||
    (left.overlapArity ?? 0) - (right.overlapArity ?? 0) ||
    compareLabels(left.overlapId ?? "", right.overlapId ?? "") ||
    compareLabels(left.coverPartId ?? "", right.coverPartId ?? "") ||
    compareLabels(left.proposalId ?? "", right.proposalId ?? "") ||
    compareLabels(left.witnessId, right.witnessId)
  );
}

/** Sorted, with failures sharing a witness id collapsed to one. */
export function orderFailures(failures: Iterable<GateFailure>): GateFailure[] {
  const byId = new Map<string, GateFailure>();
  for (const failure of failures) {
    if (!byId.has(failure.witnessId)) byId.set(failure.witnessId, failure);
  }
  return [...byId.values()].sort(compareFailures);
}

export function failureClassesOf(failures: readonly GateFailure[]): FailureClass[] {
  return [...new Set(failures.map((failure) => failure.class))].sort(compareLabels);
}
