import { compareLabels, digestRef, type Mode } from "@descent/identity";

import type { RejectedProposal, ValidProposal } from "./descent.js";
import { makeFailure, selectionFailure, type GateFailure } from "./failures.js";
import type { ContractibilityCertificate, Cover, GlueProposalId, OverlapObligation } from "./types.js";

/** The only proof scheme the gate checks: the proof names the class normal form. */
export const ENUMERATION_SCHEME = "toy.enumerate.v1";

export interface ContractibilityBasis {
  readonly mode: Mode;
  readonly method: "normal_form" | "certificate";
  readonly schemeId?: string;
  readonly proofRefs: readonly string[];
}

export interface GlueResult {
  readonly selected: GlueProposalId;
  readonly normalFormRef: string;
  readonly equivalentProposals: readonly GlueProposalId[];
  readonly contractibilityBasis: ContractibilityBasis;
}

export type Selection =
  | { readonly kind: "selected"; readonly glue: GlueResult }
  | { readonly kind: "failed"; readonly failure: GateFailure };

export interface SelectionInput {
  readonly mode: Mode;
  readonly cover: Cover;
  readonly obligations: readonly OverlapObligation[];
  readonly valid: readonly ValidProposal[];
  readonly rejected: readonly RejectedProposal[];
  readonly supplied: number;
  readonly certificate?: ContractibilityCertificate;
}

interface EquivalenceClass {
  readonly normalFormRef: string;
  readonly members: readonly GlueProposalId[];
}

const rejectCertificate = (certificate: ContractibilityCertificate, message: string, classes: readonly EquivalenceClass[]): Selection => ({
  kind: "failed",
  failure: selectionFailure("non_contractible_selection", {
    phase: "select_glue",
    responsibleComponent: "world",
    proposalId: certificate.proposalId,
    message: `contractibility certificate rejected under scheme ${certificate.schemeId}: ${message}`,
    details: { classes },
  }),
});

/**
 * Checks a certificate against the enumerated classes. It may name the glue
 * but never overrides enumeration: the classes must still collapse to one.
 */
function certifiedSelection(
  input: SelectionInput,
  certificate: ContractibilityCertificate,
  classes: readonly EquivalenceClass[],
): Selection {
  if (certificate.proof.trim().length === 0) {
    return {
      kind: "failed",
      failure: makeFailure({
        class: "descent_failure",
        phase: "propose_glue",
        responsibleComponent: "adapter",
        proposalId: certificate.proposalId,
        message: "contractibility certificate carries no proof",
      }),
    };
  }
  const chosen = classes.find((entry) => entry.members.includes(certificate.proposalId));
  if (chosen === undefined) {
    return {
      kind: "failed",
      failure: selectionFailure("no_valid_proposal", {
        phase: "propose_glue",
        responsibleComponent: "adapter",
        proposalId: certificate.proposalId,
        message: `certified proposal ${certificate.proposalId} did not survive descent`,
        details: { rejected: input.rejected },
      }),
    };
  }
  if (certificate.schemeId !== ENUMERATION_SCHEME) return rejectCertificate(certificate, "unknown scheme", classes);
  if (classes.length > 1) return rejectCertificate(certificate, `${classes.length} inequivalent candidates remain`, classes);
  if (certificate.proof !== chosen.normalFormRef) return rejectCertificate(certificate, "proof does not name the glue normal form", classes);
  return {
    kind: "selected",
    glue: {
      selected: certificate.proposalId,
      normalFormRef: chosen.normalFormRef,
      equivalentProposals: chosen.members,
      contractibilityBasis: {
        mode: input.mode,
        method: "certificate",
        schemeId: certificate.schemeId,
        proofRefs: [
          digestRef("cert1", certificate),
          chosen.normalFormRef,
          input.cover.coverId,
          ...input.obligations.map((obligation) => obligation.overlapId),
        ],
      },
    },
  };
}

/**
 * Accepts only a provably unique equivalence class. Ties are never broken by
 * arrival order or count; the representative is the smallest id in the class.
 */
export function selectGlue(input: SelectionInput): Selection {
  const classes = new Map<string, GlueProposalId[]>();
  for (const proposal of input.valid) {
    classes.set(proposal.normalForm, [...(classes.get(proposal.normalForm) ?? []), proposal.proposalId]);
  }
  const ordered: EquivalenceClass[] = [...classes.entries()]
    .map(([normalFormRef, members]) => ({ normalFormRef, members: [...members].sort(compareLabels) }))
    .sort((a, b) => compareLabels(a.normalFormRef, b.normalFormRef));

  if (input.certificate !== undefined) return certifiedSelection(input, input.certificate, ordered);

  const [only, ...others] = ordered;
  if (only === undefined) {
    return {
      kind: "failed",
      failure: selectionFailure("no_valid_proposal", {
        phase: "propose_glue",
        responsibleComponent: "adapter",
        message:
          input.supplied === 0
            ? "no glue proposals were supplied"
            : `none of ${input.supplied} glue proposals is consistent with the locals`,
        details: { rejected: input.rejected },
      }),
    };
  }
  if (others.length > 0) {
    return {
      kind: "failed",
      failure: selectionFailure("non_contractible_selection", {
        phase: "select_glue",
        responsibleComponent: "world",
        message: `${ordered.length} inequivalent glue candidates survive descent`,
        details: { classes: ordered },
      }),
    };
  }
  const [selected] = only.members;
  if (selected === undefined) {
    throw new Error(`equivalence class ${only.normalFormRef} has no members`);
  }
  return {
    kind: "selected",
    glue: {
      selected,
      normalFormRef: only.normalFormRef,
      equivalentProposals: only.members,
      contractibilityBasis: {
        mode: input.mode,
        method: "normal_form",
        proofRefs: [
          only.normalFormRef,
          input.cover.coverId,
          ...input.obligations.map((obligation) => obligation.overlapId),
        ],
      },
    },
  };
}
