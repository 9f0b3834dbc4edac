export type { DescentAdapter, GateEnv } from "./adapter.js";
export { REFINEMENT_AXES, assertOneAxis, changedAxes, foreignChanges, startingRung } from "./axes.js";
export type { RefinementAxis, RefinementStep } from "./axes.js";
export { admitAcrossBoundary, inspectDelivery } from "./boundary.js";
export type { BoundaryVerdict, TransportFailure, TransportFailureClass, TransportWitness } from "./boundary.js";
export { ENUMERATION_SCHEME, selectGlue } from "./contractibility.js";
export type { ContractibilityBasis, GlueResult, Selection, SelectionInput } from "./contractibility.js";
export { buildCover, normalizePartId, rejectedCoverId, strategyDigestOf } from "./cover.js";
export { checkCocycles, checkCompatibility, evaluateProposals, restrictedForm } from "./descent.js";
export type { CheckScope, ProposalEvaluation, RejectedProposal, SectionForm, ValidProposal } from "./descent.js";
export { GateRequestError, LedgerConflictError, RefinementInvariantError } from "./errors.js";
export type { GateRequestErrorCode, RefinementInvariantCode } from "./errors.js";
export {
  FAILURE_CLASSES,
  PHASES,
  RESPONSIBLE_COMPONENTS,
  classForSelectionFailure,
  compareFailures,
  failureClassesOf,
  lawRefFor,
  makeFailure,
  orderFailures,
} from "./failures.js";
export type {
  FailureClass,
  FailureDraft,
  GateFailure,
  GlueSelectionFailure,
  LawRef,
  Phase,
  ResponsibleComponent,
} from "./failures.js";
export { deriveDataHeadRef, effectivePolicy, resolveRun, runGate } from "./gate.js";
export type { ResolvedRun } from "./gate.js";
export { RunLedger } from "./ledger.js";
export type { LedgerEntry } from "./ledger.js";
export { checkLocality } from "./locality.js";
export type { LocalityOutcome } from "./locality.js";
export { materializeRequest } from "./materialize.js";
export type { MaterializeInput } from "./materialize.js";
export {
  CANONICAL_JSON_NORMALIZER,
  SORTED_ARRAYS_NORMALIZER,
  builtinNormalizers,
  createComparator,
  highestSupportedLevel,
  supportsLevel,
} from "./normalizers.js";
export type { ModeComparator, Normalizer, WorldProfile } from "./normalizers.js";
export { compareObligations, enumerateObligations } from "./overlap.js";
export { DEFAULT_MAX_REFINEMENT_STEPS, nextRefinement, requestFor, runLadder } from "./refinement.js";
export type {
  LadderOptions,
  LadderOutcome,
  LadderRun,
  LadderStartDocument,
  LadderState,
  LadderStatus,
  ModeCandidate,
  NextRefinement,
  PlannedStep,
  RefinementPlan,
  RefinementPlanDocument,
  SkippedCandidate,
} from "./refinement.js";
export { verifyReplay } from "./replay.js";
export { formatErrors, parseGateRequest, parseJsonText, parseLadderStart, parseRefinementPlan } from "./schemas.js";
export { checkIdentity, checkStability } from "./stability.js";
export { memoryTraceSink, nullTraceSink } from "./trace.js";
export type { GateStage, MemoryTraceSink, TraceSink, TraceTag } from "./trace.js";
export { defined, undefinedRestriction } from "./types.js";
export type {
  CompatWitness,
  ContextSnapshot,
  ContractibilityCertificate,
  Cover,
  CoverPart,
  CoverPartId,
  CoverStrategy,
  DescentCore,
  ExplicitPartSpec,
  GateRequest,
  GlueProposal,
  GlueProposalId,
  LocalState,
  OverlapId,
  OverlapObligation,
  Restriction,
} from "./types.js";
export { emitAccepted, emitRejected, holdsExactlyOne, isNonEmpty, witnessDigestOf, witnessIdentity } from "./witness.js";
export type {
  AcceptedWitness,
  GateWitness,
  NonEmpty,
  OverlapLevelRecord,
  RejectedWitness,
  WitnessHeader,
} from "./witness.js";
