export {
  CanonicalizeError,
  canonicalBytes,
  canonicalJson,
  canonicalLabel,
  canonicalize,
  compareLabels,
  isPlainObject,
} from "./canonical.js";
export type { CanonicalizeErrorCode } from "./canonical.js";
export { blake3hex, digest, digestRef, hasDigestPrefix } from "./digest.js";
export type { DigestPrefix } from "./digest.js";
export { MISSING, firstDivergence, pointerFromSegments } from "./diff.js";
export type { PointerSegment, ValueDiff } from "./diff.js";
export {
  computeCoverId,
  computeDataHeadRef,
  computeOverlapId,
  computeRunId,
  computeStrategyDigest,
} from "./identity.js";
export type { CoverPartMaterial, RunIdOptions, RunIdentity } from "./identity.js";
export {
  DEFAULT_POLICY,
  computePolicyDigest,
  createMode,
  overlapLevelRank,
  policyIdentity,
} from "./mode.js";
export type { GatePolicy, Mode, OverlapLevel, PolicyIdentity } from "./mode.js";
export { err, ok } from "./result.js";
export type { Result, ResultError } from "./result.js";
