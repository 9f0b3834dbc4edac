import type { WorldProfile } from "./normalizers.js";
import type { TraceSink } from "./trace.js";
import type {
  ContextSnapshot,
  CoverPart,
  DescentCore,
  GlueProposal,
  LocalState,
  OverlapObligation,
  Restriction,
} from "./types.js";

/**
 * The only surface through which the kernel touches domain payloads.
 *
 * `restrict` is called while checking. `project`, `compatibility` and
 * `proposeGlue` are only used to build a request from a context.
 */
export interface DescentAdapter {
  readonly adapterId: string;
  readonly adapterVersion: string;
  project(context: ContextSnapshot, part: CoverPart): Restriction;
  /** `to` is always a subset of `from`. */
  restrict(payload: unknown, from: readonly string[], to: readonly string[]): Restriction;
  compatibility(obligation: OverlapObligation, locals: readonly LocalState[]): Restriction;
  proposeGlue(core: DescentCore): readonly GlueProposal[];
}

export interface GateEnv {
  readonly world: WorldProfile;
  readonly adapter: DescentAdapter;
  readonly trace?: TraceSink;
}
