import { canonicalJson, digest } from "@descent/identity";
import {
  buildCover,
  enumerateObligations,
  memoryTraceSink,
  parseGateRequest,
  parseJsonText,
  parseLadderStart,
  parseRefinementPlan,
  runGate,
  runLadder,
  type DescentAdapter,
  type RefinementPlan,
  type TraceTag,
  type WorldProfile,
} from "@descent/kernel";
import {
  adapterFromSpec,
  createToyWorld,
  parseAdapterSpec,
  parseSnapshotStore,
  type SnapshotStore,
} from "@descent/toy-worlds";

import type { CliConfig } from "./config.js";

export type ExitCode = 0 | 1 | 2;

export interface CommandResult {
  readonly exitCode: ExitCode;
  readonly body: unknown;
  readonly trace: readonly TraceTag[];
}

export class CommandInputError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(`${code}: ${message}`);
    this.name = "CommandInputError";
    this.code = code;
  }
}

export const renderBody = (body: unknown): string => `${canonicalJson(body)}\n`;

const worldFor = (config: CliConfig): WorldProfile =>
  createToyWorld({ worldId: config.worldId, higherCech: config.higherCech });

function adapterFor(spec: string, snapshots: SnapshotStore, staleRef?: string): DescentAdapter {
  const parsed = parseAdapterSpec(spec);
  if (parsed === undefined) {
    throw new CommandInputError("E_ADAPTER_SPEC", `cannot read adapter spec "${spec}"`);
  }
  return adapterFromSpec(parsed, snapshots, staleRef);
}

export interface CheckInput {
  readonly requestText: string;
  readonly adapter: string;
}

/** One gate run over a request file; the adapter only restricts, so no snapshots are needed. */
export function runCheck(input: CheckInput, config: CliConfig): CommandResult {
  const request = parseGateRequest(parseJsonText(input.requestText, "request"));
  const adapter = adapterFor(input.adapter, {});
  const trace = memoryTraceSink();
  const witness = runGate(request, { world: worldFor(config), adapter, trace });
  return { exitCode: witness.result === "accepted" ? 0 : 1, body: witness, trace: trace.take() };
}

export interface LadderInput {
  readonly startText: string;
  readonly planText: string;
  readonly snapshotsText: string;
  readonly staleRef?: string;
}

export function runLadderCommand(input: LadderInput, config: CliConfig): CommandResult {
  const start = parseLadderStart(parseJsonText(input.startText, "start"));
  const document = parseRefinementPlan(parseJsonText(input.planText, "plan"));
  const store = parseSnapshotStore(parseJsonText(input.snapshotsText, "snapshots"));
  if (!store.ok) {
    throw new CommandInputError(store.error.code, store.error.explain);
  }
  const snapshots = store.value;
  const plan: RefinementPlan = {
    covers: document.covers ?? [],
    contexts: document.contexts ?? [],
    adapters: (document.adapterVersions ?? []).map((spec) => adapterFor(spec, snapshots, input.staleRef)),
    modes: document.modes ?? [],
  };
  const trace = memoryTraceSink();
  const outcome = runLadder(
    {
      context: start.context,
      coverStrategy: start.coverStrategy,
      normalizerId: start.normalizerId,
      policy: start.policy,
      adapter: adapterFor(start.adapter, snapshots, input.staleRef),
    },
    plan,
    { world: worldFor(config), trace, ...(document.maxSteps === undefined ? {} : { maxSteps: document.maxSteps }) },
  );
  return {
    exitCode: outcome.status === "accepted" ? 0 : 1,
    body: {
      status: outcome.status,
      final: outcome.final,
      runs: outcome.runs.map(({ witness, step }) => ({
        runId: witness.runId,
        result: witness.result,
        failureClasses: witness.failureClasses,
        ...(step === undefined ? {} : { step }),
      })),
      skipped: outcome.skipped,
    },
    trace: trace.take(),
  };
}

export function runDigest(text: string): CommandResult {
  const value = parseJsonText(text, "input");
  return { exitCode: 0, body: { canonical: canonicalJson(value), digest: digest(value) }, trace: [] };
}

/** Cover and obligation enumeration for a request, without running any check. */
export function runOverlaps(requestText: string): CommandResult {
  const request = parseGateRequest(parseJsonText(requestText, "request"));
  const cover = buildCover(
    { contextId: request.contextId, ctxRef: request.ctxRef, elements: request.elements },
    request.coverStrategy,
  );
  if (!cover.ok) {
    throw new CommandInputError(cover.error.code, cover.error.explain);
  }
  return {
    exitCode: 0,
    body: {
      coverId: cover.value.coverId,
      parts: cover.value.parts,
      obligations: enumerateObligations(cover.value, request.overlapLevelRequested),
    },
    trace: [],
  };
}
