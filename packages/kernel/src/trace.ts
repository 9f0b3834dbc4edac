import type { OverlapLevel } from "@descent/identity";

import type { FailureClass } from "./failures.js";

export type GateStage = "cover" | "negotiate" | "locality" | "descent" | "stability" | "contractibility";

export type TraceTag =
  | { readonly kind: "cover"; readonly coverId: string; readonly parts: number }
  | { readonly kind: "overlaps"; readonly level: OverlapLevel; readonly count: number }
  | { readonly kind: "stage"; readonly stage: GateStage; readonly failures: number }
  | {
      readonly kind: "verdict";
      readonly runId: string;
      readonly result: "accepted" | "rejected";
      readonly failureClasses: readonly FailureClass[];
    }
  | { readonly kind: "refine"; readonly parentRunId: string; readonly axis: string; readonly runId: string }
  | { readonly kind: "refine_skip"; readonly axis: string; readonly candidateIndex: number; readonly reason: string };

export interface TraceSink {
  emit(tag: TraceTag): void;
}

export const nullTraceSink: TraceSink = { emit: () => {} };

export interface MemoryTraceSink extends TraceSink {
  take(): TraceTag[];
}

export function memoryTraceSink(): MemoryTraceSink {
  const tags: TraceTag[] = [];
  return {
    emit(tag) {
      tags.push(tag);
    },
    take() {
      const out = tags.slice();
      tags.length = 0;
      return out;
    },
  };
}
