import { canonicalJson } from "@descent/identity";
import type { TraceTag } from "@descent/kernel";

export type TextWriter = (text: string) => void;
export type FileWriter = (file: string, text: string) => Promise<void>;

/** One canonical JSON line per tag, in the order the gate emitted them. */
export function traceLines(tags: readonly TraceTag[]): string {
  return tags.map((tag) => `${canonicalJson(tag)}\n`).join("");
}

/**
 * Flushes one run's trace. `-` goes to the error stream so stdout stays the
 * witness; any other target is a file holding exactly this run's tags.
 */
export async function flushTrace(
  tags: readonly TraceTag[],
  target: string | undefined,
  writeErr: TextWriter,
  writeFile: FileWriter,
): Promise<void> {
  if (target === undefined || tags.length === 0) return;
  const text = traceLines(tags);
  if (target === "-") {
    writeErr(text);
    return;
  }
  await writeFile(target, text);
}
