import { TOY_WORLD_ID } from "@descent/toy-worlds";

export type Env = Readonly<Record<string, string | undefined>>;

/** Global flags as commander hands them over. */
export interface CliFlags {
  readonly world?: string;
  readonly higherCech?: boolean;
  readonly trace?: boolean;
  readonly traceFile?: string;
  readonly out?: string;
}

export interface CliConfig {
  readonly worldId: string;
  readonly higherCech: boolean;
  /** `-` for stderr or a file path; absent when tracing is off. */
  readonly trace?: string;
  /** Result file; stdout when absent. */
  readonly out?: string;
}

const OFF = new Set(["", "0", "false", "off", "no"]);
const ON = new Set(["1", "true", "on", "yes"]);

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed.length === 0 ? undefined : trimmed;
};

/** `DESCENT_TRACE=1` traces to stderr; any other non-off value names a file. */
export function traceTarget(value: string | boolean | undefined): string | undefined {
  if (value === undefined || value === false) return undefined;
  if (value === true) return "-";
  const normalized = value.trim().toLowerCase();
  if (OFF.has(normalized)) return undefined;
  if (ON.has(normalized)) return "-";
  return value.trim();
}

export function resolveConfig(flags: CliFlags, env: Env): CliConfig {
  const trace = traceTarget(nonEmpty(flags.traceFile) ?? flags.trace ?? env.DESCENT_TRACE);
  const out = nonEmpty(flags.out) ?? nonEmpty(env.DESCENT_OUT);
  return {
    worldId: nonEmpty(flags.world) ?? nonEmpty(env.DESCENT_WORLD) ?? TOY_WORLD_ID,
    higherCech: flags.higherCech ?? false,
    ...(trace === undefined ? {} : { trace }),
    ...(out === undefined ? {} : { out }),
  };
}
