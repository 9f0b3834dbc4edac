#!/usr/bin/env node
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { Command, CommanderError, type OptionValues } from "commander";

import {
  renderBody,
  runCheck,
  runDigest,
  runLadderCommand,
  runOverlaps,
  type CommandResult,
} from "./commands.js";
import { resolveConfig, type CliConfig, type CliFlags, type Env } from "./config.js";
import { flushTrace } from "./sink.js";

export interface CliIo {
  readonly env: Env;
  readText(file: string): Promise<string>;
  writeText(file: string, text: string): Promise<void>;
  stdout(text: string): void;
  stderr(text: string): void;
  setExitCode(code: number): void;
}

export const nodeIo: CliIo = {
  env: process.env,
  readText: (file) => readFile(file, "utf8"),
  writeText: async (file, text) => {
    const target = path.resolve(file);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, text, "utf8");
  },
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function flagsFrom(options: OptionValues): CliFlags {
  const { world, higherCech, trace, traceFile, out } = options;
  return {
    ...(typeof world === "string" ? { world } : {}),
    ...(typeof higherCech === "boolean" ? { higherCech } : {}),
    ...(typeof trace === "boolean" ? { trace } : {}),
    ...(typeof traceFile === "string" ? { traceFile } : {}),
    ...(typeof out === "string" ? { out } : {}),
  };
}

interface CheckOptions {
  readonly request: string;
  readonly adapter: string;
}

interface LadderOptions {
  readonly start: string;
  readonly plan: string;
  readonly snapshots: string;
  readonly staleRef?: string;
}

export function createProgram(io: CliIo = nodeIo): Command {
  const program = new Command();
  program
    .name("descent-gate")
    .description("Admissibility gate over covers of a shared context")
    .option("--world <id>", "world id (env DESCENT_WORLD)")
    .option("--higher-cech", "advertise higher_cech overlaps")
    .option("--trace", "write trace tags to stderr as JSONL (env DESCENT_TRACE)")
    .option("--trace-file <path>", "write trace tags to a JSONL file")
    .option("--out <path>", "write the result to a file instead of stdout (env DESCENT_OUT)")
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    // Subcommands copy these settings when they are created.
    .exitOverride();

  const execute = async (work: (config: CliConfig) => Promise<CommandResult>): Promise<void> => {
    try {
      const config = resolveConfig(flagsFrom(program.opts()), io.env);
      const result = await work(config);
      await flushTrace(result.trace, config.trace, io.stderr, io.writeText);
      const text = renderBody(result.body);
      if (config.out === undefined) {
        io.stdout(text);
      } else {
        await io.writeText(config.out, text);
      }
      io.setExitCode(result.exitCode);
    } catch (error) {
      io.stderr(`${error instanceof Error ? error.message : String(error)}\n`);
      io.setExitCode(2);
    }
  };

  program
    .command("check")
    .description("run the gate once and print its witness")
    .requiredOption("--request <path>", "gate request JSON")
    .option("--adapter <spec>", "facts adapter: variant, variant@version or version", "sheaf")
    .action(async (options: CheckOptions) => {
      await execute(async (config) =>
        runCheck({ requestText: await io.readText(options.request), adapter: options.adapter }, config),
      );
    });

  program
    .command("ladder")
    .description("refine one identity axis at a time until the gate accepts")
    .requiredOption("--start <path>", "ladder start JSON")
    .requiredOption("--plan <path>", "refinement plan JSON")
    .requiredOption("--snapshots <path>", "fact snapshots keyed by ctxRef")
    .option("--stale-ref <ctxRef>", "snapshot the stale adapter reads odd parts from")
    .action(async (options: LadderOptions) => {
      await execute(async (config) =>
        runLadderCommand(
          {
            startText: await io.readText(options.start),
            planText: await io.readText(options.plan),
            snapshotsText: await io.readText(options.snapshots),
            ...(options.staleRef === undefined ? {} : { staleRef: options.staleRef }),
          },
          config,
        ),
      );
    });

  program
    .command("digest")
    .description("print the canonical form and digest of a JSON value")
    .requiredOption("--input <path>", "JSON file")
    .action(async (options: { readonly input: string }) => {
      await execute(async () => runDigest(await io.readText(options.input)));
    });

  program
    .command("overlaps")
    .description("print the cover and overlap obligations of a request")
    .requiredOption("--request <path>", "gate request JSON")
    .action(async (options: { readonly request: string }) => {
      await execute(async () => runOverlaps(await io.readText(options.request)));
    });

  return program;
}

/** Runs one invocation; usage errors exit 2 like any other unreadable input. */
export async function main(args: readonly string[], io: CliIo = nodeIo): Promise<void> {
  try {
    await createProgram(io).parseAsync([...args], { from: "user" });
  } catch (error) {
    if (!(error instanceof CommanderError)) throw error;
    io.setExitCode(error.exitCode === 0 ? 0 : 2);
  }
}

if (!process.env.VITEST) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 2;
  });
}
