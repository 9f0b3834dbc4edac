export { CommandInputError, renderBody, runCheck, runDigest, runLadderCommand, runOverlaps } from "./commands.js";
export type { CheckInput, CommandResult, ExitCode, LadderInput } from "./commands.js";
export { resolveConfig, traceTarget } from "./config.js";
export type { CliConfig, CliFlags, Env } from "./config.js";
export { flushTrace, traceLines } from "./sink.js";
export type { FileWriter, TextWriter } from "./sink.js";
