// Generation driver and command-line interface
//
// Reads a schema, generates every requested target, and writes each into its
// own directory, or checks a checked-in tree against fresh output.

export { CompileError, CompileErrorKind, type DriftReason } from "./errors.ts";

export {
  resolveTargets,
  type DriverOptions,
  type VerifyOptions,
  type Report,
  type TargetReport,
} from "./options.ts";

export { run, verify } from "./driver.ts";

export { replaceDirectory, listFiles } from "./writer.ts";

export { createLogger, isEnabled, matchPattern, type Logger, type LoggingOptions } from "./logging.ts";

export { main, parseArguments, ExitCode, USAGE, type Command, type CliIO, type ParsedArguments } from "./cli.ts";
