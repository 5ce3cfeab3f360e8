#!/usr/bin/env node
import { Command, CommanderError, Option } from "commander";
import type { Executor } from "./execution/executor.js";
import { LocalExecutor } from "./execution/executor.js";
import { loadConfig } from "./config/loader.js";
import { FixedManagerDetector, HostManagerDetector, type ManagerDetector } from "./distro/detector.js";
import { takeSnapshot, type SnapshotOutcome } from "./pipeline/snapshot-pipeline.js";
import { PACKAGE_MANAGER_KINDS, isPackageManagerKind, type PackageManagerKind } from "./types/package.js";
import type { ProgressListener } from "./types/snapshot.js";
import { describeError } from "./shared/errors.js";
import { logger } from "./logger.js";

const VERSION = "0.1.0";

interface CliFlags {
  json: boolean;
  gzip: boolean;
  detailed: boolean;
  test: boolean;
  validate: boolean;
  packageManager?: string;
  config?: string;
}

export interface ParsedCli {
  readonly filename?: string;
  readonly json: boolean;
  readonly gzip: boolean;
  readonly detailed: boolean;
  readonly test: boolean;
  readonly validate: boolean;
  readonly packageManager?: PackageManagerKind;
  readonly configPath?: string;
}

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  executor?: Executor;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export function buildProgram(io: CliIO = processIO): Command {
  return new Command()
    .name("package-snapshot")
    .description("Save a snapshot of the packages installed on this host")
    .version(VERSION)
    .argument("[filename]", "output file (default: packages_<timestamp>.<ext>)")
    .option("--json", "save in structured JSON format", false)
    .option("--gzip", "compress the output with gzip", false)
    .option("--detailed", "include package descriptions and dependencies", false)
    .option("--test", "show what would be written without writing any file", false)
    .option("--no-validate", "skip re-reading the written file")
    .addOption(
      new Option("--package-manager <kind>", "use this package manager instead of detecting one").choices(PACKAGE_MANAGER_KINDS),
    )
    .option("--config <path>", "configuration file")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: (s) => io.stdout(s), writeErr: (s) => io.stderr(s) });
}

/** Parse user arguments (without the node and script entries). Throws CommanderError on usage errors. */
export function parseArguments(argv: readonly string[], io: CliIO = processIO): ParsedCli {
  const program = buildProgram(io);
  program.parse([...argv], { from: "user" });
  const flags = program.opts<CliFlags>();
  const packageManager = flags.packageManager !== undefined && isPackageManagerKind(flags.packageManager)
    ? flags.packageManager
    : undefined;
  return {
    filename: program.args[0],
    json: flags.json,
    gzip: flags.gzip,
    detailed: flags.detailed,
    test: flags.test,
    validate: flags.validate,
    packageManager,
    configPath: flags.config,
  };
}

function progressPrinter(io: CliIO): ProgressListener {
  return ({ processed, total }) => {
    io.stderr(`\rProcessed ${processed}/${total} packages`);
    if (processed === total) io.stderr("\n");
  };
}

function report(outcome: SnapshotOutcome, io: CliIO): number {
  if (outcome.mode === "preview") {
    const { preview } = outcome;
    io.stdout("Test mode: no files will be written\n");
    io.stdout(
      `Would write ${preview.destination} (${preview.format}, ${preview.compressed ? "gzip" : "uncompressed"}) ` +
        `with ${preview.packageCount} packages from ${outcome.packageManager}\n`,
    );
    io.stdout(`${preview.sample}\n`);
    if (preview.truncatedLines > 0) io.stdout(`... (${preview.truncatedLines} more lines)\n`);
    return 0;
  }
  if (outcome.validated === false) {
    io.stderr(`Error: snapshot written to ${outcome.destination} failed validation\n`);
    return 1;
  }
  io.stdout(`Successfully saved package list to ${outcome.destination}\n`);
  return 0;
}

/** Run the CLI and return the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  let parsed: ParsedCli;
  try {
    parsed = parseArguments(argv, io);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  try {
    const { config } = loadConfig(parsed.configPath);
    const forced = parsed.packageManager ?? config.package_manager;
    const detector: ManagerDetector = forced ? new FixedManagerDetector(forced) : new HostManagerDetector();
    const outcome = await takeSnapshot(
      {
        outputPath: parsed.filename,
        format: parsed.json ? "structured" : "text",
        compressed: parsed.gzip,
        detailed: parsed.detailed,
        dryRun: parsed.test,
        validate: parsed.validate ? undefined : false,
        onProgress: progressPrinter(io),
      },
      { executor: io.executor ?? new LocalExecutor(), detector, config },
    );
    return report(outcome, io);
  } catch (err) {
    logger.debug({ error: err }, "Snapshot run failed");
    io.stderr(`Error: ${describeError(err)}\n`);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`Error: ${describeError(err)}\n`);
      process.exitCode = 1;
    },
  );
}
