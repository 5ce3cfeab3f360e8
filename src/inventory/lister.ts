import type { PackageBackend } from "../backends/interface.js";
import type { Executor, ExecResult } from "../execution/executor.js";
import type { Command } from "../types/command.js";
import { commandExists } from "../execution/executor.js";
import { ExternalCommandError, MissingToolError } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Run a command, turning timeouts and non-zero exits into ExternalCommandError. */
export async function runChecked(executor: Executor, command: Command, timeoutMs: number): Promise<ExecResult> {
  const commandLine = command.argv.join(" ");
  const result = await executor.execute(command, timeoutMs);
  if (result.timedOut) {
    throw new ExternalCommandError(`Command timed out after ${timeoutMs}ms: ${commandLine}`, {
      transient: true,
      context: { argv: command.argv, timeoutMs },
    });
  }
  if (result.signal !== undefined) {
    throw new ExternalCommandError(`Command terminated by ${result.signal}: ${commandLine}`, {
      context: { argv: command.argv, signal: result.signal, stderr: result.stderr.trim() },
    });
  }
  if (result.exitCode !== 0) {
    const stderr = result.stderr.trim();
    throw new ExternalCommandError(
      `Command exited with ${result.exitCode}: ${commandLine}${stderr ? ` (${stderr})` : ""}`,
      { context: { argv: command.argv, exitCode: result.exitCode, stderr } },
    );
  }
  return result;
}

/** Fail with MissingToolError unless every executable the backend needs is on PATH. */
export async function ensureToolsAvailable(backend: PackageBackend, executor: Executor): Promise<void> {
  const missing: string[] = [];
  for (const tool of backend.requiredTools) {
    if (!(await commandExists(executor, tool))) missing.push(tool);
  }
  if (missing.length > 0) {
    throw new MissingToolError(missing, { packageManager: backend.kind });
  }
}

/** Enumerate installed packages as name -> version. */
export async function listPackages(backend: PackageBackend, executor: Executor, timeoutMs: number): Promise<Map<string, string>> {
  const result = await runChecked(executor, backend.listInstalled(), timeoutMs);
  const packages = backend.parseInstalled(result.stdout);
  logger.info({ packageManager: backend.kind, count: packages.size, durationMs: result.durationMs }, "Installed packages listed");
  return packages;
}
