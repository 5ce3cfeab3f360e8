// Command execution layer. Every package-manager query passes through here;
// LocalExecutor.execute() is the only place the process spawns children.
import execa from "execa";
import type { Command } from "../types/command.js";
import { logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly timedOut: boolean;
  /** Set when the child was killed by a signal, e.g. "SIGKILL". */
  readonly signal?: string;
  readonly durationMs: number;
}

/** Executor interface. Tests supply an in-process implementation. */
export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

/** Exit code reported when the executable could not be spawned at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/** Exit code reported for a child terminated by a signal. */
export const SIGNAL_EXIT_CODE = 128;

/** Local executor backed by execa. */
export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (cmd === undefined) {
      throw new TypeError("Command argv must not be empty");
    }

    const result = await execa(cmd, args, {
      timeout: timeoutMs,
      reject: false,
      // Package tools never read stdin.
      stdin: "ignore",
      // Package tools localize labels and dates; parsing relies on the C locale.
      env: { LC_ALL: "C", ...command.env },
      // 64MB: full rpm/dpkg listings on large hosts run to a few MB.
      maxBuffer: 64 * 1024 * 1024,
    });

    const durationMs = Math.round(performance.now() - start);
    // execa leaves exitCode unset when the process was killed or never started (ENOENT, EACCES).
    const exitCode = typeof result.exitCode === "number"
      ? result.exitCode
      : result.signal !== undefined ? SIGNAL_EXIT_CODE : SPAWN_FAILURE_EXIT_CODE;
    const { signal } = result;
    logger.debug({ argv: command.argv, exitCode, signal, timedOut: result.timedOut, durationMs }, "Command finished");

    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      exitCode,
      timedOut: result.timedOut,
      ...(signal !== undefined ? { signal } : {}),
      durationMs,
    };
  }
}

/** Check whether a command resolves on PATH via `command -v`. */
export async function commandExists(executor: Executor, name: string, timeoutMs = 5_000): Promise<boolean> {
  // The name travels as $1 so it is never parsed by the shell.
  const result = await executor.execute({ argv: ["sh", "-c", 'command -v "$1"', "sh", name] }, timeoutMs);
  return result.exitCode === 0 && result.stdout.trim().length > 0;
}
