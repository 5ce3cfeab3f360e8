export enum SnapshotErrorCode {
  UNSUPPORTED_BACKEND = "UNSUPPORTED_BACKEND",
  MISSING_TOOL = "MISSING_TOOL",
  EXTERNAL_COMMAND_FAILED = "EXTERNAL_COMMAND_FAILED",
  EMPTY_INVENTORY = "EMPTY_INVENTORY",
  WRITE_FAILED = "WRITE_FAILED",
  INVALID_SNAPSHOT_FILE = "INVALID_SNAPSHOT_FILE",
  INVALID_CONFIG = "INVALID_CONFIG",
}

export class SnapshotError extends Error {
  readonly code: SnapshotErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: SnapshotErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "SnapshotError";
    this.code = code;
    this.context = context;
  }
}

/** No known package manager was detected, or the detected one has no backend. */
export class UnsupportedBackendError extends SnapshotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(SnapshotErrorCode.UNSUPPORTED_BACKEND, message, context);
    this.name = "UnsupportedBackendError";
  }
}

export class MissingToolError extends SnapshotError {
  readonly tools: readonly string[];

  constructor(tools: readonly string[], context?: Record<string, unknown>) {
    super(SnapshotErrorCode.MISSING_TOOL, `Required command not found on PATH: ${tools.join(", ")}`, context);
    this.name = "MissingToolError";
    this.tools = tools;
  }
}

/**
 * A subprocess exited non-zero, timed out, could not be spawned, or printed
 * output that does not match the shape its backend expects.
 * `transient` is set for timeouts: the same call may succeed on retry.
 */
export class ExternalCommandError extends SnapshotError {
  readonly transient: boolean;

  constructor(message: string, options?: { transient?: boolean; context?: Record<string, unknown> }) {
    super(SnapshotErrorCode.EXTERNAL_COMMAND_FAILED, message, options?.context);
    this.name = "ExternalCommandError";
    this.transient = options?.transient ?? false;
  }
}

export class EmptyInventoryError extends SnapshotError {
  constructor(message = "No installed packages were found; refusing to build an empty snapshot") {
    super(SnapshotErrorCode.EMPTY_INVENTORY, message);
    this.name = "EmptyInventoryError";
  }
}

export class WriteError extends SnapshotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(SnapshotErrorCode.WRITE_FAILED, message, context);
    this.name = "WriteError";
  }
}

/** Message of an unknown thrown value, including errors from another realm. */
export function describeError(err: unknown): string {
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}
