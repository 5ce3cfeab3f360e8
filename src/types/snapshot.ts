import type { SupportedPackageManager, PackageRecord } from "./package.js";
import type { SystemMetadata } from "./metadata.js";

/** Output rendering. Orthogonal to compression. */
export type OutputFormat = "text" | "structured";

/** Immutable inventory record produced by one run. */
export interface Snapshot {
  /** Local time, `YYYY-MM-DD HH:MM:SS`. */
  readonly timestamp: string;
  readonly package_manager: SupportedPackageManager;
  readonly metadata: SystemMetadata;
  readonly packages: ReadonlyMap<string, PackageRecord>;
}

/** Emitted by the assembler after each detail fetch. */
export interface ProgressEvent {
  readonly processed: number;
  readonly total: number;
  readonly name: string;
}

export type ProgressListener = (event: ProgressEvent) => void;
