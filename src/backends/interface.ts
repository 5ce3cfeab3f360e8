import type { Command } from "../types/command.js";
import type { PackageDetail, SupportedPackageManager } from "../types/package.js";

/**
 * Per-package-manager operations.
 * Each backend builds the native query commands and parses their output;
 * running them is left to the inventory layer and its Executor.
 */
export interface PackageBackend {
  readonly kind: SupportedPackageManager;
  /** Executables that must be on PATH before listing starts. */
  readonly requiredTools: readonly string[];

  listInstalled(): Command;
  /** Parse listing output into name -> version. Throws ExternalCommandError on malformed rows. */
  parseInstalled(stdout: string): Map<string, string>;

  packageInfo(name: string): Command;
  parsePackageInfo(stdout: string): PackageDetail;
}
