import type { PackageBackend } from "../backends/interface.js";
import type { Executor } from "../execution/executor.js";
import type { PackageDetail } from "../types/package.js";
import { describeError } from "../shared/errors.js";
import { runChecked } from "./lister.js";
import { logger } from "../logger.js";

/**
 * Query description and dependencies of one package.
 * Enrichment is best-effort: any failure yields an empty detail.
 */
export async function fetchPackageDetail(
  backend: PackageBackend,
  executor: Executor,
  name: string,
  timeoutMs: number,
): Promise<PackageDetail> {
  try {
    const result = await runChecked(executor, backend.packageInfo(name), timeoutMs);
    return backend.parsePackageInfo(result.stdout);
  } catch (err) {
    logger.warn({ package: name, packageManager: backend.kind, error: describeError(err) }, "Package detail unavailable");
    return {};
  }
}
