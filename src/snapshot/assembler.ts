import type { PackageDetail, PackageManagerKind, PackageRecord } from "../types/package.js";
import { isSupportedPackageManager } from "../types/package.js";
import type { SystemMetadata } from "../types/metadata.js";
import type { ProgressListener, Snapshot } from "../types/snapshot.js";
import { EmptyInventoryError, ExternalCommandError, UnsupportedBackendError } from "../shared/errors.js";
import { formatTimestamp } from "./timestamp.js";
import { logger } from "../logger.js";

export interface AssembleOptions {
  packages: ReadonlyMap<string, string>;
  packageManager: PackageManagerKind;
  metadata: SystemMetadata;
  detailed: boolean;
  /** Called once per package when `detailed` is set. Expected to absorb its own failures. */
  fetchDetail: (name: string) => Promise<PackageDetail>;
  onProgress?: ProgressListener;
  /** Dry runs stay quiet: no progress events. */
  dryRun?: boolean;
  now?: Date;
}

function toRecord(name: string, version: string, detail: PackageDetail): PackageRecord {
  return Object.freeze({
    name,
    version,
    ...(detail.description !== undefined ? { description: detail.description } : {}),
    ...(detail.dependencies !== undefined ? { dependencies: Object.freeze([...detail.dependencies]) } : {}),
  });
}

/** Combine listing, optional details, metadata and timestamp into one frozen snapshot. */
export async function assembleSnapshot(options: AssembleOptions): Promise<Snapshot> {
  const { packages, packageManager, metadata, detailed } = options;

  if (packages.size === 0) throw new EmptyInventoryError();
  if (!isSupportedPackageManager(packageManager)) {
    throw new UnsupportedBackendError(`Cannot build a snapshot for package manager '${packageManager}'`, { packageManager });
  }

  const names = [...packages.keys()].sort();
  const records = new Map<string, PackageRecord>();
  const reportProgress = detailed && !options.dryRun ? options.onProgress : undefined;

  for (const [index, name] of names.entries()) {
    const version = packages.get(name) ?? "";
    if (!version) {
      throw new ExternalCommandError(`Package '${name}' has an empty version`, { context: { name, packageManager } });
    }
    const detail = detailed ? await options.fetchDetail(name) : {};
    records.set(name, toRecord(name, version, detail));
    reportProgress?.({ processed: index + 1, total: names.length, name });
  }

  logger.debug({ packageManager, count: records.size, detailed }, "Snapshot assembled");
  return Object.freeze({
    timestamp: formatTimestamp(options.now ?? new Date()),
    package_manager: packageManager,
    metadata,
    packages: records,
  });
}
