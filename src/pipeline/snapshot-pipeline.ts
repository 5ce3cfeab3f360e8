import path from "node:path";
import type { Executor } from "../execution/executor.js";
import type { ManagerDetector } from "../distro/detector.js";
import type { SnapshotConfig } from "../config/schema.js";
import type { SystemMetadata } from "../types/metadata.js";
import type { SupportedPackageManager } from "../types/package.js";
import type { OutputFormat, ProgressListener } from "../types/snapshot.js";
import { getBackend } from "../backends/registry.js";
import { ensureToolsAvailable, listPackages } from "../inventory/lister.js";
import { fetchPackageDetail } from "../inventory/detail-fetcher.js";
import { collectSystemMetadata } from "../metadata/collector.js";
import { assembleSnapshot } from "../snapshot/assembler.js";
import { defaultSnapshotFilename } from "../output/filename.js";
import { previewSnapshot, writeSnapshot, type SnapshotPreview } from "../output/writer.js";
import { validateSnapshotFile } from "../output/validator.js";
import { logger } from "../logger.js";

export interface SnapshotRequest {
  /** Destination file. Defaults to a timestamped name in `output.directory`. */
  outputPath?: string;
  format: OutputFormat;
  compressed: boolean;
  detailed: boolean;
  /** Collect and render, but write nothing. */
  dryRun: boolean;
  /** Re-read the written file. Defaults to `output.validate`. */
  validate?: boolean;
  onProgress?: ProgressListener;
  now?: Date;
}

export interface SnapshotDependencies {
  executor: Executor;
  detector: ManagerDetector;
  config: SnapshotConfig;
  collectMetadata?: () => SystemMetadata;
}

export type SnapshotOutcome =
  | {
      readonly mode: "written";
      readonly destination: string;
      readonly packageManager: SupportedPackageManager;
      readonly packageCount: number;
      /** null when validation was not requested. */
      readonly validated: boolean | null;
    }
  | {
      readonly mode: "preview";
      readonly packageManager: SupportedPackageManager;
      readonly preview: SnapshotPreview;
    };

/**
 * One snapshot run: detect, check tools, list, enrich, assemble, then write
 * (or preview) and optionally validate. Every error except detail lookups
 * aborts the run.
 */
export async function takeSnapshot(request: SnapshotRequest, deps: SnapshotDependencies): Promise<SnapshotOutcome> {
  const { executor, config } = deps;
  const now = request.now ?? new Date();

  // ── Phase 1: Resolve backend ────────────────────────────────────
  const kind = deps.detector.detect();
  const backend = getBackend(kind);

  // ── Phase 2: Check required executables ─────────────────────────
  await ensureToolsAvailable(backend, executor);

  // ── Phase 3: List and enrich ────────────────────────────────────
  const packages = await listPackages(backend, executor, config.commands.list_timeout_seconds * 1000);
  const detailTimeoutMs = config.commands.detail_timeout_seconds * 1000;
  const snapshot = await assembleSnapshot({
    packages,
    packageManager: backend.kind,
    metadata: (deps.collectMetadata ?? collectSystemMetadata)(),
    detailed: request.detailed,
    fetchDetail: (name) => fetchPackageDetail(backend, executor, name, detailTimeoutMs),
    onProgress: request.onProgress,
    dryRun: request.dryRun,
    now,
  });

  // ── Phase 4: Persist ────────────────────────────────────────────
  const destination = request.outputPath
    ?? path.join(config.output.directory, defaultSnapshotFilename(now, request.format, request.compressed));

  if (request.dryRun) {
    const preview = previewSnapshot(destination, snapshot, {
      format: request.format,
      compressed: request.compressed,
      indent: config.output.indent,
      maxLines: config.output.preview_lines,
    });
    logger.info({ destination, packages: preview.packageCount }, "Dry run: snapshot not written");
    return { mode: "preview", packageManager: backend.kind, preview };
  }

  await writeSnapshot(destination, snapshot, {
    format: request.format,
    compressed: request.compressed,
    indent: config.output.indent,
    compressionLevel: config.output.compression_level,
  });

  // ── Phase 5: Validate ───────────────────────────────────────────
  const shouldValidate = request.validate ?? config.output.validate;
  const validated = shouldValidate ? await validateSnapshotFile(destination, request.format, request.compressed) : null;

  return {
    mode: "written",
    destination,
    packageManager: backend.kind,
    packageCount: snapshot.packages.size,
    validated,
  };
}
