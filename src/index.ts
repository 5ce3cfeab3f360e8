export * from "./types/index.js";
export {
  SnapshotError,
  SnapshotErrorCode,
  UnsupportedBackendError,
  MissingToolError,
  ExternalCommandError,
  EmptyInventoryError,
  WriteError,
} from "./shared/errors.js";
export type { Executor, ExecResult } from "./execution/executor.js";
export { LocalExecutor, commandExists } from "./execution/executor.js";
export type { ManagerDetector } from "./distro/detector.js";
export { HostManagerDetector, FixedManagerDetector, resolvePackageManager } from "./distro/detector.js";
export { parseOsRelease, readOsRelease, toDistroIdentity, type DistroIdentity } from "./distro/os-release.js";
export type { PackageBackend } from "./backends/interface.js";
export { getBackend } from "./backends/registry.js";
export { listPackages, ensureToolsAvailable } from "./inventory/lister.js";
export { fetchPackageDetail } from "./inventory/detail-fetcher.js";
export { collectSystemMetadata, nodeHostProbe, type HostProbe } from "./metadata/collector.js";
export { assembleSnapshot, type AssembleOptions } from "./snapshot/assembler.js";
export { renderSnapshot, renderText, renderStructured, toStructuredSnapshot } from "./output/render.js";
export { writeSnapshot, previewSnapshot, type WriteOptions, type PreviewOptions, type SnapshotPreview } from "./output/writer.js";
export { validateSnapshotFile, readStructuredSnapshot } from "./output/validator.js";
export { defaultSnapshotFilename } from "./output/filename.js";
export type { StructuredSnapshot } from "./output/schema.js";
export { loadConfig, type ConfigResult } from "./config/loader.js";
export { DEFAULT_CONFIG, type SnapshotConfig } from "./config/schema.js";
export { takeSnapshot, type SnapshotRequest, type SnapshotDependencies, type SnapshotOutcome } from "./pipeline/snapshot-pipeline.js";
