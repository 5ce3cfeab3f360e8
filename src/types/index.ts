export type { Command } from "./command.js";
export type { PackageManagerKind, SupportedPackageManager, PackageDetail, PackageRecord } from "./package.js";
export { SUPPORTED_PACKAGE_MANAGERS, PACKAGE_MANAGER_KINDS, isSupportedPackageManager, isPackageManagerKind } from "./package.js";
export type { SystemMetadata } from "./metadata.js";
export { UNKNOWN_FACT } from "./metadata.js";
export type { OutputFormat, Snapshot, ProgressEvent, ProgressListener } from "./snapshot.js";
