/** Package manager identified on the host. */
export type PackageManagerKind = "apt" | "yum" | "pacman" | "zypper" | "unknown";

/** Package managers that have a listing and detail backend. */
export type SupportedPackageManager = "apt" | "yum" | "pacman";

export const SUPPORTED_PACKAGE_MANAGERS: readonly SupportedPackageManager[] = ["apt", "yum", "pacman"];

export const PACKAGE_MANAGER_KINDS: readonly PackageManagerKind[] = ["apt", "yum", "pacman", "zypper", "unknown"];

export function isSupportedPackageManager(kind: string): kind is SupportedPackageManager {
  return SUPPORTED_PACKAGE_MANAGERS.some((k) => k === kind);
}

export function isPackageManagerKind(value: string): value is PackageManagerKind {
  return PACKAGE_MANAGER_KINDS.some((k) => k === value);
}

/** Optional per-package fields from the detail query. */
export interface PackageDetail {
  readonly description?: string;
  readonly dependencies?: readonly string[];
}

/** One installed package. `name` is unique within a snapshot. */
export interface PackageRecord extends PackageDetail {
  readonly name: string;
  readonly version: string;
}
