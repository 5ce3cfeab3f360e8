// Lookup table from detected package manager to backend. Adding a backend
// means: a PackageBackend class, an entry here, and a rule in distro/detector.ts.
import type { PackageManagerKind, SupportedPackageManager } from "../types/package.js";
import { isSupportedPackageManager } from "../types/package.js";
import type { PackageBackend } from "./interface.js";
import { AptBackend } from "./apt.js";
import { YumBackend } from "./yum.js";
import { PacmanBackend } from "./pacman.js";
import { UnsupportedBackendError } from "../shared/errors.js";

const BACKENDS: Readonly<Record<SupportedPackageManager, PackageBackend>> = {
  apt: new AptBackend(),
  yum: new YumBackend(),
  pacman: new PacmanBackend(),
};

/** Backend for a detected kind. Throws UnsupportedBackendError for zypper and unknown. */
export function getBackend(kind: PackageManagerKind): PackageBackend {
  if (!isSupportedPackageManager(kind)) {
    const message = kind === "unknown"
      ? "No supported package manager detected on this host"
      : `Package manager '${kind}' is detected but not supported`;
    throw new UnsupportedBackendError(message, { packageManager: kind });
  }
  return BACKENDS[kind];
}
