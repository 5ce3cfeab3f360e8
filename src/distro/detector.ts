import type { PackageManagerKind } from "../types/package.js";
import { readOsRelease, toDistroIdentity, type DistroIdentity } from "./os-release.js";
import { logger } from "../logger.js";

/** Selects the package manager for the current host. */
export interface ManagerDetector {
  detect(): PackageManagerKind;
}

interface DistroRule {
  readonly match: string;
  readonly kind: PackageManagerKind;
}

const DISTRO_RULES: readonly DistroRule[] = [
  { match: "ubuntu", kind: "apt" },
  { match: "debian", kind: "apt" },
  { match: "linuxmint", kind: "apt" },
  { match: "raspbian", kind: "apt" },
  { match: "pop", kind: "apt" },
  { match: "kali", kind: "apt" },
  { match: "centos", kind: "yum" },
  { match: "rhel", kind: "yum" },
  { match: "redhat", kind: "yum" },
  { match: "fedora", kind: "yum" },
  { match: "rocky", kind: "yum" },
  { match: "almalinux", kind: "yum" },
  { match: "ol", kind: "yum" },
  { match: "amzn", kind: "yum" },
  { match: "arch", kind: "pacman" },
  { match: "manjaro", kind: "pacman" },
  { match: "endeavouros", kind: "pacman" },
  { match: "suse", kind: "zypper" },
  { match: "opensuse", kind: "zypper" },
  { match: "sles", kind: "zypper" },
];

// Short ids ("ol", "pop") only ever match exactly; as substrings they hit unrelated names.
const MIN_SUBSTRING_RULE_LENGTH = 4;

function matchToken(token: string): PackageManagerKind | null {
  if (!token) return null;
  const exact = DISTRO_RULES.find((r) => r.match === token);
  if (exact) return exact.kind;
  const partial = DISTRO_RULES.find((r) => r.match.length >= MIN_SUBSTRING_RULE_LENGTH && token.includes(r.match));
  return partial?.kind ?? null;
}

/**
 * Map a distribution identity to a package manager, most specific first:
 * the ID itself, then each ID_LIKE parent in declared order.
 */
export function resolvePackageManager(identity: DistroIdentity): PackageManagerKind {
  for (const token of [identity.id, ...identity.idLike]) {
    const kind = matchToken(token);
    if (kind) return kind;
  }
  return "unknown";
}

/** Detects the package manager from the host's os-release file. */
export class HostManagerDetector implements ManagerDetector {
  constructor(private readonly readFields: () => Record<string, string> | null = () => readOsRelease()) {}

  detect(): PackageManagerKind {
    const fields = this.readFields();
    if (!fields) return "unknown";
    const identity = toDistroIdentity(fields);
    const kind = resolvePackageManager(identity);
    logger.info({ distroId: identity.id, idLike: identity.idLike, packageManager: kind }, "Package manager detected");
    return kind;
  }
}

/** Returns a fixed kind without inspecting the host. */
export class FixedManagerDetector implements ManagerDetector {
  constructor(private readonly kind: PackageManagerKind) {}

  detect(): PackageManagerKind {
    return this.kind;
  }
}
