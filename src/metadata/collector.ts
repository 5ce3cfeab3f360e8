import os from "node:os";
import type { SystemMetadata } from "../types/metadata.js";
import { UNKNOWN_FACT } from "../types/metadata.js";
import { readOsRelease } from "../distro/os-release.js";
import { logger } from "../logger.js";

/** Host fact sources. Each read may throw; the collector substitutes placeholders. */
export interface HostProbe {
  hostname(): string;
  osType(): string;
  osRelease(): string;
  kernelVersion(): string;
  machine(): string;
  osReleaseFields(): Record<string, string> | null;
  runtimeImplementation(): string;
  runtimeVersion(): string;
  cpuCount(): number;
  cpuArch(): string;
}

export const nodeHostProbe: HostProbe = {
  hostname: () => os.hostname(),
  osType: () => os.type(),
  osRelease: () => os.release(),
  kernelVersion: () => os.version(),
  machine: () => os.machine(),
  osReleaseFields: () => readOsRelease(),
  runtimeImplementation: () => process.release.name,
  runtimeVersion: () => process.versions.node,
  cpuCount: () => os.cpus().length,
  cpuArch: () => os.arch(),
};

function readFact<T>(fact: string, read: () => T, isUsable: (value: T) => boolean, placeholder: T): T {
  try {
    const value = read();
    if (isUsable(value)) return value;
    logger.debug({ fact }, "Host fact empty, using placeholder");
  } catch (err) {
    logger.debug({ fact, error: err }, "Host fact unavailable, using placeholder");
  }
  return placeholder;
}

function text(fact: string, read: () => string): string {
  return readFact(fact, () => read().trim(), (v) => v.length > 0, UNKNOWN_FACT);
}

/** Gather host, OS, distribution, runtime and CPU facts. Never throws. */
export function collectSystemMetadata(probe: HostProbe = nodeHostProbe): SystemMetadata {
  const release = readFact<Record<string, string> | null>("os-release", () => probe.osReleaseFields(), () => true, null) ?? {};

  const metadata: SystemMetadata = {
    hostname: text("hostname", () => probe.hostname()),
    os_name: text("os_name", () => probe.osType()),
    os_release: text("os_release", () => probe.osRelease()),
    kernel_version: text("kernel_version", () => probe.kernelVersion()),
    machine: text("machine", () => probe.machine()),
    distro_id: text("distro_id", () => release.ID ?? ""),
    distro_name: text("distro_name", () => release.NAME ?? ""),
    distro_version: text("distro_version", () => release.VERSION_ID ?? ""),
    distro_codename: text("distro_codename", () => release.VERSION_CODENAME ?? ""),
    runtime_implementation: text("runtime_implementation", () => probe.runtimeImplementation()),
    runtime_version: text("runtime_version", () => probe.runtimeVersion()),
    cpu_count: readFact("cpu_count", () => probe.cpuCount(), (n) => Number.isInteger(n) && n > 0, 0),
    cpu_arch: text("cpu_arch", () => probe.cpuArch()),
  };
  return Object.freeze(metadata);
}
