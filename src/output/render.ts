import type { OutputFormat, Snapshot } from "../types/snapshot.js";
import type { PackageRecord } from "../types/package.js";
import { UNKNOWN_FACT } from "../types/metadata.js";
import type { StructuredPackage, StructuredSnapshot } from "./schema.js";

export interface RenderOptions {
  /** JSON indentation; ignored for text. */
  indent?: number;
}

function sortedRecords(snapshot: Snapshot): PackageRecord[] {
  return [...snapshot.packages.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

function toStructuredPackage(record: PackageRecord): StructuredPackage {
  return {
    version: record.version,
    ...(record.description !== undefined ? { description: record.description } : {}),
    ...(record.dependencies !== undefined ? { dependencies: [...record.dependencies] } : {}),
  };
}

/** Plain document form of a snapshot, packages keyed by name in sorted order. */
export function toStructuredSnapshot(snapshot: Snapshot): StructuredSnapshot {
  const packages: Record<string, StructuredPackage> = {};
  for (const record of sortedRecords(snapshot)) {
    packages[record.name] = toStructuredPackage(record);
  }
  return {
    metadata: { ...snapshot.metadata },
    timestamp: snapshot.timestamp,
    package_manager: snapshot.package_manager,
    packages,
  };
}

function metadataLines(snapshot: Snapshot): string[] {
  const m = snapshot.metadata;
  const codename = m.distro_codename !== UNKNOWN_FACT ? ` (${m.distro_codename})` : "";
  return [
    `Hostname: ${m.hostname}`,
    `OS: ${m.os_name} ${m.os_release}`,
    `Kernel version: ${m.kernel_version}`,
    `Architecture: ${m.machine}`,
    `Distribution: ${m.distro_name} ${m.distro_version}${codename}`,
    `Distribution ID: ${m.distro_id}`,
    `Runtime: ${m.runtime_implementation} ${m.runtime_version}`,
    `CPUs: ${m.cpu_count} (${m.cpu_arch})`,
  ];
}

function packageLines(record: PackageRecord): string[] {
  const lines = [`${record.name} (${record.version})`];
  if (record.description !== undefined) lines.push(`  Description: ${record.description}`);
  if (record.dependencies !== undefined) {
    lines.push(`  Depends: ${record.dependencies.length > 0 ? record.dependencies.join(", ") : "(none)"}`);
  }
  return lines;
}

export function renderText(snapshot: Snapshot): string {
  const lines = [
    ...metadataLines(snapshot),
    "",
    `Package snapshot taken at: ${snapshot.timestamp}`,
    `Package manager: ${snapshot.package_manager}`,
    "",
    ...sortedRecords(snapshot).flatMap(packageLines),
  ];
  return `${lines.join("\n")}\n`;
}

export function renderStructured(snapshot: Snapshot, indent = 2): string {
  return `${JSON.stringify(toStructuredSnapshot(snapshot), null, indent)}\n`;
}

export function renderSnapshot(snapshot: Snapshot, format: OutputFormat, options?: RenderOptions): string {
  return format === "structured" ? renderStructured(snapshot, options?.indent) : renderText(snapshot);
}
