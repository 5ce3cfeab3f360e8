import type { OutputFormat } from "../types/snapshot.js";
import { formatFileStamp } from "../snapshot/timestamp.js";

export function snapshotExtension(format: OutputFormat, compressed: boolean): string {
  return `${format === "structured" ? ".json" : ".txt"}${compressed ? ".gz" : ""}`;
}

/** `packages_YYYY-MM-DD_HH-MM-SS.<ext>` for the given moment. */
export function defaultSnapshotFilename(date: Date, format: OutputFormat, compressed: boolean): string {
  return `packages_${formatFileStamp(date)}${snapshotExtension(format, compressed)}`;
}
