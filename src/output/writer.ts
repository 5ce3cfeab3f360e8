// Atomic snapshot writer: render, stream into a hidden temporary file in the
// destination directory, then rename over the destination. rename(2) within
// one filesystem is atomic, so readers see either the old file or the new one.
import { randomBytes } from "node:crypto";
import { createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import type { OutputFormat, Snapshot } from "../types/snapshot.js";
import { renderSnapshot } from "./render.js";
import { WriteError, describeError } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface WriteOptions {
  format: OutputFormat;
  compressed: boolean;
  indent?: number;
  /** gzip level 1-9. */
  compressionLevel?: number;
}

export interface PreviewOptions {
  format: OutputFormat;
  compressed: boolean;
  indent?: number;
  maxLines?: number;
}

/** What a write would produce, without touching the filesystem. */
export interface SnapshotPreview {
  readonly destination: string;
  readonly format: OutputFormat;
  readonly compressed: boolean;
  readonly packageCount: number;
  readonly sample: string;
  readonly truncatedLines: number;
}

/** Hidden sibling of the destination, unique per process and call. */
export function temporaryPathFor(destination: string): string {
  const suffix = `${process.pid}.${randomBytes(4).toString("hex")}`;
  return path.join(path.dirname(destination), `.${path.basename(destination)}.${suffix}.tmp`);
}

/** Render and persist a snapshot with all-or-nothing semantics. */
export async function writeSnapshot(destination: string, snapshot: Snapshot, options: WriteOptions): Promise<void> {
  const tempPath = temporaryPathFor(destination);
  try {
    const content = Buffer.from(renderSnapshot(snapshot, options.format, { indent: options.indent }), "utf-8");
    await mkdir(path.dirname(destination), { recursive: true });

    const source = Readable.from([content]);
    const sink = createWriteStream(tempPath, { flags: "wx" });
    if (options.compressed) {
      await pipeline(source, createGzip({ level: options.compressionLevel }), sink);
    } else {
      await pipeline(source, sink);
    }
    await rename(tempPath, destination);
  } catch (err) {
    await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
      logger.warn({ tempPath, error: describeError(cleanupErr) }, "Could not remove temporary snapshot file");
    });
    throw new WriteError(`Failed to write snapshot to ${destination}: ${describeError(err)}`, {
      destination,
      cause: describeError(err),
    });
  }
  logger.info(
    { destination, format: options.format, compressed: options.compressed, packages: snapshot.packages.size },
    "Snapshot written",
  );
}

/** Rendered sample of a snapshot for dry runs. Performs no filesystem access. */
export function previewSnapshot(destination: string, snapshot: Snapshot, options: PreviewOptions): SnapshotPreview {
  const lines = renderSnapshot(snapshot, options.format, { indent: options.indent }).replace(/\n$/, "").split("\n");
  const maxLines = options.maxLines ?? 20;
  return {
    destination,
    format: options.format,
    compressed: options.compressed,
    packageCount: snapshot.packages.size,
    sample: lines.slice(0, maxLines).join("\n"),
    truncatedLines: Math.max(0, lines.length - maxLines),
  };
}
