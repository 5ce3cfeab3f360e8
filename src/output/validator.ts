import { readFile } from "node:fs/promises";
import { promisify } from "node:util";
import { gunzip } from "node:zlib";
import type { OutputFormat } from "../types/snapshot.js";
import { StructuredSnapshotSchema, type StructuredSnapshot } from "./schema.js";
import { SnapshotError, SnapshotErrorCode, describeError } from "../shared/errors.js";
import { logger } from "../logger.js";

const gunzipAsync = promisify(gunzip);

async function readSnapshotContent(filePath: string, compressed: boolean): Promise<string> {
  const raw = await readFile(filePath);
  const bytes = compressed ? await gunzipAsync(raw) : raw;
  return bytes.toString("utf-8");
}

/** Load a structured snapshot file, through gunzip when compressed. */
export async function readStructuredSnapshot(filePath: string, compressed: boolean): Promise<StructuredSnapshot> {
  let document: unknown;
  try {
    document = JSON.parse(await readSnapshotContent(filePath, compressed));
  } catch (err) {
    throw new SnapshotError(SnapshotErrorCode.INVALID_SNAPSHOT_FILE, `Cannot read snapshot ${filePath}: ${describeError(err)}`, {
      filePath,
    });
  }
  const parsed = StructuredSnapshotSchema.safeParse(document);
  if (!parsed.success) {
    throw new SnapshotError(SnapshotErrorCode.INVALID_SNAPSHOT_FILE, `Snapshot ${filePath} is malformed: ${parsed.error.message}`, {
      filePath,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * True when the file exists, reads back through the declared pipeline and,
 * for structured output, parses as a snapshot document. Never throws.
 */
export async function validateSnapshotFile(filePath: string, format: OutputFormat, compressed: boolean): Promise<boolean> {
  try {
    if (format === "structured") {
      await readStructuredSnapshot(filePath, compressed);
    } else {
      await readSnapshotContent(filePath, compressed);
    }
    return true;
  } catch (err) {
    logger.warn({ filePath, format, compressed, error: describeError(err) }, "Snapshot validation failed");
    return false;
  }
}
