import { readFileSync } from "node:fs";
import { logger } from "../logger.js";

/** Standard os-release locations, in lookup order. */
export const OS_RELEASE_PATHS = ["/etc/os-release", "/usr/lib/os-release"] as const;

/** Distribution identity as exposed by os-release. */
export interface DistroIdentity {
  readonly id: string;
  readonly idLike: readonly string[];
  readonly name: string | null;
  readonly version: string | null;
  readonly codename: string | null;
}

/** Parse os-release content into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.trim().match(/^([A-Z][A-Z0-9_]*)=(.*)$/);
    if (match) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

export function toDistroIdentity(fields: Record<string, string>): DistroIdentity {
  const idLike = (fields.ID_LIKE ?? "").toLowerCase().split(/\s+/).filter(Boolean);
  return {
    id: (fields.ID ?? "").toLowerCase(),
    idLike,
    name: fields.PRETTY_NAME ?? fields.NAME ?? null,
    version: fields.VERSION_ID ?? null,
    codename: fields.VERSION_CODENAME ?? null,
  };
}

/** Read and parse the first os-release file found, or null when none is readable. */
export function readOsRelease(paths: readonly string[] = OS_RELEASE_PATHS): Record<string, string> | null {
  for (const path of paths) {
    try {
      return parseOsRelease(readFileSync(path, "utf-8"));
    } catch (err) {
      logger.debug({ path, error: err }, "os-release not readable");
    }
  }
  logger.warn({ paths }, "No readable os-release file");
  return null;
}
