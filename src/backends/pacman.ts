import type { Command } from "../types/command.js";
import type { PackageDetail } from "../types/package.js";
import type { PackageBackend } from "./interface.js";
import { extractLabeledFields, parseTwoColumnListing } from "./parse.js";

/** Arch and derivatives. */
export class PacmanBackend implements PackageBackend {
  readonly kind = "pacman" as const;
  readonly requiredTools = ["pacman"] as const;

  listInstalled(): Command {
    return { argv: ["pacman", "-Q"] };
  }

  parseInstalled(stdout: string): Map<string, string> {
    return parseTwoColumnListing(stdout, "whitespace", "pacman");
  }

  packageInfo(name: string): Command {
    return { argv: ["pacman", "-Qi", name] };
  }

  parsePackageInfo(stdout: string): PackageDetail {
    const fields = extractLabeledFields(stdout, ["Description", "Depends On"], { continuation: true });
    const description = fields.get("Description");
    const dependsOn = fields.get("Depends On");
    // pacman prints "None" for an empty list.
    const dependencies = dependsOn === undefined
      ? undefined
      : dependsOn === "None" ? [] : dependsOn.split(/\s+/).filter(Boolean);
    return {
      ...(description && description !== "None" ? { description } : {}),
      ...(dependencies ? { dependencies } : {}),
    };
  }
}
