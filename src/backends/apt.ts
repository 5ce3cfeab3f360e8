import type { Command } from "../types/command.js";
import type { PackageDetail } from "../types/package.js";
import type { PackageBackend } from "./interface.js";
import { extractLabeledFields, parseTwoColumnListing, splitCommaList } from "./parse.js";

/** Debian/Ubuntu: dpkg database for the listing, apt-cache for details. */
export class AptBackend implements PackageBackend {
  readonly kind = "apt" as const;
  readonly requiredTools = ["dpkg-query", "apt-cache"] as const;

  listInstalled(): Command {
    // dpkg-query expands \t and \n in the format itself.
    return { argv: ["dpkg-query", "-W", "-f=${Package}\\t${Version}\\n"] };
  }

  parseInstalled(stdout: string): Map<string, string> {
    return parseTwoColumnListing(stdout, "tab", "dpkg-query");
  }

  packageInfo(name: string): Command {
    return { argv: ["apt-cache", "show", name] };
  }

  parsePackageInfo(stdout: string): PackageDetail {
    const fields = extractLabeledFields(stdout, ["Description", "Description-en", "Depends"]);
    const description = fields.get("Description") ?? fields.get("Description-en");
    const depends = fields.get("Depends");
    return {
      ...(description ? { description } : {}),
      ...(depends !== undefined ? { dependencies: splitCommaList(depends) } : {}),
    };
  }
}
