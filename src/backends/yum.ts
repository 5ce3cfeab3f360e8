import type { Command } from "../types/command.js";
import type { PackageDetail } from "../types/package.js";
import type { PackageBackend } from "./interface.js";
import { extractLabeledFields, parseTwoColumnListing, splitCommaList } from "./parse.js";

/** RHEL/CentOS/Fedora: everything comes from the rpm database. */
export class YumBackend implements PackageBackend {
  readonly kind = "yum" as const;
  readonly requiredTools = ["rpm"] as const;

  listInstalled(): Command {
    return { argv: ["rpm", "-qa", "--queryformat=%{NAME}\\t%{VERSION}\\n"] };
  }

  parseInstalled(stdout: string): Map<string, string> {
    return parseTwoColumnListing(stdout, "tab", "rpm");
  }

  packageInfo(name: string): Command {
    return { argv: ["rpm", "-qi", name] };
  }

  parsePackageInfo(stdout: string): PackageDetail {
    const fields = extractLabeledFields(stdout, ["Summary", "Requires"]);
    const summary = fields.get("Summary");
    const requires = fields.get("Requires");
    return {
      ...(summary ? { description: summary } : {}),
      ...(requires !== undefined ? { dependencies: splitCommaList(requires) } : {}),
    };
  }
}
