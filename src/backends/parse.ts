import { ExternalCommandError } from "../shared/errors.js";

export type FieldSeparator = "tab" | "whitespace";

function splitFields(line: string, separator: FieldSeparator): string[] {
  return separator === "tab" ? line.split("\t").map((f) => f.trim()) : line.trim().split(/\s+/);
}

/**
 * Parse `name<sep>version` rows. Every non-empty line must yield exactly two
 * non-empty fields. A repeated name is collapsed when its version matches
 * and rejected when it differs; anything else means the tool's output
 * format changed and the whole listing is rejected.
 */
export function parseTwoColumnListing(stdout: string, separator: FieldSeparator, source: string): Map<string, string> {
  const packages = new Map<string, string>();
  const lines = stdout.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].replace(/\r$/, "");
    if (!line.trim()) continue;

    const fields = splitFields(line, separator);
    const [name, version] = fields;
    if (fields.length !== 2 || !name || !version) {
      throw new ExternalCommandError(`Unparsable output from ${source} at line ${i + 1}: ${JSON.stringify(line)}`, {
        context: { source, lineNumber: i + 1, line },
      });
    }
    const seen = packages.get(name);
    // dpkg and rpm print a multiarch/multilib package once per architecture.
    if (seen === version) continue;
    if (seen !== undefined) {
      throw new ExternalCommandError(
        `Conflicting versions of package '${name}' in output from ${source} at line ${i + 1}: ${seen} and ${version}`,
        { context: { source, lineNumber: i + 1, line, versions: [seen, version] } },
      );
    }
    packages.set(name, version);
  }
  return packages;
}

/**
 * Extract `Label: value` fields. Only the first occurrence of each label is
 * kept. With `continuation`, indented lines that follow a captured field are
 * appended to it (pacman wraps long values that way).
 */
export function extractLabeledFields(
  stdout: string,
  labels: readonly string[],
  options?: { continuation?: boolean },
): Map<string, string> {
  const fields = new Map<string, string>();
  let current: string | null = null;

  for (const raw of stdout.split("\n")) {
    const line = raw.replace(/\r$/, "");
    if (options?.continuation && current && /^\s+\S/.test(line)) {
      fields.set(current, `${fields.get(current) ?? ""} ${line.trim()}`.trim());
      continue;
    }
    current = null;

    const match = line.match(/^([A-Za-z][\w -]*?)\s*:\s?(.*)$/);
    if (!match) continue;
    const label = match[1];
    if (!labels.includes(label) || fields.has(label)) continue;
    fields.set(label, match[2].trim());
    current = label;
  }
  return fields;
}

/** Split a comma-separated dependency field; empty entries are dropped. */
export function splitCommaList(value: string): string[] {
  return value.split(",").map((d) => d.trim()).filter(Boolean);
}
