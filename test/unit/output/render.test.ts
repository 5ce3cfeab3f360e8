import { renderSnapshot, renderStructured, renderText, toStructuredSnapshot } from "../../../src/output/render.js";
import { sampleMetadata, sampleSnapshot } from "../../helpers/factories.js";

const HEADER = [
  "Hostname: build-01",
  "OS: Linux 6.1.0-18-amd64",
  "Kernel version: #1 SMP PREEMPT_DYNAMIC Debian 6.1.76-1",
  "Architecture: x86_64",
  "Distribution: Debian GNU/Linux 12 (bookworm)",
  "Distribution ID: debian",
  "Runtime: node 20.11.1",
  "CPUs: 8 (x64)",
  "",
  "Package snapshot taken at: 2026-03-05 09:07:03",
  "Package manager: apt",
  "",
];

describe("renderText", () => {
  it("renders metadata, header lines and sorted package lines", () => {
    const snapshot = sampleSnapshot([
      { name: "curl", version: "7.81.0-1" },
      { name: "bash", version: "5.1-2" },
    ]);
    expect(renderText(snapshot)).toBe([...HEADER, "bash (5.1-2)", "curl (7.81.0-1)", ""].join("\n"));
  });

  it("indents detail lines under their package", () => {
    const snapshot = sampleSnapshot([
      { name: "zlib1g", version: "1:1.2.13", dependencies: [] },
      { name: "bash", version: "5.1-2", description: "GNU Bourne Again SHell", dependencies: ["base-files", "debianutils"] },
    ]);
    const lines = renderText(snapshot).split("\n").slice(HEADER.length);
    expect(lines).toEqual([
      "bash (5.1-2)",
      "  Description: GNU Bourne Again SHell",
      "  Depends: base-files, debianutils",
      "zlib1g (1:1.2.13)",
      "  Depends: (none)",
      "",
    ]);
  });

  it("sorts by code point, not locale", () => {
    const snapshot = sampleSnapshot([
      { name: "libc6", version: "2.35" },
      { name: "Xorg", version: "1.21" },
      { name: "apt", version: "2.4" },
    ]);
    const lines = renderText(snapshot).split("\n").slice(HEADER.length, HEADER.length + 3);
    expect(lines).toEqual(["Xorg (1.21)", "apt (2.4)", "libc6 (2.35)"]);
  });

  it("omits an unknown codename", () => {
    const snapshot = { ...sampleSnapshot([{ name: "bash", version: "5.1-2" }]), metadata: sampleMetadata({ distro_codename: "unknown" }) };
    expect(renderText(snapshot)).toContain("\nDistribution: Debian GNU/Linux 12\n");
  });
});

describe("renderStructured", () => {
  const snapshot = sampleSnapshot([
    { name: "curl", version: "7.81.0-1" },
    { name: "bash", version: "5.1-2", description: "GNU Bourne Again SHell", dependencies: ["base-files"] },
  ]);

  it("builds the document with name-keyed, sorted packages", () => {
    const doc = toStructuredSnapshot(snapshot);
    expect(Object.keys(doc)).toEqual(["metadata", "timestamp", "package_manager", "packages"]);
    expect(Object.keys(doc.packages)).toEqual(["bash", "curl"]);
    expect(doc.packages.curl).toEqual({ version: "7.81.0-1" });
    expect(doc.packages.bash).toEqual({ version: "5.1-2", description: "GNU Bourne Again SHell", dependencies: ["base-files"] });
  });

  it("serializes with the requested indent and a trailing newline", () => {
    const json = renderStructured(snapshot, 4);
    expect(json.endsWith("}\n")).toBe(true);
    expect(json.split("\n")[1]).toBe('    "metadata": {');
    expect(JSON.parse(json)).toEqual(toStructuredSnapshot(snapshot));
  });

  it("dispatches on format", () => {
    expect(renderSnapshot(snapshot, "structured")).toBe(renderStructured(snapshot));
    expect(renderSnapshot(snapshot, "text")).toBe(renderText(snapshot));
  });
});
