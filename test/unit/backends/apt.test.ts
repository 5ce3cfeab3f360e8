import fs from "fs";
import path from "path";
import { AptBackend } from "../../../src/backends/apt.js";

const FIXTURES = path.join(__dirname, "../../fixtures/apt");

describe("AptBackend", () => {
  const backend = new AptBackend();

  it("lists through dpkg-query with a tab-separated format", () => {
    expect(backend.listInstalled().argv).toEqual(["dpkg-query", "-W", "-f=${Package}\\t${Version}\\n"]);
    expect(backend.requiredTools).toEqual(["dpkg-query", "apt-cache"]);
  });

  it("parses the listing", () => {
    const packages = backend.parseInstalled("bash\t5.1-2\ncurl\t7.81.0-1\n");
    expect(Object.fromEntries(packages)).toEqual({ bash: "5.1-2", curl: "7.81.0-1" });
  });

  it("queries details with apt-cache show", () => {
    expect(backend.packageInfo("curl").argv).toEqual(["apt-cache", "show", "curl"]);
  });

  it("extracts description and depends from the first stanza", () => {
    const output = fs.readFileSync(path.join(FIXTURES, "apt-cache-show-curl.txt"), "utf-8");
    expect(backend.parsePackageInfo(output)).toEqual({
      description: "command line tool for transferring data with URL syntax",
      dependencies: ["libc6 (>= 2.34)", "libcurl4 (= 7.81.0-1ubuntu1.15)", "zlib1g (>= 1:1.1.4)"],
    });
  });

  it("falls back to Description-en", () => {
    expect(backend.parsePackageInfo("Package: x\nDescription-en: translated text\n")).toEqual({
      description: "translated text",
    });
  });

  it("returns an empty detail when no field is present", () => {
    expect(backend.parsePackageInfo("Package: x\nVersion: 1\n")).toEqual({});
  });
});
