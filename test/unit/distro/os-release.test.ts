import path from "path";
import { parseOsRelease, readOsRelease, toDistroIdentity } from "../../../src/distro/os-release.js";

const FIXTURES = path.join(__dirname, "../../fixtures/os-release");

describe("parseOsRelease", () => {
  it("parses quoted and unquoted values", () => {
    const fields = parseOsRelease('NAME="Ubuntu"\nID=ubuntu\nVERSION_CODENAME=\'jammy\'\n');
    expect(fields).toEqual({ NAME: "Ubuntu", ID: "ubuntu", VERSION_CODENAME: "jammy" });
  });

  it("skips comments and blank lines", () => {
    const fields = parseOsRelease("# comment\n\nID=arch\n");
    expect(fields).toEqual({ ID: "arch" });
  });
});

describe("toDistroIdentity", () => {
  it("lowercases the id and splits ID_LIKE", () => {
    const identity = toDistroIdentity({ ID: "Rocky", ID_LIKE: "rhel centos fedora", NAME: "Rocky Linux", VERSION_ID: "9.3" });
    expect(identity).toEqual({
      id: "rocky",
      idLike: ["rhel", "centos", "fedora"],
      name: "Rocky Linux",
      version: "9.3",
      codename: null,
    });
  });

  it("prefers PRETTY_NAME and tolerates missing fields", () => {
    expect(toDistroIdentity({ PRETTY_NAME: "Arch Linux", NAME: "Arch" })).toEqual({
      id: "",
      idLike: [],
      name: "Arch Linux",
      version: null,
      codename: null,
    });
  });
});

describe("readOsRelease", () => {
  it("reads the first existing file", () => {
    const fields = readOsRelease(["/nonexistent/os-release", path.join(FIXTURES, "ubuntu")]);
    expect(fields?.ID).toBe("ubuntu");
    expect(fields?.VERSION_CODENAME).toBe("jammy");
  });

  it("returns null when no file is readable", () => {
    expect(readOsRelease(["/nonexistent/a", "/nonexistent/b"])).toBeNull();
  });
});
