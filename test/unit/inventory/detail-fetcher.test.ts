import { AptBackend } from "../../../src/backends/apt.js";
import { fetchPackageDetail } from "../../../src/inventory/detail-fetcher.js";
import { FakeExecutor } from "../../helpers/fake-executor.js";

describe("fetchPackageDetail", () => {
  const apt = new AptBackend();

  it("parses the detail output", async () => {
    const executor = new FakeExecutor().on(["apt-cache", "show", "bash"], {
      stdout: "Package: bash\nDepends: base-files (>= 2.1.12), debianutils (>= 5.6-0.1)\nDescription: GNU Bourne Again SHell\n",
    });
    await expect(fetchPackageDetail(apt, executor, "bash", 15_000)).resolves.toEqual({
      description: "GNU Bourne Again SHell",
      dependencies: ["base-files (>= 2.1.12)", "debianutils (>= 5.6-0.1)"],
    });
  });

  it("returns an empty detail when the query exits non-zero", async () => {
    const executor = new FakeExecutor().on(["apt-cache", "show", "curl"], { exitCode: 100, stderr: "E: No packages found" });
    await expect(fetchPackageDetail(apt, executor, "curl", 15_000)).resolves.toEqual({});
  });

  it("returns an empty detail when the query times out", async () => {
    const executor = new FakeExecutor().on(["apt-cache", "show", "curl"], { timedOut: true, exitCode: 143 });
    await expect(fetchPackageDetail(apt, executor, "curl", 15_000)).resolves.toEqual({});
  });

  it("returns an empty detail when the executor itself throws", async () => {
    const executor = {
      execute: async (): Promise<never> => {
        throw new Error("spawn failed");
      },
    };
    await expect(fetchPackageDetail(apt, executor, "curl", 15_000)).resolves.toEqual({});
  });
});
