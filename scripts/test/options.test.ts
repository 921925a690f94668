import { rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { checkOptionConflicts, parseCommandLine, resolveOptions } from "../src/config/options.js";
import { ConfigurationError } from "../src/errors.js";
import { makeOptions, makeTempDir } from "./fixtures/fakes.js";

describe("parseCommandLine", () => {
  it("maps flags onto option names", () => {
    const parsed = parseCommandLine([
      "--project",
      "vision",
      "--run-names",
      "a",
      "--run-names",
      "b",
      "--threads",
      "4",
      "--dry-run",
      "--save-dir",
      "/tmp/snap"
    ]);
    expect(parsed).toEqual({
      help: false,
      configFile: null,
      overrides: { project: "vision", runNames: ["a", "b"], threads: 4, dryRun: true, saveDir: "/tmp/snap" }
    });
  });

  it("reports help and the options file", () => {
    expect(parseCommandLine(["--help", "--config", "opts.yaml"])).toMatchObject({ help: true, configFile: "opts.yaml" });
  });

  it("rejects unknown flags and non-integer thread counts", () => {
    expect(() => parseCommandLine(["--projct", "vision"])).toThrow(ConfigurationError);
    expect(() => parseCommandLine(["--threads", "two"])).toThrow(ConfigurationError);
  });
});

describe("resolveOptions", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("fills defaults", async () => {
    const options = await resolveOptions(parseCommandLine(["--project", "vision"]));
    expect(options).toEqual(makeOptions());
  });

  it("layers the options file under the flags", async () => {
    const file = join(dir, "options.yaml");
    await writeFile(file, "project: from-file\nthreads: 2\nexcludeMetrics:\n  - debug\\..*\n", "utf8");

    const options = await resolveOptions(parseCommandLine(["--config", file, "--project", "from-flag"]), {
      experimentPrefix: "wb_"
    });

    expect(options.project).toBe("from-flag");
    expect(options.threads).toBe(2);
    expect(options.excludeMetrics).toEqual(["debug\\..*"]);
    expect(options.experimentPrefix).toBe("wb_");
  });

  it("rejects a missing project", async () => {
    await expect(resolveOptions(parseCommandLine([]))).rejects.toThrow(/Invalid options/);
  });

  it("rejects unknown keys and out-of-range values from the options file", async () => {
    const file = join(dir, "options.yaml");
    await writeFile(file, "project: vision\nthreads: 0\ncolour: blue\n", "utf8");
    await expect(resolveOptions(parseCommandLine(["--config", file]))).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("rejects an options file that is not a mapping", async () => {
    const file = join(dir, "options.yaml");
    await writeFile(file, "- vision\n", "utf8");
    await expect(resolveOptions(parseCommandLine(["--config", file]))).rejects.toThrow(/must contain a mapping/);
  });

  it("rejects a missing options file", async () => {
    await expect(resolveOptions(parseCommandLine(["--config", join(dir, "nope.yaml")]))).rejects.toThrow(
      /does not exist/
    );
  });
});

describe("checkOptionConflicts", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("accepts a dry run into an existing directory", async () => {
    await expect(checkOptionConflicts(makeOptions({ dryRun: true, saveDir: dir }))).resolves.toBeUndefined();
  });

  it("rejects contradictory modes", async () => {
    await expect(
      checkOptionConflicts(makeOptions({ dryRun: true, resumeFromDryRun: true, saveDir: dir }))
    ).rejects.toThrow(/cannot be used together/);
    await expect(checkOptionConflicts(makeOptions({ dryRun: true }))).rejects.toThrow(/--save-dir is required/);
    await expect(
      checkOptionConflicts(makeOptions({ dryRun: true, saveDir: dir, dualWriteExperimentId: "7" }))
    ).rejects.toThrow(/only applies/);
    await expect(
      checkOptionConflicts(makeOptions({ resumeFromCrash: true, dualWriteExperimentId: "7" }))
    ).rejects.toThrow(/locates the experiment by name/);
  });

  it("requires the save directory to exist", async () => {
    await expect(
      checkOptionConflicts(makeOptions({ resumeFromDryRun: true, saveDir: join(dir, "missing") }))
    ).rejects.toThrow(/does not exist/);
  });
});
