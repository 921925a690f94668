import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CrashRecoveryManager, classifyRun } from "../src/destination/recovery.js";
import { NetworkDestination } from "../src/destination/resolver.js";
import { ExperimentNotFoundError } from "../src/errors.js";
import { logger } from "../src/utils/logger.js";
import { InMemoryWriter } from "./fixtures/fakes.js";

const MARKER = { migrate_from_source_project: "True", source_project_name: "vision" };

describe("classifyRun", () => {
  it("tells finished, crashed and group parent runs apart", () => {
    expect(classifyRun({ sourceRunId: "a", location: "1", tags: { migration_complete: "True" } })).toBe("finished");
    expect(classifyRun({ sourceRunId: "a", location: "1", tags: { migration_complete: "False" } })).toBe("crashed");
    expect(classifyRun({ sourceRunId: "a", location: "1", tags: {} })).toBe("crashed");
    expect(classifyRun({ sourceRunId: null, location: "1", tags: { migration_group_parent: "sweep" } })).toBe("group");
  });
});

describe("CrashRecoveryManager", () => {
  let writer: InMemoryWriter;

  beforeEach(() => {
    writer = new InMemoryWriter();
    vi.spyOn(logger, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("aborts when the experiment cannot be found", async () => {
    const recovery = new CrashRecoveryManager(new NetworkDestination(writer));
    await expect(recovery.recover({ projectName: "vision" })).rejects.toBeInstanceOf(ExperimentNotFoundError);
    expect(writer.deleted).toEqual([]);
  });

  it("deletes unfinished runs and reports finished source ids", async () => {
    const experiment = writer.seedExperiment("vision", MARKER);
    writer.seedRun(experiment.id, "done", { source_run_id: "a", migration_complete: "True" });
    const crashed = writer.seedRun(experiment.id, "half", { source_run_id: "b" }, "RUNNING");
    const parent = writer.seedRun(experiment.id, "sweep", { migration_group_parent: "sweep" });

    const result = await new CrashRecoveryManager(new NetworkDestination(writer)).recover({ projectName: "vision" });

    expect(result.experiment.id).toBe(experiment.id);
    expect([...result.finished]).toEqual(["a"]);
    expect(result.reaped).toEqual([crashed.id]);
    expect(writer.deleted).toEqual([crashed.id]);
    expect(writer.runs.has(parent.id)).toBe(true);
  });

  it("is a no-op on a clean experiment", async () => {
    const experiment = writer.seedExperiment("vision", MARKER);
    writer.seedRun(experiment.id, "done", { source_run_id: "a", migration_complete: "True" });
    const manager = new CrashRecoveryManager(new NetworkDestination(writer));

    const first = await manager.recover({ projectName: "vision" });
    const second = await manager.recover({ projectName: "vision" });
    expect(first.reaped).toEqual([]);
    expect([...second.finished]).toEqual(["a"]);
    expect(writer.deleted).toEqual([]);
  });
});
