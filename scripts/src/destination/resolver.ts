import { randomBytes } from "node:crypto";
import { join } from "node:path";
import fsExtra from "fs-extra";

import type { DestinationWriter, RunDescriptor, TagMap } from "lib/migration/types.js";

import { EXPERIMENT_SUFFIX_LENGTH, MIGRATION_TAGS, TRUE_TAG_VALUE } from "../constants.js";
import { ConfigurationError, ExperimentNotFoundError, NamingCollisionError } from "../errors.js";
import { isDirectory, listSubdirectories, removeIfExists } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import { appendTags, readTags } from "./snapshot.js";
import { NetworkTarget, SnapshotTarget, type DestinationTarget } from "./targets.js";

export interface ExperimentRequest {
  projectName: string;
  experimentName?: string | null;
  skipExisting?: boolean;
  dualWriteExperimentId?: string | null;
}

export interface ResolvedExperiment {
  id: string;
  name: string;
  /** Experiment id, or the experiment directory in snapshot mode. */
  location: string;
}

export interface DestinationRunRecord {
  sourceRunId: string | null;
  location: string;
  tags: TagMap;
}

export interface OpenRunOptions {
  resume: boolean;
  nested: boolean;
}

/**
 * Everything the pipeline needs from a destination. One implementation per mode,
 * picked once at startup.
 */
export interface Destination {
  readonly kind: "network" | "snapshot";
  resolveExperiment(request: ExperimentRequest): Promise<ResolvedExperiment>;
  locateExperiment(request: ExperimentRequest): Promise<ResolvedExperiment>;
  listRuns(experiment: ResolvedExperiment): Promise<DestinationRunRecord[]>;
  discardRun(record: DestinationRunRecord): Promise<void>;
  openRun(experiment: ResolvedExperiment, run: RunDescriptor, options: OpenRunOptions): Promise<DestinationTarget>;
}

export function experimentTags(projectName: string): TagMap {
  return {
    [MIGRATION_TAGS.experimentMarker]: TRUE_TAG_VALUE,
    [MIGRATION_TAGS.projectName]: projectName
  };
}

export function runTags(run: RunDescriptor): TagMap {
  return {
    [MIGRATION_TAGS.sourceRunId]: run.id,
    [MIGRATION_TAGS.sourceRunName]: run.name,
    [MIGRATION_TAGS.sourceCreatedAt]: run.createdAt,
    ...(run.group ? { [MIGRATION_TAGS.runGroup]: run.group } : {})
  };
}

export function randomSuffix(length: number = EXPERIMENT_SUFFIX_LENGTH): string {
  return randomBytes(Math.ceil(length / 2)).toString("hex").slice(0, length);
}

function quoteFilterValue(value: string): string {
  return `'${value.replace(/'/g, "\\'")}'`;
}

export class NetworkDestination implements Destination {
  readonly kind = "network" as const;
  private readonly groupParents = new Map<string, Promise<string>>();

  constructor(
    private readonly writer: DestinationWriter,
    private readonly prefix: string = ""
  ) {}

  async resolveExperiment(request: ExperimentRequest): Promise<ResolvedExperiment> {
    const tags = experimentTags(request.projectName);

    if (request.dualWriteExperimentId) {
      const id = request.dualWriteExperimentId;
      await this.writer.setExperimentTags(id, { ...tags, [MIGRATION_TAGS.dualWrite]: TRUE_TAG_VALUE });
      logger.info("Reusing dual-write experiment", { experimentId: id });
      return { id, name: id, location: id };
    }

    const name = `${this.prefix}${request.experimentName ?? request.projectName}`;
    const existing = await this.writer.getExperimentByName(name);

    if (!existing) {
      const created = await this.writer.createExperiment(name, tags);
      logger.info("Created destination experiment", { name, experimentId: created.id });
      return { id: created.id, name, location: created.id };
    }

    if (existing.tags[MIGRATION_TAGS.experimentMarker]) {
      logger.info("Reusing migrated experiment", { name, experimentId: existing.id });
      return { id: existing.id, name, location: existing.id };
    }

    if (request.skipExisting) {
      await this.writer.setExperimentTags(existing.id, tags);
      logger.info("Reusing existing experiment and tagging it as migrated", { name, experimentId: existing.id });
      return { id: existing.id, name, location: existing.id };
    }

    const suffixed = `${name}_${randomSuffix()}`;
    const created = await this.writer.createExperiment(suffixed, tags);
    logger.warn("Experiment name is taken by an unrelated experiment; created a suffixed one", {
      requested: name,
      name: suffixed,
      experimentId: created.id
    });
    return { id: created.id, name: suffixed, location: created.id };
  }

  async locateExperiment(request: ExperimentRequest): Promise<ResolvedExperiment> {
    if (request.dualWriteExperimentId) {
      throw new ConfigurationError("Crash resume locates the experiment by name; drop --dual-write-experiment-id");
    }
    const name = `${this.prefix}${request.experimentName ?? request.projectName}`;
    const existing = await this.writer.getExperimentByName(name);
    if (!existing || !existing.tags[MIGRATION_TAGS.experimentMarker]) {
      throw new ExperimentNotFoundError(
        `Cannot find a migrated experiment named "${name}" to resume. Check the project and experiment names or drop --resume-from-crash.`
      );
    }
    return { id: existing.id, name, location: existing.id };
  }

  async listRuns(experiment: ResolvedExperiment): Promise<DestinationRunRecord[]> {
    const runs = await this.writer.searchRuns(experiment.id);
    return runs.map((run) => ({
      sourceRunId: run.tags[MIGRATION_TAGS.sourceRunId] ?? null,
      location: run.id,
      tags: run.tags
    }));
  }

  async discardRun(record: DestinationRunRecord): Promise<void> {
    await this.writer.deleteRun(record.location);
  }

  async openRun(experiment: ResolvedExperiment, run: RunDescriptor, options: OpenRunOptions): Promise<DestinationTarget> {
    if (!options.resume) {
      const clashes = await this.writer.searchRuns(
        experiment.id,
        `tags.${MIGRATION_TAGS.sourceRunId} = ${quoteFilterValue(run.id)}`
      );
      if (clashes.length > 0) {
        throw new NamingCollisionError(
          `Experiment ${experiment.name} already holds a run for source run ${run.id}. Use --skip-existing or --resume-from-crash.`,
          clashes[0]?.id ?? run.id
        );
      }
    }

    const tags = runTags(run);
    if (options.nested && run.group) {
      tags[MIGRATION_TAGS.parentRunId] = await this.groupParent(experiment, run.group);
    }
    const handle = await this.writer.startRun(experiment.id, run.name, tags);
    logger.info("Created destination run", { runId: handle.id, name: run.name, sourceRunId: run.id });
    return new NetworkTarget(this.writer, run.id, handle.id);
  }

  private groupParent(experiment: ResolvedExperiment, group: string): Promise<string> {
    let parent = this.groupParents.get(group);
    if (!parent) {
      parent = this.findOrCreateGroupParent(experiment, group);
      this.groupParents.set(group, parent);
    }
    return parent;
  }

  private async findOrCreateGroupParent(experiment: ResolvedExperiment, group: string): Promise<string> {
    const found = await this.writer.searchRuns(
      experiment.id,
      `tags.${MIGRATION_TAGS.groupParent} = ${quoteFilterValue(group)}`
    );
    const existing = found[0];
    if (existing) {
      return existing.id;
    }
    const parent = await this.writer.startRun(experiment.id, group, { [MIGRATION_TAGS.groupParent]: group });
    await this.writer.endRun(parent.id, "FINISHED");
    logger.info("Created group parent run", { group, runId: parent.id });
    return parent.id;
  }
}

export class SnapshotDestination implements Destination {
  readonly kind = "snapshot" as const;

  constructor(private readonly saveDir: string) {}

  async resolveExperiment(request: ExperimentRequest): Promise<ResolvedExperiment> {
    await this.assertSaveDir();
    const name = request.experimentName ?? request.projectName;
    const location = join(this.saveDir, name);

    if (await isDirectory(location)) {
      if (!request.skipExisting) {
        throw new NamingCollisionError(
          `The experiment directory ${location} already exists. Remove it first, or set --resume-from-crash when resuming a crashed migration.`,
          location
        );
      }
      return { id: name, name, location };
    }

    await fsExtra.ensureDir(location);
    await appendTags(location, experimentTags(request.projectName));
    return { id: name, name, location };
  }

  async locateExperiment(request: ExperimentRequest): Promise<ResolvedExperiment> {
    await this.assertSaveDir();
    const name = request.experimentName ?? request.projectName;
    const location = join(this.saveDir, name);
    if (!(await isDirectory(location))) {
      throw new ExperimentNotFoundError(
        `Cannot find experiment directory ${location} to resume. Check the project name and --save-dir or drop --resume-from-crash.`
      );
    }
    return { id: name, name, location };
  }

  async listRuns(experiment: ResolvedExperiment): Promise<DestinationRunRecord[]> {
    const names = await listSubdirectories(experiment.location);
    const records: DestinationRunRecord[] = [];
    for (const name of names) {
      const location = join(experiment.location, name);
      records.push({ sourceRunId: name, location, tags: await readTags(location) });
    }
    return records;
  }

  async discardRun(record: DestinationRunRecord): Promise<void> {
    await removeIfExists(record.location);
  }

  async openRun(experiment: ResolvedExperiment, run: RunDescriptor, options: OpenRunOptions): Promise<DestinationTarget> {
    // Keyed by the stable run id: display names are not unique.
    const location = join(experiment.location, run.id);
    if (await isDirectory(location)) {
      if (!options.resume) {
        throw new NamingCollisionError(
          `Run directory ${location} already exists. Remove it first, or set --resume-from-crash when resuming a crashed migration.`,
          location
        );
      }
      await removeIfExists(location);
    }
    await fsExtra.ensureDir(location);
    await appendTags(location, runTags(run));
    return new SnapshotTarget(run.id, location);
  }

  private async assertSaveDir(): Promise<void> {
    if (!(await isDirectory(this.saveDir))) {
      throw new ConfigurationError(`Directory ${this.saveDir} does not exist. Please create it first.`);
    }
  }
}
