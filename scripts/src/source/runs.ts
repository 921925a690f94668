import { join } from "node:path";

import type { RunConfig, RunDescriptor, SourceReader } from "lib/migration/types.js";

import { MAX_METRICS_PER_BATCH, MIGRATION_TAGS, TRUE_TAG_VALUE } from "../constants.js";
import type { KeyMatcher } from "../convert/classifier.js";
import { readParams, readTags } from "../destination/snapshot.js";
import { ConfigurationError } from "../errors.js";
import { isDirectory, listSubdirectories } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import { LiveMetricSource, SnapshotMetricSource, type MetricSource } from "./adapter.js";

/** Where runs come from: the live source service or a finished dry-run snapshot. */
export interface RunSource {
  readonly kind: "live" | "snapshot";
  listRuns(): AsyncIterable<RunDescriptor>;
  readConfig(run: RunDescriptor): Promise<RunConfig>;
  metricsFor(run: RunDescriptor): MetricSource;
}

export class LiveRunSource implements RunSource {
  readonly kind = "live" as const;

  constructor(
    private readonly reader: SourceReader,
    private readonly project: string,
    private readonly isExcluded: KeyMatcher
  ) {}

  listRuns(): AsyncIterable<RunDescriptor> {
    return this.reader.listRuns(this.project);
  }

  readConfig(run: RunDescriptor): Promise<RunConfig> {
    return this.reader.readConfig(run);
  }

  metricsFor(run: RunDescriptor): MetricSource {
    return new LiveMetricSource(this.reader, run, this.isExcluded);
  }
}

export class SnapshotRunSource implements RunSource {
  readonly kind = "snapshot" as const;

  constructor(
    private readonly experimentDir: string,
    private readonly capacity: number = MAX_METRICS_PER_BATCH
  ) {}

  async *listRuns(): AsyncIterable<RunDescriptor> {
    if (!(await isDirectory(this.experimentDir))) {
      throw new ConfigurationError(`Snapshot directory ${this.experimentDir} does not exist`);
    }
    for (const name of await listSubdirectories(this.experimentDir)) {
      const runDir = join(this.experimentDir, name);
      const tags = await readTags(runDir);
      if (tags[MIGRATION_TAGS.complete] !== TRUE_TAG_VALUE) {
        logger.warn("Skipping snapshot run that never finished its dry run", { runDir });
        continue;
      }
      const group = tags[MIGRATION_TAGS.runGroup];
      yield {
        id: tags[MIGRATION_TAGS.sourceRunId] ?? name,
        name: tags[MIGRATION_TAGS.sourceRunName] ?? name,
        ...(group ? { group } : {}),
        createdAt: tags[MIGRATION_TAGS.sourceCreatedAt] ?? "",
        config: await readParams(runDir)
      };
    }
  }

  async readConfig(run: RunDescriptor): Promise<RunConfig> {
    return run.config;
  }

  metricsFor(run: RunDescriptor): MetricSource {
    return new SnapshotMetricSource(join(this.experimentDir, run.id), this.capacity);
  }
}
