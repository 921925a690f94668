import { join } from "node:path";

import type { MigrationOptions } from "lib/migration/types.js";

import type { RuntimeConfig } from "../config/env.js";
import { createExclusionMatcher } from "../convert/classifier.js";
import { MlflowRestWriter } from "../destination/mlflow.js";
import { NetworkDestination, SnapshotDestination } from "../destination/resolver.js";
import { ConfigurationError } from "../errors.js";
import { LiveRunSource, SnapshotRunSource } from "../source/runs.js";
import { WandbSourceReader } from "../source/wandb.js";
import type { MigrationDependencies } from "./driver.js";

/** Picks the source and destination once; everything downstream is mode-agnostic. */
export function buildDependencies(options: MigrationOptions, runtime: RuntimeConfig): MigrationDependencies {
  const isExcluded = createExclusionMatcher(options.excludeMetrics);

  if (options.dryRun) {
    if (!options.saveDir) {
      throw new ConfigurationError("--save-dir is required with --dry-run");
    }
    return {
      runSource: new LiveRunSource(new WandbSourceReader(runtime.source, options.entity), options.project, isExcluded),
      destination: new SnapshotDestination(options.saveDir)
    };
  }

  const writer = new MlflowRestWriter(runtime.destination);
  const destination = new NetworkDestination(writer, options.experimentPrefix);

  if (options.resumeFromDryRun) {
    if (!options.saveDir) {
      throw new ConfigurationError("--save-dir is required with --resume-from-dry-run");
    }
    const experimentDir = join(options.saveDir, options.experimentName ?? options.project);
    return { runSource: new SnapshotRunSource(experimentDir), destination, writer };
  }

  return {
    runSource: new LiveRunSource(new WandbSourceReader(runtime.source, options.entity), options.project, isExcluded),
    destination,
    writer
  };
}
