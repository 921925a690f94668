import { performance } from "node:perf_hooks";

import type { DestinationWriter, MigrationOptions, MigrationSummary } from "lib/migration/types.js";

import { CHECKPOINT_INTERVAL } from "../constants.js";
import { CrashRecoveryManager } from "../destination/recovery.js";
import type { Destination, ExperimentRequest, ResolvedExperiment } from "../destination/resolver.js";
import { describeError, MigrationError } from "../errors.js";
import type { RunSource } from "../source/runs.js";
import { logger } from "../utils/logger.js";
import { migrateRun, withRunTarget } from "./migrate_run.js";
import { runPool } from "./pool.js";
import { compileRunNamePatterns, selectRun, type SelectionContext } from "./selection.js";

export interface MigrationDependencies {
  runSource: RunSource;
  destination: Destination;
  /** Live writer, used for checkpoint barriers. */
  writer?: DestinationWriter;
  capacity?: number;
}

export function isFatal(error: unknown): boolean {
  return !(error instanceof MigrationError) || error.fatal;
}

export async function runMigration(options: MigrationOptions, deps: MigrationDependencies): Promise<MigrationSummary> {
  const start = performance.now();
  const { runSource, destination, writer } = deps;
  const request: ExperimentRequest = {
    projectName: options.project,
    experimentName: options.experimentName,
    skipExisting: options.skipExisting,
    dualWriteExperimentId: options.dualWriteExperimentId
  };

  // Resolution and recovery happen once, before any worker starts.
  let experiment: ResolvedExperiment;
  let finished: ReadonlySet<string> = new Set();
  if (options.resumeFromCrash) {
    const recovery = await new CrashRecoveryManager(destination).recover(request);
    experiment = recovery.experiment;
    finished = recovery.finished;
  } else {
    experiment = await destination.resolveExperiment(request);
  }

  const existing = new Set<string>();
  if (options.skipExisting) {
    for (const record of await destination.listRuns(experiment)) {
      if (record.sourceRunId) {
        existing.add(record.sourceRunId);
      }
    }
  }

  const context: SelectionContext = {
    finished,
    existing,
    skipExisting: options.skipExisting,
    runNamePatterns: compileRunNamePatterns(options.runNames)
  };

  const parallel = runSource.kind === "snapshot" || destination.kind === "snapshot";
  const concurrency = parallel ? options.threads : 1;
  logger.info("Starting migration", {
    project: options.project,
    experiment: experiment.name,
    source: runSource.kind,
    destination: destination.kind,
    concurrency,
    finishedBefore: finished.size
  });

  const summary: MigrationSummary = { migrated: [], skipped: [], failed: [], durationMs: 0 };
  let processed = 0;

  await runPool(runSource.listRuns(), concurrency, async (run) => {
    const reason = selectRun(run, context);
    if (reason) {
      logger.info("Skipping run", { sourceRunId: run.id, name: run.name, reason });
      summary.skipped.push(run.id);
      return;
    }

    logger.info("Migrating run", { sourceRunId: run.id, name: run.name });
    try {
      await withRunTarget(
        () => destination.openRun(experiment, run, { resume: options.resumeFromCrash, nested: options.useNestedRun }),
        (target) => migrateRun(run, runSource, target, deps.capacity)
      );
      summary.migrated.push(run.id);
      logger.info("Finished run", { sourceRunId: run.id, name: run.name });
    } catch (error) {
      summary.failed.push(run.id);
      if (isFatal(error)) {
        throw error;
      }
      logger.error("Run failed; it will be reaped by the next --resume-from-crash", {
        sourceRunId: run.id,
        error: describeError(error)
      });
    }

    processed += 1;
    if (processed % CHECKPOINT_INTERVAL === 0) {
      await checkpoint(processed, writer);
    }
  });

  await writer?.flushPendingWrites();
  summary.durationMs = Math.round(performance.now() - start);
  logger.info("Migration finished", {
    project: options.project,
    migrated: summary.migrated.length,
    skipped: summary.skipped.length,
    failed: summary.failed.length,
    seconds: (summary.durationMs / 1000).toFixed(2)
  });
  return summary;
}

async function checkpoint(processed: number, writer: DestinationWriter | undefined): Promise<void> {
  if (!writer) {
    logger.info("Checkpoint", { processed });
    return;
  }
  logger.info("Checkpoint: waiting for queued metric batches", { processed, pending: writer.pendingWrites() });
  await writer.flushPendingWrites();
}
