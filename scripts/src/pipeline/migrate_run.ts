import type { MetricBatch, MetricStream, RunDescriptor } from "lib/migration/types.js";

import { BatchAccumulator } from "../convert/accumulator.js";
import { convertConfigToParams } from "../convert/params.js";
import type { DestinationTarget } from "../destination/targets.js";
import { describeError } from "../errors.js";
import type { MetricSource } from "../source/adapter.js";
import type { RunSource } from "../source/runs.js";
import { logger } from "../utils/logger.js";

export interface StreamStats {
  batches: number;
  points: number;
}

export interface RunStats {
  params: number;
  systemMetrics: StreamStats;
  metrics: StreamStats;
}

/**
 * Scoped acquisition of a run target. The completion marker is written only after `body`
 * resolved and every queued write landed; on failure the queue is drained and the error
 * propagates with no marker set.
 */
export async function withRunTarget<T>(
  open: () => Promise<DestinationTarget>,
  body: (target: DestinationTarget) => Promise<T>
): Promise<T> {
  const target = await open();
  let result: T;
  try {
    result = await body(target);
    await target.flush();
  } catch (error) {
    try {
      await target.flush();
      await target.close(false);
    } catch (cleanupError) {
      logger.error("Cleanup failed while abandoning run", {
        sourceRunId: target.sourceRunId,
        error: describeError(cleanupError)
      });
    }
    throw error;
  }
  await target.complete();
  await target.close(true);
  return result;
}

export async function pumpStream(
  batches: AsyncIterable<MetricBatch>,
  target: DestinationTarget,
  stream: MetricStream,
  capacity?: number
): Promise<StreamStats> {
  const accumulator = new BatchAccumulator(capacity);
  for await (const candidate of batches) {
    for (const batch of accumulator.appendRow(candidate)) {
      target.logMetrics(stream, batch);
    }
  }
  target.logMetrics(stream, accumulator.finish());
  return { batches: accumulator.flushedBatches, points: accumulator.flushedPoints };
}

/** Config, then system telemetry, then experiment metrics. */
export async function migrateRun(
  run: RunDescriptor,
  runSource: RunSource,
  target: DestinationTarget,
  capacity?: number
): Promise<RunStats> {
  const params = convertConfigToParams(await runSource.readConfig(run));
  await target.logParams(params);

  const metrics: MetricSource = runSource.metricsFor(run);
  const systemMetrics = await pumpStream(metrics.readSystemMetrics(), target, "system_metrics", capacity);
  const experimentMetrics = await pumpStream(metrics.readMetrics(), target, "metrics", capacity);

  logger.info("Converted run data, waiting for queued writes", {
    sourceRunId: run.id,
    params: Object.keys(params).length,
    systemMetricBatches: systemMetrics.batches,
    metricBatches: experimentMetrics.batches,
    metricPoints: experimentMetrics.points
  });

  return {
    params: Object.keys(params).length,
    systemMetrics,
    metrics: experimentMetrics
  };
}
