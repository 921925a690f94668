import { chunk } from "lodash-es";

import type {
  DestinationWriter,
  ExperimentHandle,
  MetricBatch,
  RunHandle,
  TagMap
} from "lib/migration/types.js";

import type { DestinationRuntimeConfig } from "../config/env.js";
import { MAX_METRICS_PER_BATCH, MAX_PARAMS_PER_BATCH, MIGRATION_TAGS, SEARCH_RUNS_PAGE_SIZE } from "../constants.js";
import { requestJson } from "../utils/http.js";
import { arrayField, field, stringField, tagsFromEntries, tagsToEntries } from "../utils/json.js";
import { logger } from "../utils/logger.js";
import { OrderedTaskQueue } from "../utils/queue.js";

/**
 * Destination writer over the tracking server's REST API.
 *
 * Metric batches are queued per run and sent in submission order; everything else is awaited.
 */
export class MlflowRestWriter implements DestinationWriter {
  private readonly queues = new Map<string, OrderedTaskQueue>();

  constructor(private readonly runtime: DestinationRuntimeConfig) {}

  async getExperimentByName(name: string): Promise<ExperimentHandle | null> {
    const query = new URLSearchParams({ experiment_name: name });
    const response = await requestJson(
      { method: "GET", url: `${this.endpoint("experiments/get-by-name")}?${query.toString()}`, headers: this.headers() },
      [404]
    );
    if (response.status === 404) {
      return null;
    }
    return toExperimentHandle(field(response.body, "experiment"));
  }

  async createExperiment(name: string, tags: TagMap): Promise<ExperimentHandle> {
    const response = await this.post("experiments/create", { name, tags: tagsToEntries(tags) });
    const id = stringField(response, "experiment_id");
    if (!id) {
      throw new Error(`Experiment creation for "${name}" returned no id`);
    }
    return { id, name, tags: { ...tags } };
  }

  async setExperimentTags(experimentId: string, tags: TagMap): Promise<void> {
    for (const [key, value] of Object.entries(tags)) {
      await this.post("experiments/set-experiment-tag", { experiment_id: experimentId, key, value });
    }
  }

  async startRun(experimentId: string, name: string, tags: TagMap): Promise<RunHandle> {
    const response = await this.post("runs/create", {
      experiment_id: experimentId,
      run_name: name,
      start_time: Date.now(),
      tags: tagsToEntries({ [MIGRATION_TAGS.runName]: name, ...tags })
    });
    const run = toRunHandle(field(response, "run"));
    if (!run) {
      throw new Error(`Run creation for "${name}" returned no run`);
    }
    return run;
  }

  logBatch(runId: string, metrics: MetricBatch): void {
    if (metrics.length === 0) {
      return;
    }
    const queue = this.queueFor(runId);
    for (const part of chunk(metrics, MAX_METRICS_PER_BATCH)) {
      queue.enqueue(async () => {
        await this.post("runs/log-batch", { run_id: runId, metrics: part });
      });
    }
  }

  async logParams(runId: string, params: Record<string, string>): Promise<void> {
    for (const part of chunk(Object.entries(params), MAX_PARAMS_PER_BATCH)) {
      await this.post("runs/log-batch", {
        run_id: runId,
        params: part.map(([key, value]) => ({ key, value }))
      });
    }
  }

  async setTags(runId: string, tags: TagMap): Promise<void> {
    for (const part of chunk(tagsToEntries(tags), MAX_PARAMS_PER_BATCH)) {
      await this.post("runs/log-batch", { run_id: runId, tags: part });
    }
  }

  async searchRuns(experimentId: string, filter?: string): Promise<RunHandle[]> {
    const runs: RunHandle[] = [];
    let pageToken: string | undefined;
    do {
      const response = await this.post("runs/search", {
        experiment_ids: [experimentId],
        filter: filter ?? "",
        max_results: SEARCH_RUNS_PAGE_SIZE,
        ...(pageToken ? { page_token: pageToken } : {})
      });
      for (const entry of arrayField(response, "runs")) {
        const run = toRunHandle(entry);
        if (run) {
          runs.push(run);
        }
      }
      pageToken = stringField(response, "next_page_token");
    } while (pageToken);
    return runs;
  }

  async deleteRun(runId: string): Promise<void> {
    await this.post("runs/delete", { run_id: runId });
  }

  async endRun(runId: string, status: "FINISHED" | "FAILED"): Promise<void> {
    await this.post("runs/update", { run_id: runId, status, end_time: Date.now() });
  }

  /**
   * With a run id, waits for that run's queued batches and rethrows its first write failure.
   * Without one, waits for every run's queue but leaves each failure to its run's own flush.
   */
  async flushPendingWrites(runId?: string): Promise<void> {
    if (runId === undefined) {
      for (const [id, queue] of [...this.queues]) {
        logger.debug("Waiting for queued metric batches", { runId: id, pending: queue.size });
        await queue.settle();
        if (queue.size === 0 && !queue.hasFailed && this.queues.get(id) === queue) {
          this.queues.delete(id);
        }
      }
      return;
    }

    const queue = this.queues.get(runId);
    if (!queue) {
      return;
    }
    logger.debug("Waiting for queued metric batches", { runId, pending: queue.size });
    try {
      await queue.drain();
    } finally {
      if (queue.size === 0 && this.queues.get(runId) === queue) {
        this.queues.delete(runId);
      }
    }
  }

  pendingWrites(): number {
    let total = 0;
    for (const queue of this.queues.values()) {
      total += queue.size;
    }
    return total;
  }

  private queueFor(runId: string): OrderedTaskQueue {
    let queue = this.queues.get(runId);
    if (!queue) {
      queue = new OrderedTaskQueue();
      this.queues.set(runId, queue);
    }
    return queue;
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const response = await requestJson({ method: "POST", url: this.endpoint(path), headers: this.headers(), body });
    return response.body;
  }

  private endpoint(path: string): string {
    return `${this.runtime.trackingUri.replace(/\/$/, "")}/api/2.0/mlflow/${path}`;
  }

  private headers(): Record<string, string> {
    return this.runtime.token ? { Authorization: `Bearer ${this.runtime.token}` } : {};
  }
}

function toExperimentHandle(raw: unknown): ExperimentHandle | null {
  const id = stringField(raw, "experiment_id");
  const name = stringField(raw, "name");
  if (!id || name === undefined) {
    return null;
  }
  return { id, name, tags: tagsFromEntries(arrayField(raw, "tags")) };
}

function toRunHandle(raw: unknown): RunHandle | null {
  const info = field(raw, "info");
  const id = stringField(info, "run_id");
  const experimentId = stringField(info, "experiment_id");
  if (!id || !experimentId) {
    return null;
  }
  const tags = tagsFromEntries(arrayField(field(raw, "data"), "tags"));
  return {
    id,
    experimentId,
    name: stringField(info, "run_name") ?? tags[MIGRATION_TAGS.runName] ?? "",
    tags
  };
}
