import type { DestinationWriter, MetricBatch, MetricStream, TagMap } from "lib/migration/types.js";

import { MIGRATION_TAGS, TRUE_TAG_VALUE } from "../constants.js";
import { OrderedTaskQueue } from "../utils/queue.js";
import { appendMetrics, appendTags, writeParams } from "./snapshot.js";

/**
 * One source run's destination, live or on disk. Metric writes are queued and keep
 * submission order; `flush` waits for them and surfaces the first write failure.
 */
export interface DestinationTarget {
  readonly sourceRunId: string;
  /** Destination run id, or the run directory in snapshot mode. */
  readonly location: string;
  logMetrics(stream: MetricStream, batch: MetricBatch): void;
  logParams(params: Record<string, string>): Promise<void>;
  setTags(tags: TagMap): Promise<void>;
  flush(): Promise<void>;
  complete(): Promise<void>;
  close(succeeded: boolean): Promise<void>;
}

export class NetworkTarget implements DestinationTarget {
  constructor(
    private readonly writer: DestinationWriter,
    readonly sourceRunId: string,
    readonly location: string
  ) {}

  logMetrics(_stream: MetricStream, batch: MetricBatch): void {
    this.writer.logBatch(this.location, batch);
  }

  async logParams(params: Record<string, string>): Promise<void> {
    if (Object.keys(params).length > 0) {
      await this.writer.logParams(this.location, params);
    }
  }

  async setTags(tags: TagMap): Promise<void> {
    await this.writer.setTags(this.location, tags);
  }

  async flush(): Promise<void> {
    await this.writer.flushPendingWrites(this.location);
  }

  async complete(): Promise<void> {
    await this.writer.setTags(this.location, { [MIGRATION_TAGS.complete]: TRUE_TAG_VALUE });
  }

  async close(succeeded: boolean): Promise<void> {
    await this.writer.endRun(this.location, succeeded ? "FINISHED" : "FAILED");
  }
}

export class SnapshotTarget implements DestinationTarget {
  private readonly queue = new OrderedTaskQueue();

  constructor(
    readonly sourceRunId: string,
    readonly location: string
  ) {}

  logMetrics(stream: MetricStream, batch: MetricBatch): void {
    if (batch.length === 0) {
      return;
    }
    this.queue.enqueue(() => appendMetrics(this.location, stream, batch));
  }

  async logParams(params: Record<string, string>): Promise<void> {
    await writeParams(this.location, params);
  }

  async setTags(tags: TagMap): Promise<void> {
    await appendTags(this.location, tags);
  }

  async flush(): Promise<void> {
    await this.queue.drain();
  }

  async complete(): Promise<void> {
    await appendTags(this.location, { [MIGRATION_TAGS.complete]: TRUE_TAG_VALUE });
  }

  async close(): Promise<void> {
    await this.queue.drain();
  }
}
