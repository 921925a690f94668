import type { MetricBatch } from "lib/migration/types.js";

import { MAX_METRICS_PER_BATCH } from "../constants.js";

/**
 * Bounded buffer between converted records and the writer.
 *
 * `append` hands back the batches that must be written before the caller continues,
 * in the order they have to be written. No returned batch is longer than `capacity`.
 * Call `finish` at stream end and write whatever it returns, even when empty.
 */
export class BatchAccumulator {
  readonly capacity: number;
  private buffer: MetricBatch = [];
  private batchCount = 0;
  private pointCount = 0;

  constructor(capacity: number = MAX_METRICS_PER_BATCH) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Batch capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get flushedBatches(): number {
    return this.batchCount;
  }

  get flushedPoints(): number {
    return this.pointCount;
  }

  append(candidate: MetricBatch): MetricBatch[] {
    if (candidate.length === 0) {
      return [];
    }
    if (this.buffer.length + candidate.length < this.capacity) {
      this.buffer.push(...candidate);
      return [];
    }

    const flushed: MetricBatch[] = [];
    if (this.buffer.length > 0) {
      flushed.push(this.take());
    }

    // A candidate that alone exceeds capacity is cut into capacity-sized chunks.
    let offset = 0;
    while (candidate.length - offset > this.capacity) {
      flushed.push(this.record(candidate.slice(offset, offset + this.capacity)));
      offset += this.capacity;
    }
    this.buffer = candidate.slice(offset);
    return flushed;
  }

  /** All sub-batches of one source row are checked together and land on the same side of a flush. */
  appendRow(...subBatches: MetricBatch[]): MetricBatch[] {
    return this.append(subBatches.flat());
  }

  finish(): MetricBatch {
    return this.take();
  }

  private take(): MetricBatch {
    return this.record(this.buffer.splice(0, this.buffer.length));
  }

  private record(batch: MetricBatch): MetricBatch {
    if (batch.length > 0) {
      this.batchCount += 1;
      this.pointCount += batch.length;
    }
    return batch;
  }
}
