import { createReadStream, type ReadStream } from "node:fs";
import { createInterface, type Interface } from "node:readline";
import fg from "fast-glob";

import type { MetricBatch, MetricStream, RunDescriptor, SourceReader } from "lib/migration/types.js";

import { MAX_METRICS_PER_BATCH, SNAPSHOT_FILES } from "../constants.js";
import { classifyKeys, convertRow, type KeyMatcher } from "../convert/classifier.js";
import { convertSystemRow } from "../convert/system_metrics.js";
import { parseMetricLine, streamDirectory } from "../destination/snapshot.js";
import { isDirectory } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import { pathToMetricKey } from "../utils/path.js";

/**
 * Supplies one run's converted records. Each yielded item is one accumulator candidate:
 * a row's points (live) or one bounded read of one file (snapshot).
 */
export interface MetricSource {
  readMetrics(): AsyncIterable<MetricBatch>;
  readSystemMetrics(): AsyncIterable<MetricBatch>;
}

/** Mode A: pulls rows from the source service and converts them on the fly. */
export class LiveMetricSource implements MetricSource {
  constructor(
    private readonly reader: SourceReader,
    private readonly run: RunDescriptor,
    private readonly isExcluded: KeyMatcher
  ) {}

  async *readMetrics(): AsyncIterable<MetricBatch> {
    // First pass finds single-observation keys, second pass converts.
    const singleObservation = await classifyKeys(this.reader.scanMetricRows(this.run));
    logger.debug("Classified metric keys", { runId: this.run.id, singleObservation: singleObservation.size });

    let rowIndex = 0;
    for await (const row of this.reader.scanMetricRows(this.run)) {
      const points = convertRow(row, singleObservation, this.isExcluded, rowIndex);
      rowIndex += 1;
      if (points.length > 0) {
        yield points;
      }
    }
  }

  async *readSystemMetrics(): AsyncIterable<MetricBatch> {
    for await (const [index, row] of this.reader.readSystemRows(this.run)) {
      const points = convertSystemRow(row, index).flat();
      if (points.length > 0) {
        yield points;
      }
    }
  }
}

interface OpenMetricFile {
  key: string;
  path: string;
  input: ReadStream;
  lines: Interface;
  iterator: AsyncIterator<string>;
  closed: boolean;
}

/**
 * Mode B: replays per-key snapshot files in round-robin, one read of at most `capacity`
 * records per file per pass. A read returning fewer than `capacity` records retires the file.
 */
export class SnapshotMetricSource implements MetricSource {
  constructor(
    private readonly runDir: string,
    private readonly capacity: number = MAX_METRICS_PER_BATCH
  ) {}

  readMetrics(): AsyncIterable<MetricBatch> {
    return this.replay("metrics");
  }

  readSystemMetrics(): AsyncIterable<MetricBatch> {
    return this.replay("system_metrics");
  }

  async *replay(stream: MetricStream): AsyncGenerator<MetricBatch> {
    const root = streamDirectory(this.runDir, stream);
    if (!(await isDirectory(root))) {
      return;
    }
    const paths = await fg(`**/*${SNAPSHOT_FILES.extension}`, {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      dot: true
    });
    let rotation = paths.sort().map((path) => openMetricFile(root, path));

    try {
      while (rotation.length > 0) {
        const next: OpenMetricFile[] = [];
        for (const file of rotation) {
          const { batch, lineCount } = await this.readBatch(file);
          if (lineCount < this.capacity) {
            closeMetricFile(file);
          } else {
            next.push(file);
          }
          if (batch.length > 0) {
            yield batch;
          }
        }
        rotation = next;
      }
    } finally {
      rotation.forEach(closeMetricFile);
    }
  }

  private async readBatch(file: OpenMetricFile): Promise<{ batch: MetricBatch; lineCount: number }> {
    const batch: MetricBatch = [];
    let lineCount = 0;
    while (lineCount < this.capacity) {
      const result = await file.iterator.next();
      if (result.done) {
        break;
      }
      if (result.value.trim().length === 0) {
        continue;
      }
      lineCount += 1;
      const point = parseMetricLine(file.key, result.value);
      if (point) {
        batch.push(point);
      } else {
        logger.warn("Skipping malformed snapshot line", { path: file.path, line: result.value });
      }
    }
    return { batch, lineCount };
  }
}

function openMetricFile(root: string, path: string): OpenMetricFile {
  const input = createReadStream(path, { encoding: "utf8" });
  const lines = createInterface({ input, crlfDelay: Infinity });
  return {
    key: pathToMetricKey(root, path, SNAPSHOT_FILES.extension),
    path,
    input,
    lines,
    iterator: lines[Symbol.asyncIterator](),
    closed: false
  };
}

function closeMetricFile(file: OpenMetricFile): void {
  if (file.closed) {
    return;
  }
  file.closed = true;
  file.lines.close();
  file.input.destroy();
}
