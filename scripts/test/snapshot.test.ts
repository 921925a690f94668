import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  appendMetrics,
  appendTags,
  formatMetricLine,
  parseMetricLine,
  parseNumeric,
  readParams,
  readTags,
  writeParams
} from "../src/destination/snapshot.js";
import { metricKeyToPath, pathToMetricKey } from "../src/utils/path.js";
import { makeTempDir } from "./fixtures/fakes.js";

describe("parseNumeric", () => {
  it("tries integers before floats", () => {
    expect(parseNumeric("3")).toEqual({ value: 3, kind: "integer" });
    expect(parseNumeric(" -12 ")).toEqual({ value: -12, kind: "integer" });
    expect(parseNumeric("3.0")).toEqual({ value: 3, kind: "float" });
    expect(parseNumeric("1e-3")).toEqual({ value: 0.001, kind: "float" });
  });

  it("returns null for text that is not a number", () => {
    expect(parseNumeric("")).toBeNull();
    expect(parseNumeric("  ")).toBeNull();
    expect(parseNumeric("abc")).toBeNull();
  });
});

describe("metric lines", () => {
  it("writes value, timestamp and step separated by comma and space", () => {
    expect(formatMetricLine({ key: "loss", value: 0.25, timestamp: 1000, step: 4 })).toBe("0.25, 1000, 4");
  });

  it("reads back what it writes", () => {
    expect(parseMetricLine("loss", "0.25, 1000, 4")).toEqual({ key: "loss", value: 0.25, timestamp: 1000, step: 4 });
  });

  it("rejects lines with the wrong shape or non-integer bookkeeping", () => {
    expect(parseMetricLine("loss", "0.25, 1000")).toBeNull();
    expect(parseMetricLine("loss", "x, 1000, 4")).toBeNull();
    expect(parseMetricLine("loss", "0.25, 1000.5, 4")).toBeNull();
  });
});

describe("metric key paths", () => {
  it("maps key segments to directories and back", () => {
    const path = metricKeyToPath("/snap/metrics", "train/loss", ".csv");
    expect(path).toBe("/snap/metrics/train/loss.csv");
    expect(pathToMetricKey("/snap/metrics", path, ".csv")).toBe("train/loss");
  });

  it("encodes characters that cannot appear in a file name", () => {
    const path = metricKeyToPath("/snap/metrics", "eval/top:1", ".csv");
    expect(path).toBe("/snap/metrics/eval/top%3A1.csv");
    expect(pathToMetricKey("/snap/metrics", path, ".csv")).toBe("eval/top:1");
  });

  it("gives keys with empty segments their own files", () => {
    expect(metricKeyToPath("/snap/metrics", "a//b", ".csv")).toBe("/snap/metrics/a/%/b.csv");
    expect(metricKeyToPath("/snap/metrics", "a/b", ".csv")).toBe("/snap/metrics/a/b.csv");
    expect(metricKeyToPath("/snap/metrics", "/lead", ".csv")).toBe("/snap/metrics/%/lead.csv");
    expect(metricKeyToPath("/snap/metrics", "tail/", ".csv")).toBe("/snap/metrics/tail/%.csv");
    for (const key of ["a//b", "/lead", "tail/"]) {
      expect(pathToMetricKey("/snap/metrics", metricKeyToPath("/snap/metrics", key, ".csv"), ".csv")).toBe(key);
    }
  });

  it("keeps dot-only segments inside the root", () => {
    const path = metricKeyToPath("/snap/metrics", "x/../y", ".csv");
    expect(path).toBe("/snap/metrics/x/%2E%2E/y.csv");
    expect(pathToMetricKey("/snap/metrics", path, ".csv")).toBe("x/../y");
  });
});

describe("snapshot files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("appends each key to its own file in batch order", async () => {
    await appendMetrics(dir, "metrics", [
      { key: "loss", value: 0.5, timestamp: 1000, step: 0 },
      { key: "train/acc", value: 0.1, timestamp: 1000, step: 0 },
      { key: "loss", value: 0.3, timestamp: 2000, step: 1 }
    ]);
    await appendMetrics(dir, "metrics", [{ key: "loss", value: 0.2, timestamp: 3000, step: 2 }]);

    expect(await readFile(join(dir, "metrics", "loss.csv"), "utf8")).toBe("0.5, 1000, 0\n0.3, 2000, 1\n0.2, 3000, 2\n");
    expect(await readFile(join(dir, "metrics", "train", "acc.csv"), "utf8")).toBe("0.1, 1000, 0\n");
  });

  it("keeps system telemetry in its own directory", async () => {
    await appendMetrics(dir, "system_metrics", [{ key: "system/cpu_utilization_percentage", value: 5, timestamp: 0, step: 0 }]);
    expect(await readFile(join(dir, "system_metrics", "system", "cpu_utilization_percentage.csv"), "utf8")).toBe(
      "5, 0, 0\n"
    );
  });

  it("reads tags with the last line winning and values trimmed", async () => {
    await appendTags(dir, { source_run_id: "abc", note: "first, with comma" });
    await appendTags(dir, { migration_complete: "True", source_run_id: "def" });

    expect(await readTags(dir)).toEqual({
      source_run_id: "def",
      note: "first, with comma",
      migration_complete: "True"
    });
  });

  it("skips blank or keyless tag lines", async () => {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, "tags.csv"), "\n, orphan\nkey, value\n", "utf8");
    expect(await readTags(dir)).toEqual({ key: "value" });
  });

  it("returns no tags or params for an empty directory", async () => {
    expect(await readTags(dir)).toEqual({});
    expect(await readParams(dir)).toEqual({});
  });

  it("round-trips params as strings", async () => {
    await writeParams(dir, { lr: "0.01", layers: "[1,2]" });
    expect(await readParams(dir)).toEqual({ lr: "0.01", layers: "[1,2]" });
  });
});
