import { join } from "node:path";

import type { MetricBatch, MetricPoint, MetricStream, RunConfig, TagMap } from "lib/migration/types.js";

import { SNAPSHOT_FILES } from "../constants.js";
import { appendLines, readJsonFile, readTextFile, writeJsonFile } from "../utils/fs.js";
import { metricKeyToPath } from "../utils/path.js";

export interface ParsedNumber {
  value: number;
  kind: "integer" | "float";
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Integer first, float as fallback. */
export function parseNumeric(raw: string): ParsedNumber | null {
  const text = raw.trim();
  if (INTEGER_PATTERN.test(text)) {
    return { value: Number.parseInt(text, 10), kind: "integer" };
  }
  if (text.length === 0) {
    return null;
  }
  const value = Number(text);
  return Number.isNaN(value) ? null : { value, kind: "float" };
}

export function formatMetricLine(point: MetricPoint): string {
  return `${point.value}, ${point.timestamp}, ${point.step}`;
}

export function parseMetricLine(key: string, line: string): MetricPoint | null {
  const parts = line.split(",");
  if (parts.length !== 3) {
    return null;
  }
  const [value, timestamp, step] = parts.map((part) => parseNumeric(part));
  if (!value || !timestamp || !step || timestamp.kind !== "integer" || step.kind !== "integer") {
    return null;
  }
  return { key, value: value.value, timestamp: timestamp.value, step: step.value };
}

export function streamDirectory(runDir: string, stream: MetricStream): string {
  return join(runDir, stream === "metrics" ? SNAPSHOT_FILES.metrics : SNAPSHOT_FILES.systemMetrics);
}

/** Groups the batch by key and appends each group to that key's file, preserving order. */
export async function appendMetrics(runDir: string, stream: MetricStream, batch: MetricBatch): Promise<void> {
  const byKey = new Map<string, string[]>();
  for (const point of batch) {
    const lines = byKey.get(point.key) ?? [];
    lines.push(formatMetricLine(point));
    byKey.set(point.key, lines);
  }
  const root = streamDirectory(runDir, stream);
  for (const [key, lines] of byKey) {
    await appendLines(metricKeyToPath(root, key, SNAPSHOT_FILES.extension), lines);
  }
}

export async function appendTags(dir: string, tags: TagMap): Promise<void> {
  const lines = Object.entries(tags).map(([key, value]) => `${key}, ${value.replace(/\r?\n/g, " ")}`);
  await appendLines(join(dir, SNAPSHOT_FILES.tags), lines);
}

/** Later lines win, so a tag appended at completion overrides an earlier value. */
export async function readTags(dir: string): Promise<TagMap> {
  const content = await readTextFile(join(dir, SNAPSHOT_FILES.tags));
  const tags: TagMap = {};
  if (content === null) {
    return tags;
  }
  for (const line of content.split(/\r?\n/)) {
    const separator = line.indexOf(",");
    if (separator <= 0) {
      continue;
    }
    tags[line.slice(0, separator).trim()] = line.slice(separator + 1).trim();
  }
  return tags;
}

export async function writeParams(dir: string, params: Record<string, string>): Promise<void> {
  await writeJsonFile(join(dir, SNAPSHOT_FILES.params), params);
}

export async function readParams(dir: string): Promise<RunConfig> {
  const raw = await readJsonFile(join(dir, SNAPSHOT_FILES.params));
  const params: RunConfig = {};
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    return params;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") {
      params[key] = value;
    }
  }
  return params;
}
