import type { MetricBatch, MetricRow } from "lib/migration/types.js";

import { isMetricValue } from "./classifier.js";

type Transform = (value: number) => number;

interface GpuMapping {
  pattern: RegExp;
  template: string;
  transform?: Transform;
}

interface HostMapping {
  source: string;
  destination: string;
  transform?: Transform;
}

const roundTo2 = (value: number): number => Math.round(value * 100) / 100;
const bytesToMegabytes: Transform = (value) => roundTo2(value / 1e6);
const gigabytesToMegabytes: Transform = (value) => roundTo2(value * 1000);

const GPU_METRICS: GpuMapping[] = [
  { pattern: /^system\.gpu\.(\d+)\.memory$/, template: "system/gpu_{i}_utilization_percentage" },
  { pattern: /^system\.gpu\.(\d+)\.memoryAllocated$/, template: "system/gpu_{i}_memory_usage_percentage" },
  {
    pattern: /^system\.gpu\.(\d+)\.memoryAllocatedBytes$/,
    template: "system/gpu_{i}_memory_usage_megabytes",
    transform: bytesToMegabytes
  },
  { pattern: /^system\.gpu\.(\d+)\.powerWatts$/, template: "system/gpu_{i}_power_watts" },
  { pattern: /^system\.gpu\.(\d+)\.powerPercent$/, template: "system/gpu_{i}_power_percentage" }
];

// The disk keys carry a literal backslash in the source.
const HOST_METRICS: HostMapping[] = [
  { source: "system.cpu", destination: "system/cpu_utilization_percentage" },
  { source: "system.disk.\\.usageGB", destination: "system/disk_usage_megabytes", transform: gigabytesToMegabytes },
  { source: "system.disk.\\.usagePercent", destination: "system/disk_usage_percentage" },
  { source: "system.proc.memory.rssMB", destination: "system/system_memory_usage_megabytes" },
  { source: "system.memory", destination: "system/system_memory_usage_percentage" },
  { source: "system.network.recv", destination: "system/network_receive_megabytes", transform: bytesToMegabytes },
  { source: "system.network.sent", destination: "system/network_transmit_megabytes", transform: bytesToMegabytes }
];

export function convertGpuMetrics(row: MetricRow, index: number): MetricBatch {
  const points: MetricBatch = [];
  for (const [key, value] of Object.entries(row)) {
    if (!isMetricValue(value)) {
      continue;
    }
    for (const mapping of GPU_METRICS) {
      const match = mapping.pattern.exec(key);
      if (!match) {
        continue;
      }
      points.push({
        key: mapping.template.replace("{i}", match[1] ?? "0"),
        value: mapping.transform ? mapping.transform(value) : value,
        timestamp: index,
        step: index
      });
    }
  }
  return points;
}

export function convertHostMetrics(row: MetricRow, index: number): MetricBatch {
  const points: MetricBatch = [];
  for (const mapping of HOST_METRICS) {
    const value = row[mapping.source];
    if (!isMetricValue(value)) {
      continue;
    }
    points.push({
      key: mapping.destination,
      value: mapping.transform ? mapping.transform(value) : value,
      timestamp: index,
      step: index
    });
  }
  return points;
}

/** GPU-indexed and host sub-batches of one telemetry row. */
export function convertSystemRow(row: MetricRow, index: number): [MetricBatch, MetricBatch] {
  return [convertGpuMetrics(row, index), convertHostMetrics(row, index)];
}
