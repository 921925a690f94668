import type { MetricBatch, MetricRow } from "lib/migration/types.js";

import { DEFAULT_EXCLUDED_METRICS, DESTINATION_KEY_SEPARATOR, SOURCE_KEY_SEPARATOR } from "../constants.js";
import { ConfigurationError } from "../errors.js";

export type KeyMatcher = (key: string) => boolean;

export function rewriteKey(key: string): string {
  return key.split(SOURCE_KEY_SEPARATOR).join(DESTINATION_KEY_SEPARATOR);
}

export function isMetricValue(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  return !(typeof value === "number" && Number.isNaN(value));
}

/**
 * Builds the exclusion predicate. A pattern excludes a key when it equals the key or,
 * compiled as a regular expression, matches the whole key.
 */
export function createExclusionMatcher(patterns: readonly string[] = []): KeyMatcher {
  const exact = new Set<string>([...DEFAULT_EXCLUDED_METRICS, ...patterns]);
  const expressions = patterns.map((pattern) => {
    try {
      return new RegExp(`^(?:${pattern})$`);
    } catch (error) {
      throw new ConfigurationError(`Invalid metric exclusion pattern "${pattern}"`, { cause: error });
    }
  });
  return (key) => exact.has(key) || expressions.some((expression) => expression.test(key));
}

export class KeyObservationCounter {
  private readonly counts = new Map<string, number>();

  observe(row: MetricRow): void {
    for (const [key, value] of Object.entries(row)) {
      if (isPresent(value)) {
        this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
      }
    }
  }

  singleObservationKeys(): Set<string> {
    const keys = new Set<string>();
    for (const [key, count] of this.counts) {
      if (count === 1) {
        keys.add(key);
      }
    }
    return keys;
  }
}

/** Keys holding exactly one non-missing value across the whole row stream. */
export async function classifyKeys(rows: AsyncIterable<MetricRow>): Promise<Set<string>> {
  const counter = new KeyObservationCounter();
  for await (const row of rows) {
    counter.observe(row);
  }
  return counter.singleObservationKeys();
}

export function rowTimestamp(row: MetricRow): number {
  const raw = row["_timestamp"];
  return isMetricValue(raw) ? Math.round(raw * 1000) : 0;
}

export function rowStep(row: MetricRow, fallback: number): number {
  const raw = row["_step"];
  return isMetricValue(raw) ? Math.trunc(raw) : fallback;
}

export function convertRow(
  row: MetricRow,
  singleObservation: ReadonlySet<string>,
  isExcluded: KeyMatcher,
  rowIndex = 0
): MetricBatch {
  const timestamp = rowTimestamp(row);
  const step = rowStep(row, rowIndex);
  const points: MetricBatch = [];

  for (const [key, value] of Object.entries(row)) {
    if (isExcluded(key) || !isMetricValue(value)) {
      continue;
    }
    points.push({
      key: rewriteKey(key),
      value,
      timestamp,
      step: singleObservation.has(key) ? 0 : step
    });
  }
  return points;
}
