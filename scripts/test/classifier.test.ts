import { describe, expect, it } from "vitest";

import type { MetricRow } from "lib/migration/types.js";

import {
  classifyKeys,
  convertRow,
  createExclusionMatcher,
  rewriteKey,
  rowStep,
  rowTimestamp
} from "../src/convert/classifier.js";
import { ConfigurationError } from "../src/errors.js";

async function* stream(rows: MetricRow[]): AsyncIterable<MetricRow> {
  for (const row of rows) {
    yield row;
  }
}

describe("rewriteKey", () => {
  it("replaces every source separator", () => {
    expect(rewriteKey("train.loss.total")).toBe("train/loss/total");
    expect(rewriteKey("accuracy")).toBe("accuracy");
  });
});

describe("createExclusionMatcher", () => {
  it("always excludes the bookkeeping keys", () => {
    const isExcluded = createExclusionMatcher();
    expect(isExcluded("_timestamp")).toBe(true);
    expect(isExcluded("_step")).toBe(true);
    expect(isExcluded("_runtime")).toBe(true);
    expect(isExcluded("loss")).toBe(false);
  });

  it("matches exact names and whole-key patterns", () => {
    const isExcluded = createExclusionMatcher(["val.acc", "debug\\..*"]);
    expect(isExcluded("val.acc")).toBe(true);
    expect(isExcluded("debug.grad_norm")).toBe(true);
    expect(isExcluded("my.debug.grad_norm")).toBe(false);
    expect(isExcluded("val.accuracy")).toBe(false);
  });

  it("rejects patterns that do not compile", () => {
    expect(() => createExclusionMatcher(["("])).toThrow(ConfigurationError);
  });
});

describe("classifyKeys", () => {
  it("finds keys observed exactly once and ignores missing values", async () => {
    const single = await classifyKeys(
      stream([
        { loss: 0.5, lr: null, final_score: Number.NaN },
        { loss: 0.3, final_score: 0.9 },
        { loss: 0.2, lr: 0.01 }
      ])
    );
    expect([...single].sort()).toEqual(["final_score", "lr"]);
  });

  it("returns nothing for an empty stream", async () => {
    expect(await classifyKeys(stream([]))).toEqual(new Set());
  });
});

describe("row bookkeeping", () => {
  it("converts seconds to milliseconds and truncates the step", () => {
    expect(rowTimestamp({ _timestamp: 1.25 })).toBe(1250);
    expect(rowTimestamp({})).toBe(0);
    expect(rowStep({ _step: 7.9 }, 3)).toBe(7);
    expect(rowStep({ _step: "7" }, 3)).toBe(3);
  });
});

describe("convertRow", () => {
  const isExcluded = createExclusionMatcher();

  it("uses the row step and timestamp for repeated keys", async () => {
    const rows = [
      { _timestamp: 1.0, _step: 0, loss: 0.5 },
      { _timestamp: 2.0, _step: 1, loss: 0.3 }
    ];
    const single = await classifyKeys(stream(rows));
    expect(rows.flatMap((row, index) => convertRow(row, single, isExcluded, index))).toEqual([
      { key: "loss", value: 0.5, timestamp: 1000, step: 0 },
      { key: "loss", value: 0.3, timestamp: 2000, step: 1 }
    ]);
  });

  it("pins single-observation keys to step zero", async () => {
    const rows = [
      { _timestamp: 10, _step: 46, loss: 0.2 },
      { _timestamp: 11, _step: 47, loss: 0.1, final_score: 0.93 }
    ];
    const single = await classifyKeys(stream(rows));
    const [, last] = rows.map((row, index) => convertRow(row, single, isExcluded, index));
    expect(last).toEqual([
      { key: "loss", value: 0.1, timestamp: 11000, step: 47 },
      { key: "final_score", value: 0.93, timestamp: 11000, step: 0 }
    ]);
  });

  it("skips non-numeric, missing and excluded values", () => {
    const points = convertRow(
      {
        _step: 3,
        _runtime: 12,
        "train.acc": 0.75,
        tag: "warmup",
        flag: true,
        empty: null,
        bad: Number.NaN,
        huge: Number.POSITIVE_INFINITY
      },
      new Set(),
      isExcluded
    );
    expect(points).toEqual([{ key: "train/acc", value: 0.75, timestamp: 0, step: 3 }]);
  });

  it("falls back to the row index when the row has no step", () => {
    expect(convertRow({ loss: 1 }, new Set(), isExcluded, 5)).toEqual([
      { key: "loss", value: 1, timestamp: 0, step: 5 }
    ]);
  });
});
