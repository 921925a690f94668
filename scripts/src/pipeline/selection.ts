import { get, has, isPlainObject } from "lodash-es";

import type { RunConfig, RunDescriptor } from "lib/migration/types.js";

import { ConfigurationError } from "../errors.js";

export type SkipReason = "finished" | "existing" | "dual-write" | "not-selected";

export interface SelectionContext {
  finished: ReadonlySet<string>;
  existing: ReadonlySet<string>;
  skipExisting: boolean;
  runNamePatterns: RegExp[];
}

/**
 * A run already written to the destination by its own training job. Anything that is
 * not exactly the expected shape counts as "not dual-writing".
 */
export function isDualWriting(config: RunConfig): boolean {
  if (has(config, "mlflow_experiment_id")) {
    return true;
  }
  const loggers: unknown = get(config, "loggers");
  return isPlainObject(loggers) && has(loggers, "mlflow");
}

/** Patterns match at the start of the run's display name. */
export function compileRunNamePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(`^(?:${pattern})`);
    } catch (error) {
      throw new ConfigurationError(`Invalid run name pattern "${pattern}"`, { cause: error });
    }
  });
}

export function selectRun(run: RunDescriptor, context: SelectionContext): SkipReason | null {
  if (context.finished.has(run.id)) {
    return "finished";
  }
  if (context.skipExisting) {
    if (context.existing.has(run.id)) {
      return "existing";
    }
    if (isDualWriting(run.config)) {
      return "dual-write";
    }
  }
  if (context.runNamePatterns.length > 0 && !context.runNamePatterns.some((pattern) => pattern.test(run.name))) {
    return "not-selected";
  }
  return null;
}
