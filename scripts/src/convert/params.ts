import { isPlainObject } from "lodash-es";

import type { ConfigValue, RunConfig } from "lib/migration/types.js";

import { MAX_PARAM_VALUE_LENGTH } from "../constants.js";
import { logger } from "../utils/logger.js";

function stringifyParam(value: ConfigValue): string {
  if (value === null) {
    return "None";
  }
  if (Array.isArray(value) || isPlainObject(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Flattens a run config into destination params. Nested values become JSON strings,
 * internal keys (leading underscore) are dropped.
 */
export function convertConfigToParams(config: RunConfig): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(config)) {
    if (key.startsWith("_")) {
      continue;
    }
    let converted = stringifyParam(value);
    if (converted.length > MAX_PARAM_VALUE_LENGTH) {
      logger.warn("Truncating param value", { key, length: converted.length, limit: MAX_PARAM_VALUE_LENGTH });
      converted = converted.slice(0, MAX_PARAM_VALUE_LENGTH);
    }
    params[key] = converted;
  }
  return params;
}
