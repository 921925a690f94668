import type { ConfigValue, RunConfig, TagMap } from "lib/migration/types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

export function stringField(value: unknown, key: string): string | undefined {
  const raw = field(value, key);
  return typeof raw === "string" ? raw : undefined;
}

export function arrayField(value: unknown, key: string): unknown[] {
  const raw = field(value, key);
  return Array.isArray(raw) ? raw : [];
}

export function toConfigValue(value: unknown): ConfigValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : String(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => toConfigValue(item));
  }
  if (isRecord(value)) {
    return toRunConfig(value);
  }
  return String(value);
}

export function toRunConfig(value: unknown): RunConfig {
  const config: RunConfig = {};
  if (!isRecord(value)) {
    return config;
  }
  for (const [key, child] of Object.entries(value)) {
    config[key] = toConfigValue(child);
  }
  return config;
}

/** `[{ key, value }]` -> `{ key: value }` */
export function tagsFromEntries(entries: unknown[]): TagMap {
  const tags: TagMap = {};
  for (const entry of entries) {
    const key = stringField(entry, "key");
    const value = stringField(entry, "value");
    if (key !== undefined && value !== undefined) {
      tags[key] = value;
    }
  }
  return tags;
}

export function tagsToEntries(tags: TagMap): Array<{ key: string; value: string }> {
  return Object.entries(tags).map(([key, value]) => ({ key, value }));
}
