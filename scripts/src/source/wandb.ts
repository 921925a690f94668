import type { MetricRow, RunConfig, RunDescriptor, SourceReader } from "lib/migration/types.js";

import type { SourceRuntimeConfig } from "../config/env.js";
import { SOURCE_PAGE_SIZES } from "../constants.js";
import { ConfigurationError, RequestError } from "../errors.js";
import { requestJson } from "../utils/http.js";
import { arrayField, field, isRecord, stringField, toConfigValue } from "../utils/json.js";
import { logger } from "../utils/logger.js";

const RUNS_QUERY = `
query ProjectRuns($project: String!, $entity: String!, $cursor: String, $perPage: Int!) {
  project(name: $project, entityName: $entity) {
    runs(after: $cursor, first: $perPage, order: "+created_at") {
      edges { node { name displayName group createdAt config } }
      pageInfo { endCursor hasNextPage }
    }
  }
}`;

const LAST_STEP_QUERY = `
query RunLastStep($project: String!, $entity: String!, $run: String!) {
  project(name: $project, entityName: $entity) {
    run(name: $run) { lastHistoryStep }
  }
}`;

const HISTORY_QUERY = `
query RunHistoryPage($project: String!, $entity: String!, $run: String!, $minStep: Int64!, $maxStep: Int64!, $pageSize: Int!) {
  project(name: $project, entityName: $entity) {
    run(name: $run) { history(minStep: $minStep, maxStep: $maxStep, samples: $pageSize) }
  }
}`;

const EVENTS_QUERY = `
query RunSystemEvents($project: String!, $entity: String!, $run: String!, $samples: Int!) {
  project(name: $project, entityName: $entity) {
    run(name: $run) { events(samples: $samples) }
  }
}`;

/**
 * Reads runs, config and history from the source tracking service's GraphQL API.
 * Config entries arrive as `{ key: { value, desc } }`; only `value` is kept.
 */
export class WandbSourceReader implements SourceReader {
  private readonly entity: string;
  private readonly projects = new Map<string, string>();

  constructor(private readonly runtime: SourceRuntimeConfig, entity?: string | null) {
    const resolved = entity ?? runtime.entity;
    if (!resolved) {
      throw new ConfigurationError("A source entity is required (--entity or WANDB_ENTITY)");
    }
    this.entity = resolved;
  }

  async *listRuns(project: string): AsyncIterable<RunDescriptor> {
    let cursor: string | null = null;
    let hasNextPage = true;
    while (hasNextPage) {
      const data = await this.query(RUNS_QUERY, { project, cursor, perPage: SOURCE_PAGE_SIZES.runs });
      const runs = field(field(data, "project"), "runs");
      if (runs === undefined || runs === null) {
        throw new ConfigurationError(`Source project "${this.entity}/${project}" was not found`);
      }
      for (const edge of arrayField(runs, "edges")) {
        const run = toRunDescriptor(field(edge, "node"));
        if (run) {
          this.projects.set(run.id, project);
          yield run;
        }
      }
      const pageInfo = field(runs, "pageInfo");
      cursor = stringField(pageInfo, "endCursor") ?? null;
      hasNextPage = field(pageInfo, "hasNextPage") === true && cursor !== null;
    }
  }

  async readConfig(run: RunDescriptor): Promise<RunConfig> {
    return run.config;
  }

  async *scanMetricRows(run: RunDescriptor): AsyncIterable<MetricRow> {
    const project = this.projectOf(run);
    const lastStepData = await this.query(LAST_STEP_QUERY, { project, run: run.id });
    const lastStep = field(field(field(lastStepData, "project"), "run"), "lastHistoryStep");
    if (typeof lastStep !== "number" || lastStep < 0) {
      return;
    }

    for (let minStep = 0; minStep <= lastStep; minStep += SOURCE_PAGE_SIZES.historyRows) {
      const data = await this.query(HISTORY_QUERY, {
        project,
        run: run.id,
        minStep,
        maxStep: minStep + SOURCE_PAGE_SIZES.historyRows,
        pageSize: SOURCE_PAGE_SIZES.historyRows
      });
      for (const entry of arrayField(field(field(data, "project"), "run"), "history")) {
        const row = parseRow(entry);
        if (row) {
          yield row;
        }
      }
    }
  }

  async *readSystemRows(run: RunDescriptor): AsyncIterable<[number, MetricRow]> {
    const data = await this.query(EVENTS_QUERY, {
      project: this.projectOf(run),
      run: run.id,
      samples: SOURCE_PAGE_SIZES.systemEvents
    });
    let index = 0;
    for (const entry of arrayField(field(field(data, "project"), "run"), "events")) {
      const row = parseRow(entry);
      if (row) {
        yield [index, row];
        index += 1;
      }
    }
  }

  private projectOf(run: RunDescriptor): string {
    const project = this.projects.get(run.id);
    if (!project) {
      throw new Error(`Run ${run.id} was not listed by this reader`);
    }
    return project;
  }

  private async query(query: string, variables: Record<string, unknown>): Promise<unknown> {
    const url = `${this.runtime.baseUrl.replace(/\/$/, "")}/graphql`;
    const response = await requestJson({
      method: "POST",
      url,
      headers: this.headers(),
      body: { query, variables: { entity: this.entity, ...variables } }
    });
    const errors = arrayField(response.body, "errors");
    if (errors.length > 0) {
      const message = errors.map((error) => stringField(error, "message") ?? "unknown error").join("; ");
      throw new RequestError(`Source query failed: ${message}`, response.status, url);
    }
    return field(response.body, "data");
  }

  private headers(): Record<string, string> {
    if (!this.runtime.apiKey) {
      return {};
    }
    return { Authorization: `Basic ${Buffer.from(`api:${this.runtime.apiKey}`).toString("base64")}` };
  }
}

function parseRow(entry: unknown): MetricRow | null {
  if (isRecord(entry)) {
    return entry;
  }
  if (typeof entry !== "string") {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(entry);
    return isRecord(parsed) ? parsed : null;
  } catch (error) {
    logger.warn("Skipping unparsable source row", { error: error instanceof Error ? error.message : String(error) });
    return null;
  }
}

export function parseSourceConfig(raw: unknown): RunConfig {
  let decoded: unknown = raw;
  if (typeof raw === "string") {
    try {
      decoded = JSON.parse(raw);
    } catch {
      logger.warn("Source run config is not valid JSON; treating it as empty");
      return {};
    }
  }
  const config: RunConfig = {};
  if (!isRecord(decoded)) {
    return config;
  }
  for (const [key, entry] of Object.entries(decoded)) {
    if (key.startsWith("_")) {
      continue;
    }
    config[key] = toConfigValue(isRecord(entry) && "value" in entry ? entry.value : entry);
  }
  return config;
}

function toRunDescriptor(node: unknown): RunDescriptor | null {
  const id = stringField(node, "name");
  if (!id) {
    return null;
  }
  const group = stringField(node, "group");
  return {
    id,
    name: stringField(node, "displayName") ?? id,
    ...(group ? { group } : {}),
    createdAt: stringField(node, "createdAt") ?? "",
    config: parseSourceConfig(field(node, "config"))
  };
}
