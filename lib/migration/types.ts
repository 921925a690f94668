export type MetricRow = Record<string, unknown>;

export interface MetricPoint {
  key: string;
  value: number;
  timestamp: number;
  step: number;
}

export type MetricBatch = MetricPoint[];

export type MetricStream = "metrics" | "system_metrics";

export type ConfigValue = string | number | boolean | null | ConfigValue[] | { [key: string]: ConfigValue };

export type RunConfig = Record<string, ConfigValue>;

export interface RunDescriptor {
  id: string;
  name: string;
  group?: string;
  createdAt: string;
  config: RunConfig;
}

export interface SourceReader {
  listRuns(project: string): AsyncIterable<RunDescriptor>;
  readConfig(run: RunDescriptor): Promise<RunConfig>;
  scanMetricRows(run: RunDescriptor): AsyncIterable<MetricRow>;
  readSystemRows(run: RunDescriptor): AsyncIterable<[number, MetricRow]>;
}

export type TagMap = Record<string, string>;

export interface ExperimentHandle {
  id: string;
  name: string;
  tags: TagMap;
}

export interface RunHandle {
  id: string;
  name: string;
  experimentId: string;
  tags: TagMap;
}

export interface DestinationWriter {
  getExperimentByName(name: string): Promise<ExperimentHandle | null>;
  createExperiment(name: string, tags: TagMap): Promise<ExperimentHandle>;
  setExperimentTags(experimentId: string, tags: TagMap): Promise<void>;
  startRun(experimentId: string, name: string, tags: TagMap): Promise<RunHandle>;
  logBatch(runId: string, metrics: MetricBatch): void;
  logParams(runId: string, params: Record<string, string>): Promise<void>;
  setTags(runId: string, tags: TagMap): Promise<void>;
  searchRuns(experimentId: string, filter?: string): Promise<RunHandle[]>;
  deleteRun(runId: string): Promise<void>;
  endRun(runId: string, status: "FINISHED" | "FAILED"): Promise<void>;
  /** Rethrows a run's write failure only when that run id is given; the global barrier just waits. */
  flushPendingWrites(runId?: string): Promise<void>;
  pendingWrites(): number;
}

export interface MigrationOptions {
  project: string;
  entity: string | null;
  experimentName: string | null;
  experimentPrefix: string;
  runNames: string[];
  excludeMetrics: string[];
  dryRun: boolean;
  saveDir: string | null;
  resumeFromDryRun: boolean;
  resumeFromCrash: boolean;
  skipExisting: boolean;
  threads: number;
  dualWriteExperimentId: string | null;
  useNestedRun: boolean;
  verbose: boolean;
}

export interface MigrationSummary {
  migrated: string[];
  skipped: string[];
  failed: string[];
  durationMs: number;
}
