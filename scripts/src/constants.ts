// Hard per-call limits of the destination log-batch endpoint.
export const MAX_METRICS_PER_BATCH = 1000;
export const MAX_PARAMS_PER_BATCH = 100;
export const MAX_PARAM_VALUE_LENGTH = 6000;

export const DEFAULT_EXCLUDED_METRICS = ["_timestamp", "_step", "_runtime", "_run_time"] as const;

export const SOURCE_KEY_SEPARATOR = ".";
export const DESTINATION_KEY_SEPARATOR = "/";

export const CHECKPOINT_INTERVAL = 5;
export const DEFAULT_THREADS = 1;
export const EXPERIMENT_SUFFIX_LENGTH = 6;

export const SNAPSHOT_FILES = {
  tags: "tags.csv",
  params: "params.json",
  metrics: "metrics",
  systemMetrics: "system_metrics",
  extension: ".csv"
} as const;

export const MIGRATION_TAGS = {
  experimentMarker: "migrate_from_source_project",
  projectName: "source_project_name",
  dualWrite: "dual_write_source_destination",
  complete: "migration_complete",
  sourceRunId: "source_run_id",
  sourceRunName: "source_run_name",
  sourceCreatedAt: "source_run_created_at",
  runGroup: "run_group",
  groupParent: "migration_group_parent",
  parentRunId: "mlflow.parentRunId",
  runName: "mlflow.runName"
} as const;

export const TRUE_TAG_VALUE = "True";

export const ENV_VARIABLES = {
  sourceApiKey: "WANDB_API_KEY",
  sourceBaseUrl: "WANDB_BASE_URL",
  sourceEntity: "WANDB_ENTITY",
  trackingUri: "MLFLOW_TRACKING_URI",
  trackingToken: "MLFLOW_TRACKING_TOKEN",
  experimentPrefix: "MIGRATION_EXPERIMENT_PREFIX",
  logLevel: "LOG_LEVEL"
} as const;

export const DEFAULT_SOURCE_BASE_URL = "https://api.wandb.ai";
export const DEFAULT_TRACKING_URI = "http://localhost:5000";

export const SOURCE_PAGE_SIZES = {
  runs: 50,
  historyRows: 1000,
  systemEvents: 100000
} as const;

export const SEARCH_RUNS_PAGE_SIZE = 1000;
