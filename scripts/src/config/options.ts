import { parseArgs } from "node:util";
import { load } from "js-yaml";

import type { MigrationOptions } from "lib/migration/types.js";

import { DEFAULT_THREADS } from "../constants.js";
import { validateOptions } from "../contracts/validators.js";
import { ConfigurationError } from "../errors.js";
import { isDirectory, readTextFile } from "../utils/fs.js";
import { isRecord } from "../utils/json.js";

export const USAGE = `Usage: migrate --project <name> [options]

  --project <name>                 source project to migrate (required)
  --entity <name>                  source entity (defaults to WANDB_ENTITY)
  --experiment <name>              destination experiment name (defaults to the project name)
  --experiment-prefix <prefix>     prepended to the destination experiment name
  --run-names <regex>              only migrate runs whose name matches (repeatable)
  --exclude-metrics <key|regex>    never migrate these metric keys (repeatable)
  --dry-run                        write a local snapshot instead of the destination
  --save-dir <dir>                 snapshot directory for --dry-run / --resume-from-dry-run
  --resume-from-dry-run            replay a snapshot into the destination
  --resume-from-crash              delete unfinished runs and skip finished ones
  --skip-existing                  skip runs already present or dual-written
  --threads <n>                    parallel runs when a snapshot is involved
  --dual-write-experiment-id <id>  reuse this destination experiment unconditionally
  --use-nested-run                 represent source groups as parent runs
  --config <file.yaml>             read options from a YAML file (flags win)
  --verbose                        debug logging`;

const FLAG_OPTIONS = {
  project: { type: "string" },
  entity: { type: "string" },
  experiment: { type: "string" },
  "experiment-prefix": { type: "string" },
  "run-names": { type: "string", multiple: true },
  "exclude-metrics": { type: "string", multiple: true },
  "dry-run": { type: "boolean" },
  "save-dir": { type: "string" },
  "resume-from-dry-run": { type: "boolean" },
  "resume-from-crash": { type: "boolean" },
  "skip-existing": { type: "boolean" },
  threads: { type: "string" },
  "dual-write-experiment-id": { type: "string" },
  "use-nested-run": { type: "boolean" },
  config: { type: "string" },
  verbose: { type: "boolean" },
  help: { type: "boolean" }
} as const;

export interface ParsedCommandLine {
  help: boolean;
  configFile: string | null;
  overrides: Record<string, unknown>;
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: FLAG_OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (error) {
    throw new ConfigurationError(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
  }
}

export function parseCommandLine(argv: string[]): ParsedCommandLine {
  const values = parseFlags(argv);

  const overrides: Record<string, unknown> = {};
  const assign = (key: keyof MigrationOptions, value: unknown) => {
    if (value !== undefined) {
      overrides[key] = value;
    }
  };

  assign("project", values.project);
  assign("entity", values.entity);
  assign("experimentName", values.experiment);
  assign("experimentPrefix", values["experiment-prefix"]);
  assign("runNames", values["run-names"]);
  assign("excludeMetrics", values["exclude-metrics"]);
  assign("dryRun", values["dry-run"]);
  assign("saveDir", values["save-dir"]);
  assign("resumeFromDryRun", values["resume-from-dry-run"]);
  assign("resumeFromCrash", values["resume-from-crash"]);
  assign("skipExisting", values["skip-existing"]);
  assign("dualWriteExperimentId", values["dual-write-experiment-id"]);
  assign("useNestedRun", values["use-nested-run"]);
  assign("verbose", values.verbose);
  if (values.threads !== undefined) {
    const threads = Number(values.threads);
    if (!Number.isInteger(threads)) {
      throw new ConfigurationError(`--threads expects an integer, got "${values.threads}"`);
    }
    overrides.threads = threads;
  }

  return { help: values.help ?? false, configFile: values.config ?? null, overrides };
}

export async function loadOptionsFile(path: string): Promise<Record<string, unknown>> {
  const raw = await readTextFile(path);
  if (raw === null) {
    throw new ConfigurationError(`Options file ${path} does not exist`);
  }
  const parsed: unknown = load(raw);
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Options file ${path} must contain a mapping`);
  }
  return parsed;
}

export function defaultOptions(): Omit<MigrationOptions, "project"> {
  return {
    entity: null,
    experimentName: null,
    experimentPrefix: "",
    runNames: [],
    excludeMetrics: [],
    dryRun: false,
    saveDir: null,
    resumeFromDryRun: false,
    resumeFromCrash: false,
    skipExisting: false,
    threads: DEFAULT_THREADS,
    dualWriteExperimentId: null,
    useNestedRun: false,
    verbose: false
  };
}

function isMigrationOptions(value: Record<string, unknown>): value is Record<string, unknown> & MigrationOptions {
  return typeof value.project === "string";
}

/**
 * defaults < options file < flags, then schema validation and the cross-option checks.
 * Fails before any run is touched.
 */
export async function resolveOptions(
  commandLine: ParsedCommandLine,
  base: Partial<MigrationOptions> = {}
): Promise<MigrationOptions> {
  const fromFile = commandLine.configFile ? await loadOptionsFile(commandLine.configFile) : {};
  const merged: Record<string, unknown> = { ...defaultOptions(), ...base, ...fromFile, ...commandLine.overrides };

  const errors = await validateOptions(merged);
  if (errors.length > 0 || !isMigrationOptions(merged)) {
    throw new ConfigurationError(`Invalid options: ${errors.join("; ") || "project is required"}`);
  }

  await checkOptionConflicts(merged);
  return merged;
}

export async function checkOptionConflicts(options: MigrationOptions): Promise<void> {
  if (options.dryRun && options.resumeFromDryRun) {
    throw new ConfigurationError("--dry-run and --resume-from-dry-run cannot be used together");
  }
  if ((options.dryRun || options.resumeFromDryRun) && !options.saveDir) {
    throw new ConfigurationError("--save-dir is required with --dry-run and --resume-from-dry-run");
  }
  if (options.dualWriteExperimentId && options.dryRun) {
    throw new ConfigurationError("--dual-write-experiment-id only applies when writing to the destination service");
  }
  if (options.dualWriteExperimentId && options.resumeFromCrash) {
    throw new ConfigurationError("--resume-from-crash locates the experiment by name; drop --dual-write-experiment-id");
  }
  if (options.saveDir && (options.dryRun || options.resumeFromDryRun) && !(await isDirectory(options.saveDir))) {
    throw new ConfigurationError(`Directory ${options.saveDir} does not exist. Please create it first.`);
  }
}
