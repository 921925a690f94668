#!/usr/bin/env node
import { resolveRuntimeConfig } from "./config/env.js";
import { parseCommandLine, resolveOptions, USAGE } from "./config/options.js";
import { validateRuntimeConfig } from "./contracts/validators.js";
import { ConfigurationError, describeError } from "./errors.js";
import { buildDependencies } from "./pipeline/dependencies.js";
import { runMigration } from "./pipeline/driver.js";
import { logger, setLogLevel } from "./utils/logger.js";

async function main(): Promise<void> {
  const commandLine = parseCommandLine(process.argv.slice(2));
  if (commandLine.help) {
    console.log(USAGE);
    return;
  }

  const runtime = resolveRuntimeConfig();
  const runtimeErrors = await validateRuntimeConfig(runtime);
  if (runtimeErrors.length > 0) {
    throw new ConfigurationError(`Invalid environment configuration: ${runtimeErrors.join("; ")}`);
  }

  const options = await resolveOptions(commandLine, { experimentPrefix: runtime.experimentPrefix });
  if (options.verbose) {
    setLogLevel("debug");
  }

  const summary = await runMigration(options, buildDependencies(options, runtime));
  if (summary.failed.length > 0) {
    logger.error("Some runs failed; rerun with --resume-from-crash to retry them", { failed: summary.failed });
    process.exitCode = 1;
  }
}

void main().catch((error) => {
  logger.error("Migration aborted", { error: describeError(error) });
  process.exitCode = 1;
});
