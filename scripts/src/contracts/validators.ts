import { promises as fs } from "node:fs";
import { fileURLToPath } from "node:url";

import Ajv, { type ValidateFunction, type ErrorObject } from "ajv";
import addFormats from "ajv-formats";

import { ConfigurationError } from "../errors.js";
import { isRecord } from "../utils/json.js";

const OPTIONS_SCHEMA_URL = new URL("../../../lib/migration_options.schema.json", import.meta.url);
const RUNTIME_SCHEMA_URL = new URL("../../../lib/runtime_config.schema.json", import.meta.url);

const ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });
addFormats(ajv);

let optionsValidator: ValidateFunction | null = null;
let runtimeValidator: ValidateFunction | null = null;

export async function validateOptions(options: unknown): Promise<string[]> {
  if (!optionsValidator) {
    optionsValidator = ajv.compile(await loadSchema(OPTIONS_SCHEMA_URL));
  }
  return runValidator(optionsValidator, options);
}

export async function validateRuntimeConfig(config: unknown): Promise<string[]> {
  if (!runtimeValidator) {
    runtimeValidator = ajv.compile(await loadSchema(RUNTIME_SCHEMA_URL));
  }
  return runValidator(runtimeValidator, config);
}

function runValidator(validator: ValidateFunction, data: unknown): string[] {
  if (validator(data)) {
    return [];
  }
  return formatErrors(validator.errors);
}

async function loadSchema(url: URL): Promise<Record<string, unknown>> {
  const raw = await fs.readFile(fileURLToPath(url), "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Schema ${fileURLToPath(url)} must be a JSON object`);
  }
  return parsed;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return ["Unknown validation error"];
  }
  return errors.map((error) => `${error.instancePath || "/"} ${error.message ?? "invalid"}`);
}
