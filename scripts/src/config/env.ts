import { DEFAULT_SOURCE_BASE_URL, DEFAULT_TRACKING_URI, ENV_VARIABLES } from "../constants.js";

export interface SourceRuntimeConfig {
  baseUrl: string;
  apiKey: string | null;
  entity: string | null;
}

export interface DestinationRuntimeConfig {
  trackingUri: string;
  token: string | null;
}

export interface RuntimeConfig {
  source: SourceRuntimeConfig;
  destination: DestinationRuntimeConfig;
  experimentPrefix: string;
}

function nonEmpty(value: string | undefined): string | null {
  return value !== undefined && value.trim().length > 0 ? value.trim() : null;
}

export function resolveRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    source: {
      baseUrl: nonEmpty(env[ENV_VARIABLES.sourceBaseUrl]) ?? DEFAULT_SOURCE_BASE_URL,
      apiKey: nonEmpty(env[ENV_VARIABLES.sourceApiKey]),
      entity: nonEmpty(env[ENV_VARIABLES.sourceEntity])
    },
    destination: {
      trackingUri: nonEmpty(env[ENV_VARIABLES.trackingUri]) ?? DEFAULT_TRACKING_URI,
      token: nonEmpty(env[ENV_VARIABLES.trackingToken])
    },
    experimentPrefix: env[ENV_VARIABLES.experimentPrefix] ?? ""
  };
}
