/**
 * Typed configuration for the project librarian agent engine, built once
 * from the loaded variables and handed to whatever needs it.
 */

import {
  AGENT_MODEL_VARIABLES,
  DEFAULT_RUNTIME,
  TIMEZONE_OFFSET_HOURS,
} from "./defaults.js";
import { toValidationError } from "./errors.js";
import { LibrarianEnvSchema } from "./schema.js";

import type { AgentName, LibrarianConfig } from "../types/index.js";

/**
 * Build the engine configuration from a variable mapping.
 *
 * @param values - Variable name to value
 * @returns Frozen configuration
 * @throws ConfigValidationError if a variable is missing or invalid
 */
export function buildLibrarianConfig(
  values: Readonly<Record<string, string | undefined>>,
): Readonly<LibrarianConfig> {
  const result = LibrarianEnvSchema.safeParse(values);

  if (!result.success) {
    throw toValidationError("Environment validation failed", result.error);
  }

  const env = result.data;

  const agentModels: Partial<Record<AgentName, string>> = {};
  for (const [agent, variable] of Object.entries(AGENT_MODEL_VARIABLES)) {
    const model = values[variable]?.trim();
    if (model && isAgentName(agent)) {
      agentModels[agent] = model;
    }
  }

  return Object.freeze({
    projectId: env.PROJECT_ID,
    location: env.LOCATION,
    logLevel: env.LOG_LEVEL,
    isLocal: env.IS_LOCAL,
    timezoneOffsetHours: env.IS_LOCAL
      ? TIMEZONE_OFFSET_HOURS.local
      : TIMEZONE_OFFSET_HOURS.deployed,
    reasoningEngineId: env.PROJECT_LIBRARIAN_REASONING_ENGINE_ID,
    // Older deployments wrote the database name without parentheses
    firestoreDatabase:
      env.FIRESTORE_DB_NAME === "default"
        ? DEFAULT_RUNTIME.firestoreDatabase
        : env.FIRESTORE_DB_NAME,
    stagingBucketName: env.STAGING_BUCKET_NAME,
    agentModels: Object.freeze(agentModels),
  });
}

function isAgentName(name: string): name is AgentName {
  return Object.hasOwn(AGENT_MODEL_VARIABLES, name);
}

/**
 * Resolve the model an agent should run with.
 *
 * Returns the configured model, else the fallback. Without either the result
 * is undefined and the agent keeps its own default.
 */
export function resolveAgentModel(
  config: Readonly<LibrarianConfig>,
  agent: AgentName,
  fallback?: string,
): string | undefined {
  return config.agentModels[agent] ?? fallback;
}

/**
 * Variables the agent framework reads, derived from the configuration.
 */
export function deriveRuntimeEnv(
  config: Readonly<LibrarianConfig>,
): Record<string, string> {
  return {
    GOOGLE_CLOUD_PROJECT: config.projectId,
    GOOGLE_CLOUD_LOCATION: config.location,
    GOOGLE_GENAI_USE_VERTEXAI: "true",
    OTEL_SDK_DISABLED: "true",
  };
}

/**
 * Variables passed to a deployed reasoning engine.
 */
export function deploymentEnvVars(
  config: Readonly<LibrarianConfig>,
): Record<string, string> {
  return {
    PROJECT_ID: config.projectId,
    LOCATION: config.location,
    FIRESTORE_DB_NAME: config.firestoreDatabase,
    PROJECT_LIBRARIAN_REASONING_ENGINE_ID: config.reasoningEngineId ?? "",
  };
}

/**
 * Full resource name of the deployed reasoning engine.
 *
 * @returns Resource name, or null when no engine ID is configured
 */
export function reasoningEngineResourceName(
  config: Readonly<LibrarianConfig>,
): string | null {
  if (!config.reasoningEngineId) {
    return null;
  }
  return `projects/${config.projectId}/locations/${config.location}/reasoningEngines/${config.reasoningEngineId}`;
}

/**
 * Staging bucket as a gs:// URI, or null when none is configured.
 */
export function stagingBucketUri(
  config: Readonly<LibrarianConfig>,
): string | null {
  return config.stagingBucketName ? `gs://${config.stagingBucketName}` : null;
}

/**
 * Application ID the engine registers sessions under.
 */
export function engineAppId(config: Readonly<LibrarianConfig>): string {
  return config.reasoningEngineId ?? DEFAULT_RUNTIME.appId;
}
