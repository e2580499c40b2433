/**
 * Configuration module exports.
 */

export {
  load,
  loadEnvSource,
  validateEnvSource,
  parseEnvFile,
  resolveEntries,
  resolveSource,
} from "./loader.js";

export {
  ConfigLoadError,
  ConfigValidationError,
  toValidationError,
} from "./errors.js";

export {
  buildLibrarianConfig,
  resolveAgentModel,
  deriveRuntimeEnv,
  deploymentEnvVars,
  reasoningEngineResourceName,
  stagingBucketUri,
  engineAppId,
} from "./librarian.js";

export {
  EnvSourceSchema,
  ConfigEntrySchema,
  EnvProfileSchema,
  LibrarianEnvSchema,
  EngineLogLevelSchema,
  BooleanStringSchema,
  type ValidatedEnvSource,
  type ValidatedLibrarianEnv,
} from "./schema.js";

export {
  DEFAULT_SOURCE_PATH,
  DEFAULT_RUNTIME,
  ENGINE_LOG_LEVELS,
  AGENT_MODEL_VARIABLES,
  TIMEZONE_OFFSET_HOURS,
} from "./defaults.js";

export type * from "../types/index.js";
