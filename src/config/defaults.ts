/**
 * Default configuration values.
 */

import { fileURLToPath } from "node:url";

import type { AgentName, EngineLogLevel } from "../types/index.js";

/**
 * Shipped configuration source, resolved from this module so it works from
 * both src/ and dist/.
 */
export const DEFAULT_SOURCE_PATH = fileURLToPath(
  new URL("../../config/librarian.env.yaml", import.meta.url),
);

/**
 * Variable names the loader accepts.
 */
export const ENTRY_NAME_PATTERN = /^[A-Z_][A-Z0-9_]*$/;

/**
 * Engine log levels, lowest first. WARN and FATAL are the engine's aliases
 * for WARNING and CRITICAL.
 */
export const ENGINE_LOG_LEVELS = [
  "NOTSET",
  "DEBUG",
  "INFO",
  "WARN",
  "WARNING",
  "ERROR",
  "FATAL",
  "CRITICAL",
] as const satisfies readonly EngineLogLevel[];

/**
 * Fallbacks the agent engine applies when a variable is unset.
 */
export const DEFAULT_RUNTIME: {
  location: string;
  logLevel: EngineLogLevel;
  isLocal: boolean;
  firestoreDatabase: string;
  appId: string;
} = {
  location: "us-central1",
  logLevel: "WARNING",
  isLocal: false,
  firestoreDatabase: "(default)",
  appId: "default-app",
};

/**
 * Timestamp offsets: the deployed engine renders times in JST.
 */
export const TIMEZONE_OFFSET_HOURS = {
  local: 0,
  deployed: 9,
};

/**
 * Environment variable that pins each agent's model.
 */
export const AGENT_MODEL_VARIABLES: Readonly<Record<AgentName, string>> = {
  taskAnalyzer: "TASK_ANALYZER_AGENT_MODEL",
  projectAnalyzer: "PROJECT_ANALYZER_AGENT_MODEL",
  adviceGenerator: "ADVICE_GENERATOR_AGENT_MODEL",
  planning: "PLANNING_AGENT_MODEL",
  googleSearch: "GOOGLE_SEARCH_AGENT_MODEL",
  urlContext: "URL_CONTEXT_AGENT_MODEL",
  proactiveAdvisor: "PROACTIVE_ADVISOR_MODEL",
  entityManager: "ENTITY_MANAGER_MODEL",
  projectArchivist: "PROJECT_ARCHIVIST_AGENT_MODEL",
};
