/**
 * Centralized type exports.
 */

export type {
  ConfigEntry,
  EnvProfile,
  EnvSource,
  EntryOrigin,
  ResolvedEntry,
  ResolvedEnvironment,
  ResolveOptions,
  LoadOptions,
  EngineLogLevel,
  AgentName,
  LibrarianConfig,
  LoadResult,
} from "./config.js";
