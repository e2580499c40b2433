/**
 * Configuration type definitions.
 * Represents the environment source file and what the loader produces from it.
 */

/**
 * A named configuration variable as declared in the source file.
 */
export interface ConfigEntry {
  name: string;
  value: string;
  /** Inactive entries are declared but never written */
  enabled: boolean;
  /** Informal category (adk, agent, firestore, deploy) */
  group?: string | undefined;
  description?: string | undefined;
}

/**
 * Named override set applied on top of the declared entries.
 */
export interface EnvProfile {
  description?: string | undefined;
  /** Values to set; setting a value also activates the entry */
  set: Record<string, string>;
  /** Inactive entries to activate with their declared value */
  enable: string[];
}

/**
 * Parsed and validated configuration source.
 */
export interface EnvSource {
  entries: ConfigEntry[];
  profiles: Record<string, EnvProfile>;
}

/**
 * Where the final value of an entry came from.
 */
export type EntryOrigin =
  | "source"
  | `profile:${string}`
  | "enable"
  | "override";

/**
 * An entry after profiles and overrides have been applied.
 */
export interface ResolvedEntry extends ConfigEntry {
  origin: EntryOrigin;
}

/**
 * Result of resolving a source against a set of overrides.
 */
export interface ResolvedEnvironment {
  /** Every entry in declaration order, inactive ones included */
  entries: ResolvedEntry[];
  /** Active names mapped to their values, in declaration order */
  values: Readonly<Record<string, string>>;
}

/**
 * Options for resolving a source.
 */
export interface ResolveOptions {
  profiles?: string[];
  enable?: string[];
  overrides?: Record<string, string>;
}

/**
 * Options for loading a source into an environment.
 */
export interface LoadOptions extends ResolveOptions {
  /** Source file; defaults to the shipped config/librarian.env.yaml */
  sourcePath?: string;
  /** dotenv override files, later files win; applied before `overrides` */
  envFiles?: string[];
  /** Environment to write into; defaults to process.env */
  target?: NodeJS.ProcessEnv;
  /** Leave names already present in the target untouched */
  preserveExisting?: boolean;
  /** Also write the derived runtime variables */
  includeRuntime?: boolean;
}

/**
 * Log level names understood by the agent engine.
 */
export type EngineLogLevel =
  | "NOTSET"
  | "DEBUG"
  | "INFO"
  | "WARN"
  | "WARNING"
  | "ERROR"
  | "FATAL"
  | "CRITICAL";

/**
 * Agents whose model can be pinned through the environment.
 */
export type AgentName =
  | "taskAnalyzer"
  | "projectAnalyzer"
  | "adviceGenerator"
  | "planning"
  | "googleSearch"
  | "urlContext"
  | "proactiveAdvisor"
  | "entityManager"
  | "projectArchivist";

/**
 * Typed configuration derived from the loaded variables.
 */
export interface LibrarianConfig {
  projectId: string;
  location: string;
  logLevel: EngineLogLevel;
  isLocal: boolean;
  /** Offset applied when rendering timestamps: 0 locally, JST otherwise */
  timezoneOffsetHours: number;
  reasoningEngineId?: string | undefined;
  firestoreDatabase: string;
  stagingBucketName?: string | undefined;
  /** Unset agents keep their own built-in model */
  agentModels: Readonly<Partial<Record<AgentName, string>>>;
}

/**
 * Result of loading a source into an environment.
 */
export interface LoadResult {
  sourcePath: string;
  values: Readonly<Record<string, string>>;
  config: Readonly<LibrarianConfig>;
  /** Names written to the target */
  applied: string[];
  /** Names left alone because they were already set */
  preserved: string[];
}
