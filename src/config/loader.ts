/**
 * Configuration loader: YAML/JSON source with Zod validation, dotenv
 * override files, profiles, and the write into a process environment.
 */

import { existsSync, readFileSync } from "node:fs";
import path from "node:path";

import dotenv from "dotenv";
import { parseDocument, visit } from "yaml";

import { logger } from "../utils/logging.js";

import { DEFAULT_SOURCE_PATH, ENTRY_NAME_PATTERN } from "./defaults.js";
import { ConfigLoadError, toValidationError } from "./errors.js";
import { buildLibrarianConfig, deriveRuntimeEnv } from "./librarian.js";
import { EnvSourceSchema } from "./schema.js";

import type {
  EntryOrigin,
  EnvSource,
  LoadOptions,
  LoadResult,
  ResolvedEntry,
  ResolvedEnvironment,
  ResolveOptions,
} from "../types/index.js";

/**
 * Read a file, mapping every failure to ConfigLoadError.
 */
function readSourceFile(absolutePath: string, kind: string): string {
  if (!existsSync(absolutePath)) {
    throw new ConfigLoadError(`${kind} not found: ${absolutePath}`);
  }

  try {
    return readFileSync(absolutePath, "utf-8");
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to read ${kind.toLowerCase()}: ${absolutePath}`,
      err instanceof Error ? err : undefined,
    );
  }
}

/**
 * Parse YAML, keeping numeric scalars as written (`00123`, `1.10` and long
 * IDs stay exactly as in the file).
 *
 * @throws YAMLParseError on malformed input
 */
function parseYamlSource(content: string): unknown {
  const doc = parseDocument(content);

  const [firstError] = doc.errors;
  if (firstError) {
    throw firstError;
  }

  visit(doc, {
    Scalar(_key, node) {
      if (
        (typeof node.value === "number" || typeof node.value === "bigint") &&
        node.source !== undefined
      ) {
        node.value = node.source;
      }
    },
  });

  return doc.toJS();
}

/**
 * Load a configuration source from a YAML or JSON file.
 *
 * @param sourcePath - Path to the source file
 * @returns Validated source
 * @throws ConfigLoadError if the file cannot be read or parsed
 * @throws ConfigValidationError if validation fails
 */
export function loadEnvSource(sourcePath: string): EnvSource {
  const absolutePath = path.resolve(sourcePath);
  const content = readSourceFile(absolutePath, "Configuration source");

  let raw: unknown;
  const ext = path.extname(absolutePath).toLowerCase();

  try {
    if (ext === ".yaml" || ext === ".yml") {
      raw = parseYamlSource(content);
    } else if (ext === ".json") {
      raw = JSON.parse(content);
    } else {
      try {
        raw = parseYamlSource(content);
      } catch {
        raw = JSON.parse(content);
      }
    }
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to parse configuration source: ${absolutePath}`,
      err instanceof Error ? err : undefined,
    );
  }

  return validateEnvSource(raw, absolutePath);
}

/**
 * Validate a raw configuration source object.
 *
 * @param raw - Parsed source
 * @param origin - Label used in the error message
 * @throws ConfigValidationError if validation fails
 */
export function validateEnvSource(raw: unknown, origin = "source"): EnvSource {
  const result = EnvSourceSchema.safeParse(raw);

  if (!result.success) {
    throw toValidationError(
      `Configuration validation failed (${origin})`,
      result.error,
    );
  }

  return result.data;
}

/**
 * Parse a dotenv-format override file.
 *
 * @param filePath - Path to the .env file
 * @returns Variable name to value
 * @throws ConfigLoadError if the file is missing or names an invalid variable
 */
export function parseEnvFile(filePath: string): Record<string, string> {
  const absolutePath = path.resolve(filePath);
  const parsed = dotenv.parse(readSourceFile(absolutePath, "Override file"));

  for (const name of Object.keys(parsed)) {
    if (!ENTRY_NAME_PATTERN.test(name)) {
      throw new ConfigLoadError(
        `Invalid variable name "${name}" in override file: ${absolutePath}`,
      );
    }
  }

  return { ...parsed };
}

/**
 * Mark an entry active, keeping its declared value.
 */
function activate(
  entries: Map<string, ResolvedEntry>,
  name: string,
  origin: EntryOrigin,
): void {
  const entry = entries.get(name);
  if (!entry) {
    throw new ConfigLoadError(`Cannot enable unknown entry: ${name}`);
  }
  if (!entry.enabled) {
    entries.set(name, { ...entry, enabled: true, origin });
  }
}

/**
 * Apply profiles, enables and overrides to a source.
 *
 * Order: declared entries, then each profile in the given order, then
 * `enable`, then `overrides`. Overrides may add names the source does not
 * declare; they follow the declared entries.
 *
 * @throws ConfigLoadError on an unknown profile, unknown entry or invalid name
 */
export function resolveEntries(
  source: EnvSource,
  options: ResolveOptions = {},
): ResolvedEnvironment {
  const entries = new Map<string, ResolvedEntry>();
  for (const entry of source.entries) {
    entries.set(entry.name, { ...entry, origin: "source" });
  }

  for (const profileName of options.profiles ?? []) {
    const profile = source.profiles[profileName];
    if (!profile) {
      const available = Object.keys(source.profiles).join(", ") || "none";
      throw new ConfigLoadError(
        `Unknown profile: ${profileName} (available: ${available})`,
      );
    }

    const origin: EntryOrigin = `profile:${profileName}`;
    for (const name of profile.enable) {
      activate(entries, name, origin);
    }
    for (const [name, value] of Object.entries(profile.set)) {
      const entry = entries.get(name);
      if (!entry) {
        throw new ConfigLoadError(
          `Profile ${profileName} sets unknown entry: ${name}`,
        );
      }
      entries.set(name, { ...entry, value, enabled: true, origin });
    }
  }

  for (const name of options.enable ?? []) {
    activate(entries, name, "enable");
  }

  for (const [name, value] of Object.entries(options.overrides ?? {})) {
    if (!ENTRY_NAME_PATTERN.test(name)) {
      throw new ConfigLoadError(`Invalid variable name in override: ${name}`);
    }
    const entry = entries.get(name);
    entries.set(name, {
      name,
      group: entry?.group,
      description: entry?.description,
      value,
      enabled: true,
      origin: "override",
    });
  }

  const resolved = [...entries.values()];
  const values = Object.fromEntries(
    resolved
      .filter((entry) => entry.enabled)
      .map((entry): [string, string] => [entry.name, entry.value]),
  );

  return { entries: resolved, values: Object.freeze(values) };
}

/**
 * Read the source and override files named in the options and resolve them,
 * without touching any environment.
 *
 * @throws ConfigLoadError if a source or override cannot be loaded
 */
export function resolveSource(options: LoadOptions = {}): {
  sourcePath: string;
  resolved: ResolvedEnvironment;
} {
  const sourcePath = path.resolve(options.sourcePath ?? DEFAULT_SOURCE_PATH);
  const source = loadEnvSource(sourcePath);

  const fileOverrides: Record<string, string> = {};
  for (const envFile of options.envFiles ?? []) {
    Object.assign(fileOverrides, parseEnvFile(envFile));
  }

  const resolved = resolveEntries(source, {
    profiles: options.profiles,
    enable: options.enable,
    overrides: { ...fileOverrides, ...options.overrides },
  });

  return { sourcePath, resolved };
}

/**
 * Load the configuration source and write its active entries into an
 * environment.
 *
 * Everything is read and validated before the first write: on failure the
 * target is left as it was.
 *
 * @param options - Source, overrides and target
 * @returns Effective values and the typed engine configuration
 * @throws ConfigLoadError if a source or override cannot be loaded
 * @throws ConfigValidationError if the source or resulting values are invalid
 */
export function load(options: LoadOptions = {}): LoadResult {
  const target = options.target ?? process.env;
  const { sourcePath, resolved } = resolveSource(options);

  const keep = (name: string): boolean =>
    options.preserveExisting === true && target[name] !== undefined;

  // Values in effect once written: kept names contribute what is already set
  const effective: Record<string, string> = {};
  for (const [name, value] of Object.entries(resolved.values)) {
    effective[name] = keep(name) ? (target[name] ?? value) : value;
  }

  const config = buildLibrarianConfig(effective);

  if (options.includeRuntime) {
    for (const [name, value] of Object.entries(deriveRuntimeEnv(config))) {
      effective[name] = keep(name) ? (target[name] ?? value) : value;
    }
  }

  const applied: string[] = [];
  const preserved: string[] = [];
  for (const [name, value] of Object.entries(effective)) {
    if (keep(name)) {
      preserved.push(name);
      logger.debug(`Keeping existing ${name}`);
      continue;
    }
    target[name] = value;
    applied.push(name);
    logger.debug(`Set ${name}`);
  }

  logger.debug(
    `Loaded ${String(applied.length)} variable(s) from ${sourcePath}` +
      (preserved.length > 0 ? `, kept ${String(preserved.length)}` : ""),
  );

  return {
    sourcePath,
    values: Object.freeze(effective),
    config,
    applied,
    preserved,
  };
}
