/**
 * Zod validation schemas for configuration.
 */

import { z } from "zod";

import { parseBoolean } from "../utils/parse.js";

import {
  DEFAULT_RUNTIME,
  ENGINE_LOG_LEVELS,
  ENTRY_NAME_PATTERN,
} from "./defaults.js";

/**
 * Environment variable name schema.
 */
export const EntryNameSchema = z
  .string()
  .regex(ENTRY_NAME_PATTERN, "Must be an UPPER_SNAKE_CASE variable name");

/**
 * Scalar value schema. Every value ends up a string; YAML numbers arrive as
 * their source text.
 */
export const ScalarValueSchema = z
  .union([
    z.string(),
    z.boolean(),
    z.bigint(),
    z
      .number()
      .refine(
        (n) =>
          Number.isFinite(n) && (!Number.isInteger(n) || Number.isSafeInteger(n)),
        "Numeric value exceeds integer precision; quote it",
      ),
  ])
  .transform((value) => String(value));

/**
 * Configuration entry schema.
 */
export const ConfigEntrySchema = z.object({
  name: EntryNameSchema,
  value: ScalarValueSchema,
  enabled: z.boolean().default(true),
  group: z.string().optional(),
  description: z.string().optional(),
});

/**
 * Profile schema.
 */
export const EnvProfileSchema = z.object({
  description: z.string().optional(),
  set: z.record(EntryNameSchema, ScalarValueSchema).default({}),
  enable: z.array(EntryNameSchema).default([]),
});

/**
 * Complete configuration source schema.
 */
export const EnvSourceSchema = z
  .object({
    entries: z
      .array(ConfigEntrySchema)
      .min(1, "At least one entry is required"),
    profiles: z.record(z.string().min(1), EnvProfileSchema).default({}),
  })
  .superRefine((source, ctx) => {
    const declared = new Set<string>();

    source.entries.forEach((entry, index) => {
      if (declared.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entries", index, "name"],
          message: `Duplicate entry name: ${entry.name}`,
        });
      }
      declared.add(entry.name);
    });

    for (const [profileName, profile] of Object.entries(source.profiles)) {
      for (const name of Object.keys(profile.set)) {
        if (!declared.has(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["profiles", profileName, "set", name],
            message: `Unknown entry: ${name}`,
          });
        }
      }
      profile.enable.forEach((name, index) => {
        if (!declared.has(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["profiles", profileName, "enable", index],
            message: `Unknown entry: ${name}`,
          });
        }
      });
    }
  });

/**
 * Engine log level schema (case-insensitive).
 */
export const EngineLogLevelSchema = z
  .string()
  .trim()
  .toUpperCase()
  .pipe(z.enum(ENGINE_LOG_LEVELS));

/**
 * Truth string schema (y/yes/t/true/on/1 and their negatives).
 */
export const BooleanStringSchema = z.string().transform((value, ctx) => {
  try {
    return parseBoolean(value);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : String(err),
    });
    return z.NEVER;
  }
});

/**
 * Cloud Storage bucket name: 3-63 characters, alphanumeric at both ends.
 */
const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9._-]{1,61}[a-z0-9]$/;

/**
 * Optional variable that counts as unset when empty, the way the engine
 * reads it.
 */
function optionalUnlessEmpty<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) =>
      typeof value === "string" && value.trim() === "" ? undefined : value,
    schema.optional(),
  );
}

/**
 * Schema for the variables the agent engine reads at startup.
 * Names it does not know are ignored.
 */
export const LibrarianEnvSchema = z.object({
  PROJECT_ID: z
    .string({ required_error: "PROJECT_ID is required" })
    .trim()
    .min(1, "PROJECT_ID must not be empty"),
  LOCATION: z.string().trim().min(1).default(DEFAULT_RUNTIME.location),
  LOG_LEVEL: EngineLogLevelSchema.default(DEFAULT_RUNTIME.logLevel),
  IS_LOCAL: BooleanStringSchema.default(String(DEFAULT_RUNTIME.isLocal)),
  PROJECT_LIBRARIAN_REASONING_ENGINE_ID: optionalUnlessEmpty(
    z.string().regex(/^\d+$/, "Reasoning engine ID must be numeric"),
  ),
  FIRESTORE_DB_NAME: z
    .string()
    .trim()
    .min(1)
    .default(DEFAULT_RUNTIME.firestoreDatabase),
  STAGING_BUCKET_NAME: optionalUnlessEmpty(
    z.string().regex(BUCKET_NAME_PATTERN, "Invalid bucket name"),
  ),
});

/**
 * Type inference from schemas.
 */
export type ValidatedEnvSource = z.infer<typeof EnvSourceSchema>;
export type ValidatedLibrarianEnv = z.infer<typeof LibrarianEnvSchema>;
