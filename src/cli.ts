/**
 * librarian-env command definitions.
 */

import { spawn } from "node:child_process";

import chalk from "chalk";
import { Command, Option } from "commander";

import {
  ConfigLoadError,
  load,
  reasoningEngineResourceName,
  resolveSource,
  stagingBucketUri,
} from "./config/index.js";
import {
  ENV_FORMATS,
  formatEnvironment,
  isEnvFormat,
  logger,
  parseAssignment,
  table,
} from "./utils/index.js";

import type { LoadOptions } from "./types/index.js";

// =============================================================================
// Option Helpers
// =============================================================================

function stringList(value: unknown): string[] | undefined {
  if (
    Array.isArray(value) &&
    value.every((v): v is string => typeof v === "string")
  ) {
    return value;
  }
  return undefined;
}

/**
 * Parse repeated `--set NAME=VALUE` flags.
 *
 * @throws ConfigLoadError on an assignment without a name or `=`
 */
function parseSetFlags(assignments: string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const assignment of assignments) {
    const parsed = parseAssignment(assignment);
    if (!parsed) {
      throw new ConfigLoadError(
        `Invalid --set value "${assignment}": expected NAME=VALUE`,
      );
    }
    overrides[parsed.name] = parsed.value;
  }
  return overrides;
}

/**
 * Extract loader options from a commander options object.
 */
export function extractLoadOptions(
  options: Record<string, unknown>,
): LoadOptions {
  const loadOptions: LoadOptions = {};

  if (typeof options["source"] === "string") {
    loadOptions.sourcePath = options["source"];
  }

  const profiles = stringList(options["profile"]);
  if (profiles) {
    loadOptions.profiles = profiles;
  }

  const enable = stringList(options["enable"]);
  if (enable) {
    loadOptions.enable = enable;
  }

  const envFiles = stringList(options["envFile"]);
  if (envFiles) {
    loadOptions.envFiles = envFiles;
  }

  const assignments = stringList(options["set"]);
  if (assignments) {
    loadOptions.overrides = parseSetFlags(assignments);
  }

  return loadOptions;
}

/**
 * Add the options every command shares.
 */
function withLoaderOptions(command: Command): Command {
  return command
    .optionsGroup("Source Options:")
    .option("-s, --source <path>", "Configuration source (YAML or JSON)")
    .option("-p, --profile <names...>", "Profiles to apply, in order")
    .option("-e, --enable <names...>", "Inactive entries to activate")
    .option("--env-file <paths...>", "dotenv override files, later files win")
    .option("--set <assignments...>", "Overrides as NAME=VALUE")
    .optionsGroup("Output Options:")
    .option("-v, --verbose", "Debug output on stderr");
}

/**
 * Run a command action, reporting errors and setting the exit code.
 */
async function runAction(
  options: Record<string, unknown>,
  action: () => void | Promise<void>,
): Promise<void> {
  if (options["verbose"] === true) {
    logger.configure({ level: "debug" });
  }

  try {
    await action();
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

function writeLine(text: string): void {
  process.stdout.write(`${text}\n`);
}

// =============================================================================
// Program
// =============================================================================

/**
 * Build the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program.configureHelp({
    styleTitle: (str) => chalk.bold.cyan(str),
    styleCommandText: (str) => chalk.green(str),
    styleCommandDescription: (str) => chalk.dim(str),
    styleDescriptionText: (str) => str,
    styleOptionText: (str) => chalk.yellow(str),
    styleArgumentText: (str) => chalk.magenta(str),
    styleSubcommandText: (str) => chalk.green(str),
  });

  program
    .name("librarian-env")
    .description("Environment configuration for the project librarian engine")
    .version("0.1.0")
    .enablePositionalOptions();

  withLoaderOptions(
    program
      .command("print")
      .description("Print the resolved variables"),
  )
    .addOption(
      new Option("-f, --format <format>", "Output format")
        .choices(ENV_FORMATS)
        .default("shell"),
    )
    .option("--runtime", "Include derived runtime variables")
    .action(async (options: Record<string, unknown>) => {
      await runAction(options, () => {
        const rawFormat = options["format"];
        const format =
          typeof rawFormat === "string" && isEnvFormat(rawFormat)
            ? rawFormat
            : "shell";

        const result = load({
          ...extractLoadOptions(options),
          target: {},
          includeRuntime: options["runtime"] === true,
        });

        writeLine(formatEnvironment(result.values, format));
      });
    });

  withLoaderOptions(
    program
      .command("list")
      .description("List every entry with its status and origin"),
  ).action(async (options: Record<string, unknown>) => {
    await runAction(options, () => {
      const { resolved } = resolveSource(extractLoadOptions(options));

      const rows = resolved.entries.map((entry) => [
        entry.name,
        entry.value,
        entry.enabled ? "active" : "inactive",
        entry.origin,
        entry.group ?? "",
      ]);

      writeLine(table(["NAME", "VALUE", "STATUS", "ORIGIN", "GROUP"], rows));
    });
  });

  withLoaderOptions(
    program.command("check").description("Validate the configuration"),
  ).action(async (options: Record<string, unknown>) => {
    await runAction(options, () => {
      const result = load({ ...extractLoadOptions(options), target: {} });
      const { config } = result;

      logger.success(
        `Configuration valid: ${String(result.applied.length)} variable(s) from ${result.sourcePath}`,
      );
      logger.info(
        `Reasoning engine: ${reasoningEngineResourceName(config) ?? "(not configured)"}`,
      );
      logger.info(
        `Staging bucket: ${stagingBucketUri(config) ?? "(not configured)"}`,
      );
      logger.info(`Firestore database: ${config.firestoreDatabase}`);
    });
  });

  withLoaderOptions(
    program
      .command("exec")
      .description("Run a command with the resolved variables")
      .argument("<command>", "Command to run")
      .argument("[args...]", "Arguments for the command")
      .passThroughOptions(),
  ).action(
    async (
      command: string,
      args: string[],
      options: Record<string, unknown>,
    ) => {
      await runAction(options, async () => {
        const env: NodeJS.ProcessEnv = { ...process.env };
        const result = load({ ...extractLoadOptions(options), target: env });
        logger.debug(
          `Running ${command} with ${String(result.applied.length)} variable(s)`,
        );

        process.exitCode = await runChild(command, args, env);
      });
    },
  );

  return program;
}

/**
 * Spawn a child with inherited stdio and wait for it.
 *
 * @returns The child's exit code, or 1 when it was killed by a signal
 */
function runChild(
  command: string,
  args: string[],
  env: NodeJS.ProcessEnv,
): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: "inherit", env });

    child.on("error", (err) => {
      reject(new Error(`Failed to start ${command}: ${err.message}`));
    });
    child.on("close", (code) => {
      resolve(code ?? 1);
    });
  });
}
