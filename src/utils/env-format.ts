/**
 * Renderers for a variable mapping.
 */

/**
 * Supported output formats.
 */
export const ENV_FORMATS = ["shell", "dotenv", "json"] as const;

export type EnvFormat = (typeof ENV_FORMATS)[number];

/**
 * Narrow a string to a supported format.
 */
export function isEnvFormat(value: string): value is EnvFormat {
  return (ENV_FORMATS as readonly string[]).includes(value);
}

/**
 * Quote a value for a POSIX shell.
 */
export function shellQuote(value: string): string {
  return `'${value.replaceAll("'", `'\\''`)}'`;
}

/**
 * Quote a value for a dotenv file. Double quotes unless the value holds one
 * or a backslash (dotenv expands `\n` inside them), then single quotes, then
 * backticks.
 */
export function dotenvQuote(value: string): string {
  if (!value.includes('"') && !value.includes("\\")) {
    return `"${value.replaceAll("\n", "\\n")}"`;
  }
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  return `\`${value}\``;
}

/**
 * Render variables as `export` lines that a shell can evaluate.
 */
export function formatShell(values: Readonly<Record<string, string>>): string {
  return Object.entries(values)
    .map(([name, value]) => `export ${name}=${shellQuote(value)}`)
    .join("\n");
}

/**
 * Render variables as a dotenv file.
 */
export function formatDotenv(values: Readonly<Record<string, string>>): string {
  return Object.entries(values)
    .map(([name, value]) => `${name}=${dotenvQuote(value)}`)
    .join("\n");
}

/**
 * Render variables in the requested format.
 *
 * @param values - Variable name to value, in output order
 * @param format - Output format
 * @returns Rendered text without a trailing newline
 */
export function formatEnvironment(
  values: Readonly<Record<string, string>>,
  format: EnvFormat,
): string {
  switch (format) {
    case "shell":
      return formatShell(values);
    case "dotenv":
      return formatDotenv(values);
    case "json":
      return JSON.stringify(values, null, 2);
  }
}
