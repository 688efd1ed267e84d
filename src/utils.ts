import * as core from "@actions/core";
import { access, constants } from "node:fs/promises";

/**
 * Check if a file or directory exists
 *
 * @param path The path to check
 */
export async function exists(path: string) {
  try {
    await access(path, constants.F_OK);
  } catch {
    return false;
  }

  return true;
}

/**
 * Sleep for the specified number of milliseconds
 */
export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Format a date as `YYYY-MM-DDTHH:MM:SS+hhmm` in local time, the same shape
 * `date +%Y-%m-%dT%H:%M:%S%z` produces.
 */
export function formatTimestamp(date: Date = new Date()) {
  const pad = (value: number) => String(Math.abs(value)).padStart(2, "0");
  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? "+" : "-";

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `${sign}${pad(Math.floor(Math.abs(offset) / 60))}${pad(Math.abs(offset) % 60)}`
  );
}

/**
 * Log a timestamped progress line
 */
export function log(message: string) {
  core.info(`[${formatTimestamp()}]: ${message}`);
}

/**
 * Parse the JSON output of a CLI command
 *
 * @param output      Raw stdout of the command
 * @param description What the output describes, used in error messages
 */
export function parseJsonOutput<T>(output: string, description: string): T {
  if (!output.trim()) {
    throw new Error(`Failed to parse ${description}: No content produced`);
  }

  try {
    return JSON.parse(output) as T;
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);

    throw new Error(`Failed to parse ${description}: ${message}`, { cause });
  }
}

/**
 * Merge environment overrides over the current process environment, dropping
 * unset entries.
 */
export function mergeEnvironment(
  overrides: Record<string, string>,
  base: NodeJS.ProcessEnv = process.env,
) {
  const environment: Record<string, string> = {};

  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) {
      environment[key] = value;
    }
  }

  return { ...environment, ...overrides };
}

/**
 * Interpolate a string with variables from a Map.
 *
 * This function interpolates a string with variables following the Bash-like
 * syntax:
 *
 * - Default value substitution: `${VARIABLE_NAME:-default}` or `${VARIABLE_NAME-default}`
 *   If the variable is missing, it returns the default value.
 * - Alternative value substitution: `${VARIABLE_NAME:+default}` or `${VARIABLE_NAME+default}`
 *   If the variable is present, it returns the default value.
 * - Required value substitution: `${VARIABLE_NAME:?default}` or `${VARIABLE_NAME?default}`
 *   If the variable is missing, it throws an error with the default value as the message.
 * - If the variable is present, it returns the variable's value.
 *
 * Further, it supports both `${VARIABLE_NAME}` and `$VARIABLE_NAME` formats.
 * `$$` stands for a literal dollar sign, so `$${VARIABLE_NAME}` yields the
 * text `${VARIABLE_NAME}`.
 * The string is scanned once from left to right; substituted values are
 * inserted verbatim and never scanned again. A variable that is used without
 * an operator and is not defined in the map is an error.
 *
 * @param str The string to interpolate
 * @param variables A Map of variable names to their values
 */
export function interpolateString(
  str: string,
  variables: Map<string, string>,
): string {
  type Operator = ":-" | ":+" | ":?" | "?" | "-" | "+";

  function resolveMatch(
    value: string | undefined,
    operator: Operator | undefined,
    defaultValue: string | undefined,
  ): string | undefined {
    if (
      (operator === "-" && value === undefined) ||
      (operator === ":-" && !value) ||
      (operator === "+" && value !== undefined) ||
      (operator === ":+" && value)
    ) {
      return defaultValue ?? "";
    }

    if (operator === "+" || operator === ":+") {
      return "";
    }

    if (
      (operator === "?" && value === undefined) ||
      (operator === ":?" && !value)
    ) {
      throw new Error(`Missing required value: ${defaultValue}`);
    }

    return value;
  }

  function isOperator(value: string | undefined): value is Operator {
    return (
      value === ":-" ||
      value === ":+" ||
      value === ":?" ||
      value === "?" ||
      value === "-" ||
      value === "+"
    );
  }

  // Matches `$$`, `$VAR`, `${VAR}` and `${VAR<operator>default}`
  const pattern =
    /\$\$|\$(?:([a-zA-Z_][a-zA-Z0-9_]*)|\{([a-zA-Z_][a-zA-Z0-9_]*)(?:(:?[-+?])([^{}]*))?\})/g;

  return str.replace(
    pattern,
    (
      _token: string,
      key1: string | undefined,
      key2: string | undefined,
      operator: string | undefined,
      defaultValue: string | undefined,
    ) => {
      const key = key1 ?? key2;

      if (key === undefined) {
        return "$";
      }

      let replacement: string | undefined;

      try {
        replacement = resolveMatch(
          variables.get(key),
          isOperator(operator) ? operator : undefined,
          defaultValue,
        );
      } catch (cause) {
        const message = cause instanceof Error ? cause.message : String(cause);

        throw new Error(`Failed to resolve variable ${key}: ${message}`, {
          cause,
        });
      }

      if (replacement === undefined) {
        throw new Error(`Variable ${key} is required but not defined`);
      }

      return replacement;
    },
  );
}
