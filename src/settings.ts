import { basename, dirname, extname, join } from "node:path";
import { debug } from "node:util";
import { getBooleanInput, getInput } from "@actions/core";
import { validateProjectName } from "./names.js";

/**
 * Deployment settings
 */
export interface Settings {
  awsProfile?: string;
  buildContext: string;
  cdkApp: string;
  dockerfile: string;
  imageName: string;
  imageTag?: string;
  monitor: boolean;
  monitorInterval: number;
  monitorTimeout: number;
  project: string;
  region?: string;
  tagFile: string;
  taskDefinitionOutput: string;
  taskDefinitionTemplate: string;
  variables: Map<string, string>;
}

/**
 * Settings after the AWS region has been resolved
 */
export type ResolvedSettings = Settings & { region: string };

export function defineSettings<T extends Settings>(settings: T) {
  return settings;
}

/**
 * Parse settings from GitHub Actions inputs
 */
export function parseSettings(env: NodeJS.ProcessEnv) {
  debug("Parsing settings from inputs");

  const project = validateProjectName(
    inferProjectName(getInput("project"), env),
  );
  const taskDefinitionTemplate =
    getInput("task-definition") || "ecs-container-definitions.json";

  return defineSettings({
    awsProfile: getInput("aws-profile") || env.AWS_PROFILE || undefined,
    buildContext: getInput("build-context") || ".",
    cdkApp: getInput("cdk-app") || "npx ts-node src/main.ts",
    dockerfile: getInput("dockerfile") || "Dockerfile",
    imageName: getInput("image-name") || `${project}-server`,
    imageTag: getInput("image-tag") || undefined,
    monitor: getBooleanSetting("monitor", false),
    monitorInterval: getDurationSetting("monitor-interval", 5),
    monitorTimeout: getDurationSetting("monitor-timeout", 300),
    project,
    region:
      getInput("aws-region") ||
      env.AWS_REGION ||
      env.AWS_DEFAULT_REGION ||
      undefined,
    tagFile: getInput("tag-file") || "stack-tag.txt",
    taskDefinitionOutput:
      getInput("task-definition-output") ||
      inferRenderedPath(taskDefinitionTemplate),
    taskDefinitionTemplate,
    variables: parseVariableInput(getInput("variables") ?? ""),
  });
}

function inferProjectName(name: string | undefined, env: NodeJS.ProcessEnv) {
  if (name) {
    return name;
  }

  const repository = env.GITHUB_REPOSITORY?.split("/").pop() ?? "";

  // Repository names may be mixed case and contain dots or underscores
  return (
    repository
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, "-")
      .replace(/^-+|-+$/g, "") || "app"
  );
}

function inferRenderedPath(template: string) {
  return join(
    dirname(template),
    `${basename(template, extname(template))}.rendered.json`,
  );
}

function getDurationSetting(name: string, fallback: number) {
  const input = getInput(name);

  if (!input) {
    return fallback;
  }

  const value = Number(input);

  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(
      `Invalid value for input "${name}": expected a positive number of ` +
        `seconds, got "${input}"`,
    );
  }

  return value;
}

function getBooleanSetting(name: string, fallback: boolean) {
  return getInput(name) ? getBooleanInput(name) : fallback;
}

/**
 * Parse placeholder values given as a JSON object or as KEY=VALUE lines, with
 * support for `KEY<<DELIMITER` heredocs.
 */
export function parseVariableInput(input: string): Map<string, string> {
  const variables = new Map<string, string>();

  if (!input) {
    return variables;
  }

  const trimmedInput = input.trim();

  if (isJsonLike(trimmedInput)) {
    let parsed: unknown;

    try {
      parsed = JSON.parse(trimmedInput);
    } catch {
      // Not JSON after all; fall through to KEY=VALUE parsing
      parsed = undefined;
    }

    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === "string") {
          variables.set(key, value);
        } else if (value !== null && value !== undefined) {
          variables.set(key, String(value));
        }
      }

      return variables;
    }
  }

  const lines = input.split("\n");
  let i = 0;

  while (i < lines.length) {
    const line = lines[i].trim();

    if (!line || line.startsWith("#")) {
      i++;
      continue;
    }

    const heredocMatch = line.match(
      /^([A-Za-z_][A-Za-z0-9_]*)<<([A-Za-z0-9_]+)$/,
    );

    if (heredocMatch) {
      const [, key, delimiter] = heredocMatch;
      const contentLines: string[] = [];

      i++;

      while (i < lines.length && lines[i] !== delimiter) {
        contentLines.push(lines[i]);
        i++;
      }

      variables.set(key, contentLines.join("\n"));

      // Skip the delimiter line
      i++;
    } else {
      const [key, ...parts] = line.split("=").map((part) => part.trim());
      variables.set(key, parts.join("="));
      i++;
    }
  }

  return variables;
}

function isJsonLike(input: string): boolean {
  if (!input.startsWith("{") || !input.endsWith("}")) {
    return false;
  }

  // KEY={...} style lines without any colon are not JSON
  if (input.includes("=") && !input.includes(":")) {
    return false;
  }

  return true;
}
