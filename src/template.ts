import * as core from "@actions/core";
import { load } from "js-yaml";
import { readFile, writeFile } from "node:fs/promises";
import { extname } from "node:path";
import { interpolateString } from "./utils.js";

export type ContainerDefinition = {
  name: string;
  image?: string;
  [key: string]: unknown;
};

export type TaskDefinitionInput = {
  containerDefinitions: ContainerDefinition[];
  [key: string]: unknown;
};

/**
 * Either a list of container definitions, or a complete task definition as
 * accepted by `register-task-definition --cli-input-json`
 */
export type TaskDefinitionDocument = ContainerDefinition[] | TaskDefinitionInput;

/**
 * Substitute all placeholders in a template string
 *
 * Each `${NAME}` or `$NAME` token is replaced exactly once by its value; a
 * token without a value is an error, so the result contains no unresolved
 * placeholders. `$$` yields a literal dollar sign.
 */
export function renderTemplate(
  content: string,
  variables: Map<string, string>,
) {
  return interpolateString(content, variables);
}

/**
 * Substitute placeholders in every string value of a parsed document
 *
 * Values are inserted after parsing, so quotes, backslashes and line breaks
 * in them end up as part of the string instead of the document structure.
 * Object keys are left as they are.
 */
export function renderDocument(
  document: unknown,
  variables: Map<string, string>,
): unknown {
  return JSON.parse(
    JSON.stringify(document, (_, value: unknown) =>
      typeof value === "string" ? renderTemplate(value, variables) : value,
    ),
  );
}

/**
 * Render a task definition template and write the result as JSON
 *
 * The template is left untouched, so subsequent deployments render from the
 * same placeholders again.
 *
 * @param templatePath JSON or YAML template
 * @param outputPath   Path to write the rendered JSON to
 * @param variables    Placeholder values
 */
export async function renderTaskDefinition(
  templatePath: string,
  outputPath: string,
  variables: Map<string, string>,
): Promise<TaskDefinitionDocument> {
  core.debug(`Rendering task definition template "${templatePath}"`);

  let content: string;

  try {
    content = await readFile(templatePath, "utf8");
  } catch (cause) {
    throw new Error(
      `Failed to read task definition template "${templatePath}": ${cause}`,
      { cause },
    );
  }

  const template = parseTemplate(content, templatePath);
  let rendered: unknown;

  try {
    rendered = renderDocument(template, variables);
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);

    throw new Error(
      `Failed to render task definition template "${templatePath}": ${message}`,
      { cause },
    );
  }

  const document = validateTaskDefinition(rendered, templatePath);

  await writeFile(outputPath, JSON.stringify(document, null, 2) + "\n", "utf8");
  core.info(`Rendered task definition to "${outputPath}"`);

  return document;
}

function parseTemplate(content: string, templatePath: string): unknown {
  const extension = extname(templatePath).toLowerCase();

  try {
    if (extension === ".yaml" || extension === ".yml") {
      return load(content, { filename: templatePath, json: true });
    }

    return JSON.parse(content);
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);

    throw new Error(
      `Failed to parse task definition template "${templatePath}": ${message}`,
      { cause },
    );
  }
}

export function validateTaskDefinition(
  value: unknown,
  source: string,
): TaskDefinitionDocument {
  if (Array.isArray(value)) {
    if (value.length === 0) {
      throw new Error(
        `Task definition "${source}" contains no container definitions`,
      );
    }

    if (!value.every(isContainerDefinition)) {
      throw new Error(
        `Task definition "${source}" contains container definitions without a name`,
      );
    }

    return value;
  }

  if (isRecord(value)) {
    const definitions = value.containerDefinitions;

    if (
      Array.isArray(definitions) &&
      definitions.length > 0 &&
      definitions.every(isContainerDefinition)
    ) {
      return { ...value, containerDefinitions: definitions };
    }

    throw new Error(
      `Task definition "${source}" must have a non-empty ` +
        `"containerDefinitions" list of named containers`,
    );
  }

  throw new Error(
    `Task definition "${source}" must be a list of container definitions ` +
      "or a task definition object",
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isContainerDefinition(value: unknown): value is ContainerDefinition {
  return isRecord(value) && typeof value.name === "string";
}
