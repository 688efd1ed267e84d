import * as core from "@actions/core";
import { executeAwsCommand } from "./aws.js";
import { CommandError } from "./errors.js";
import type { Settings } from "./settings.js";
import type { Repository } from "./types.js";
import { parseJsonOutput } from "./utils.js";

type RegistrySettings = Pick<Readonly<Settings>, "awsProfile" | "region">;

/**
 * Describe an ECR repository
 *
 * @param name Name of the repository
 * @returns The repository, or `null` if it does not exist
 */
export async function describeRepository(
  name: string,
  settings: RegistrySettings,
): Promise<Repository | null> {
  const args: [string, ...string[]] = [
    "ecr",
    "describe-repositories",
    "--repository-names",
    name,
    "--output",
    "json",
  ];
  const result = await executeAwsCommand(args, settings, {
    silent: true,
    allowFailure: true,
  });

  if (result.exitCode !== 0) {
    if (result.stderr.includes("RepositoryNotFoundException")) {
      return null;
    }

    throw new CommandError("aws", args, result.exitCode, result.stderr);
  }

  const { repositories } = parseJsonOutput<{ repositories?: Repository[] }>(
    result.stdout,
    `description of repository "${name}"`,
  );

  return repositories?.[0] ?? null;
}

export async function createRepository(
  name: string,
  settings: RegistrySettings,
): Promise<Repository> {
  const { stdout } = await executeAwsCommand(
    ["ecr", "create-repository", "--repository-name", name, "--output", "json"],
    settings,
    { silent: true },
  );
  const { repository } = parseJsonOutput<{ repository?: Repository }>(
    stdout,
    `creation result of repository "${name}"`,
  );

  if (!repository?.repositoryUri) {
    throw new Error(
      `Failed to create repository "${name}": The response contains no repository URI`,
    );
  }

  return repository;
}

/**
 * Ensure an ECR repository exists
 *
 * Queries the repository first and only creates it if it is absent, so
 * repeated runs never attempt to create it twice.
 *
 * @param name Name of the repository
 * @returns The existing or newly created repository
 */
export async function ensureRepository(
  name: string,
  settings: RegistrySettings,
): Promise<Repository> {
  core.info(`Checking if the ECR repository "${name}" exists...`);

  const existing = await describeRepository(name, settings);

  if (existing) {
    core.info(`ECR repository "${name}" already exists.`);

    return existing;
  }

  core.info("ECR repository does not exist. Creating repository...");
  const repository = await createRepository(name, settings);
  core.info(`ECR repository "${name}" created.`);

  return repository;
}
