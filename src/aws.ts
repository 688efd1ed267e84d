import * as core from "@actions/core";
import {
  type CommandOptions,
  type CommandResult,
  executeCommand,
} from "./command.js";
import type { Settings } from "./settings.js";

type AwsSettings = Pick<Readonly<Settings>, "awsProfile" | "region">;

/**
 * Environment overrides that select the AWS profile and region for the `aws`
 * and `cdk` command line tools
 */
export function awsEnvironment({ awsProfile, region }: AwsSettings) {
  const environment: Record<string, string> = {};

  if (awsProfile) {
    environment.AWS_PROFILE = awsProfile;
  }

  if (region) {
    environment.AWS_REGION = region;
    environment.AWS_DEFAULT_REGION = region;
  }

  return environment;
}

/**
 * Execute an AWS CLI command with the configured profile and region
 */
export async function executeAwsCommand(
  args: [string, ...string[]],
  settings: AwsSettings,
  options: Omit<CommandOptions, "env"> = {},
): Promise<CommandResult> {
  return executeCommand("aws", args, {
    ...options,
    env: awsEnvironment(settings),
  });
}

/**
 * Resolve the region configured for the AWS CLI profile
 *
 * @throws If no region is configured
 */
export async function getConfiguredRegion(settings: AwsSettings) {
  core.debug("Resolving the region from the AWS CLI configuration");

  const { exitCode, stdout } = await executeAwsCommand(
    ["configure", "get", "region"],
    settings,
    { silent: true, allowFailure: true },
  );
  const region = stdout.trim();

  if (exitCode !== 0 || !region) {
    throw new Error(
      "No AWS region configured. Set the aws-region input, the AWS_REGION " +
        "environment variable, or a region for the selected AWS CLI profile.",
    );
  }

  return region;
}
