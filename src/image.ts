import * as core from "@actions/core";
import { executeAwsCommand } from "./aws.js";
import { executeCommand } from "./command.js";
import type { ResolvedSettings, Settings } from "./settings.js";

/**
 * Resolve the image tag: the explicit `image-tag` input, or the short hash of
 * the checked out source revision.
 */
export async function resolveImageTag(settings: Pick<Settings, "imageTag">) {
  if (settings.imageTag) {
    return settings.imageTag;
  }

  const { stdout } = await executeCommand(
    "git",
    ["rev-parse", "--short", "HEAD"],
    { silent: true },
  );
  const revision = stdout.trim();

  if (!revision) {
    throw new Error(
      "Failed to resolve the current source revision: git produced no output",
    );
  }

  return revision;
}

/**
 * Extract the registry host from a repository URI, e.g.
 * `123456789012.dkr.ecr.eu-west-1.amazonaws.com`.
 */
export function registryHost(repositoryUri: string) {
  return repositoryUri.split("/")[0];
}

export async function loginToRegistry(
  repositoryUri: string,
  settings: Pick<ResolvedSettings, "awsProfile" | "region">,
) {
  const { stdout } = await executeAwsCommand(
    ["ecr", "get-login-password", "--region", settings.region],
    settings,
    { silent: true },
  );
  const password = stdout.trim();

  core.setSecret(password);

  await executeCommand(
    "docker",
    [
      "login",
      "--username",
      "AWS",
      "--password-stdin",
      registryHost(repositoryUri),
    ],
    { stdin: password },
  );
}

/**
 * Build the image and push it to the repository
 *
 * @param repositoryUri URI of the target repository
 * @param imageTag      Tag to publish the image under
 * @returns The pushed image reference
 */
export async function publishImage(
  repositoryUri: string,
  imageTag: string,
  settings: Pick<
    ResolvedSettings,
    "awsProfile" | "region" | "buildContext" | "dockerfile" | "imageName"
  >,
) {
  const localImage = `${settings.imageName}:${imageTag}`;
  const remoteImage = `${repositoryUri}:${imageTag}`;

  await loginToRegistry(repositoryUri, settings);

  await executeCommand("docker", [
    "build",
    "-t",
    localImage,
    "-f",
    settings.dockerfile,
    settings.buildContext,
  ]);
  await executeCommand("docker", ["tag", localImage, remoteImage]);
  await executeCommand("docker", ["push", remoteImage]);

  core.info(`Pushed image ${remoteImage}`);

  return remoteImage;
}
