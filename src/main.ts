import process from "node:process";
import { DefaultArtifactClient } from "@actions/artifact";
import * as core from "@actions/core";
import { type DeploymentResult, deploy } from "./deployment.js";
import { resolveExitStatus } from "./errors.js";
import { parseSettings } from "./settings.js";
import { formatTimestamp } from "./utils.js";

export async function run() {
  let result: DeploymentResult | undefined;

  try {
    const settings = parseSettings(process.env);
    result = await deploy(settings);

    core.setOutput("stack-tag", result.stack.tag);
    core.setOutput("stack-name", result.stack.name);
    core.setOutput("image", result.image);
    core.setOutput("cluster", result.cluster);
    core.setOutput("service", result.service);
    core.setOutput("task-definition-arn", result.taskDefinitionArn);
    core.setOutput("status", "success");
  } catch (error) {
    const status = resolveExitStatus(error);

    core.error(
      `[${formatTimestamp()}]: An error occurred. Exiting with status ${status}`,
    );

    if (error instanceof Error) {
      core.setFailed(error);
    } else {
      core.setFailed(`An unknown error occurred: ${error}`);
    }

    core.setOutput("status", "failure");
    process.exitCode = status;
  }

  if (!result || process.env.GITHUB_ACTIONS !== "true") {
    return;
  }

  try {
    await storeTaskDefinitionArtifact(result.taskDefinitionFile);
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);
    core.warning(
      new Error(`Failed to store task definition artifact: ${message}`, {
        cause,
      }),
    );
  }
}

async function storeTaskDefinitionArtifact(path: string) {
  const artifactClient = new DefaultArtifactClient();

  try {
    await artifactClient.uploadArtifact("task-definition", [path], ".", {
      retentionDays: 30,
    });
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);
    throw new Error(`Failed to upload task definition artifact: ${message}`, {
      cause,
    });
  }
}
