import * as core from "@actions/core";
import { executeAwsCommand } from "./aws.js";
import type { ResourceNames } from "./names.js";
import type { ResolvedSettings } from "./settings.js";
import type { StackTarget } from "./stack.js";
import {
  renderTaskDefinition,
  type TaskDefinitionDocument,
} from "./template.js";
import type { EcsService, TaskDefinition } from "./types.js";
import { parseJsonOutput } from "./utils.js";

type AwsSettings = Pick<ResolvedSettings, "awsProfile" | "region">;

export interface ResourceReference {
  arn: string;
  name: string;
}

export interface ServiceUpdateContext {
  image: string;
  imageTag: string;
  names: ResourceNames;
  repositoryUri: string;
  stack: StackTarget;
}

export interface ServiceUpdateResult {
  cluster: string;
  service: string;
  taskDefinitionArn: string;
  taskDefinitionFile: string;
}

/**
 * Extract the resource name from an ECS ARN. Handles both the short
 * (`service/name`) and the long (`service/cluster/name`) ARN formats.
 */
export function resourceName(arn: string) {
  return arn.split("/").pop() ?? arn;
}

function findByName(arns: readonly string[], name: string) {
  const arn = arns.find((candidate) => resourceName(candidate) === name);

  return arn ? { arn, name } : undefined;
}

export async function findCluster(
  name: string,
  settings: AwsSettings,
): Promise<ResourceReference> {
  const { stdout } = await executeAwsCommand(
    ["ecs", "list-clusters", "--output", "json"],
    settings,
    { silent: true },
  );
  const { clusterArns = [] } = parseJsonOutput<{ clusterArns?: string[] }>(
    stdout,
    "cluster list",
  );
  const cluster = findByName(clusterArns, name);

  if (!cluster) {
    throw new Error(
      `ECS cluster "${name}" not found. Make sure the stack names its ` +
        "cluster after the stackTag context value.",
    );
  }

  return cluster;
}

export async function findService(
  cluster: string,
  name: string,
  settings: AwsSettings,
): Promise<ResourceReference> {
  const { stdout } = await executeAwsCommand(
    ["ecs", "list-services", "--cluster", cluster, "--output", "json"],
    settings,
    { silent: true },
  );
  const { serviceArns = [] } = parseJsonOutput<{ serviceArns?: string[] }>(
    stdout,
    `service list of cluster "${cluster}"`,
  );
  const service = findByName(serviceArns, name);

  if (!service) {
    throw new Error(
      `ECS service "${name}" not found in cluster "${cluster}". Make sure ` +
        "the stack names its service after the stackTag context value.",
    );
  }

  return service;
}

/**
 * Register a new task definition revision
 *
 * A container definition list is passed as `--container-definitions`; a full
 * task definition is passed as `--cli-input-json`. The family is always set
 * explicitly and takes precedence over a family in the file.
 *
 * @returns The ARN of the new revision
 */
export async function registerTaskDefinition(
  family: string,
  file: string,
  document: TaskDefinitionDocument,
  settings: AwsSettings,
) {
  const { stdout } = await executeAwsCommand(
    [
      "ecs",
      "register-task-definition",
      "--family",
      family,
      Array.isArray(document) ? "--container-definitions" : "--cli-input-json",
      `file://${file}`,
      "--output",
      "json",
    ],
    settings,
    { silent: true },
  );
  const { taskDefinition } = parseJsonOutput<{
    taskDefinition?: TaskDefinition;
  }>(stdout, "task definition registration");

  if (!taskDefinition?.taskDefinitionArn) {
    throw new Error(
      `Failed to register task definition "${family}": The response ` +
        "contains no task definition ARN",
    );
  }

  core.info(`Registered task definition ${taskDefinition.taskDefinitionArn}`);

  return taskDefinition.taskDefinitionArn;
}

export async function updateService(
  cluster: string,
  service: string,
  taskDefinitionArn: string,
  settings: AwsSettings,
) {
  const { stdout } = await executeAwsCommand(
    [
      "ecs",
      "update-service",
      "--cluster",
      cluster,
      "--service",
      service,
      "--task-definition",
      taskDefinitionArn,
      "--output",
      "json",
    ],
    settings,
    { silent: true },
  );

  core.info(`Updated service "${service}" to ${taskDefinitionArn}`);

  return parseJsonOutput<{ service?: EcsService }>(
    stdout,
    `update result of service "${service}"`,
  ).service;
}

/**
 * Point the ECS service at a new task definition running the published image
 */
export async function updateEcsService(
  { image, imageTag, names, repositoryUri, stack }: ServiceUpdateContext,
  settings: Pick<
    ResolvedSettings,
    | "awsProfile"
    | "region"
    | "taskDefinitionOutput"
    | "taskDefinitionTemplate"
    | "variables"
  >,
): Promise<ServiceUpdateResult> {
  const cluster = await findCluster(names.cluster, settings);
  const service = await findService(cluster.name, names.service, settings);

  const variables = new Map(settings.variables);
  variables.set("ECR_REPOSITORY_URI", repositoryUri);
  variables.set("IMAGE_TAG", imageTag);
  variables.set("IMAGE", image);
  variables.set("AWS_REGION", settings.region);
  variables.set("STACK_TAG", stack.tag);
  variables.set("STACK_NAME", stack.name);
  variables.set("CLUSTER_NAME", cluster.name);
  variables.set("SERVICE_NAME", service.name);
  variables.set("TASK_FAMILY", names.taskFamily);

  const document = await renderTaskDefinition(
    settings.taskDefinitionTemplate,
    settings.taskDefinitionOutput,
    variables,
  );
  const taskDefinitionArn = await registerTaskDefinition(
    names.taskFamily,
    settings.taskDefinitionOutput,
    document,
    settings,
  );

  await updateService(cluster.name, service.name, taskDefinitionArn, settings);

  return {
    cluster: cluster.name,
    service: service.name,
    taskDefinitionArn,
    taskDefinitionFile: settings.taskDefinitionOutput,
  };
}
