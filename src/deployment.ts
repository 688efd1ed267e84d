import { getConfiguredRegion } from "./aws.js";
import { publishImage, resolveImageTag } from "./image.js";
import { monitorRollout } from "./monitoring.js";
import { resolveResourceNames } from "./names.js";
import { ensureRepository } from "./registry.js";
import { type ServiceUpdateResult, updateEcsService } from "./service.js";
import type { ResolvedSettings, Settings } from "./settings.js";
import { deployOrUpdateStack, type StackTarget } from "./stack.js";
import { loadOrCreateStackTag } from "./tag.js";
import { log } from "./utils.js";

export interface DeploymentResult extends ServiceUpdateResult {
  image: string;
  imageTag: string;
  repositoryUri: string;
  stack: StackTarget;
  stackTag: string;
}

/**
 * Main deployment function
 *
 * Runs every step in order; the first failure aborts the deployment without
 * rolling back what has already been applied. Running it again resumes, as
 * every step either checks for existing resources or is idempotent.
 */
export async function deploy(
  settings: Readonly<Settings>,
): Promise<DeploymentResult> {
  log("Deploying the infrastructure...");

  const { tag: stackTag } = await loadOrCreateStackTag(settings.tagFile);
  const resolved: Readonly<ResolvedSettings> = {
    ...settings,
    region: settings.region ?? (await getConfiguredRegion(settings)),
  };

  log("Checking if the ECR repository exists...");
  const { repository: repositoryName } = resolveResourceNames(
    settings.project,
    stackTag,
  );
  const { repositoryUri } = await ensureRepository(repositoryName, resolved);
  const imageTag = await resolveImageTag(resolved);

  log("Building and pushing the Docker image to ECR...");
  const image = await publishImage(repositoryUri, imageTag, resolved);

  log("Deploying or updating the CloudFormation stack...");
  const stack = await deployOrUpdateStack(resolved, stackTag);

  log("Updating the ECS service with the new Docker image...");
  const update = await updateEcsService(
    {
      image,
      imageTag,
      names: resolveResourceNames(settings.project, stack.tag),
      repositoryUri,
      stack,
    },
    resolved,
  );

  if (resolved.monitor) {
    await monitorRollout(update.cluster, update.service, resolved);
  }

  log("Infrastructure deployed successfully");

  return { ...update, image, imageTag, repositoryUri, stack, stackTag };
}
