import * as core from "@actions/core";
import { executeAwsCommand } from "./aws.js";
import type { ResolvedSettings } from "./settings.js";
import type { EcsFailure, EcsService } from "./types.js";
import { parseJsonOutput, sleep } from "./utils.js";

type MonitorSettings = Pick<
  ResolvedSettings,
  "awsProfile" | "region" | "monitor" | "monitorInterval" | "monitorTimeout"
>;

export async function describeService(
  cluster: string,
  service: string,
  settings: Pick<ResolvedSettings, "awsProfile" | "region">,
): Promise<EcsService> {
  const { stdout } = await executeAwsCommand(
    [
      "ecs",
      "describe-services",
      "--cluster",
      cluster,
      "--services",
      service,
      "--output",
      "json",
    ],
    settings,
    { silent: true },
  );
  const { services = [], failures = [] } = parseJsonOutput<{
    services?: EcsService[];
    failures?: EcsFailure[];
  }>(stdout, `description of service "${service}"`);

  const [description] = services;

  if (!description) {
    const reason = failures[0]?.reason ?? "not found";

    throw new Error(`Failed to describe service "${service}": ${reason}`);
  }

  return description;
}

/**
 * Monitor the service rollout
 *
 * This function polls the service until its primary deployment has rolled
 * out, the rollout fails, or the timeout passes.
 *
 * @param cluster  Cluster the service runs in
 * @param service  Service to monitor
 * @param settings Deployment settings
 */
export async function monitorRollout(
  cluster: string,
  service: string,
  settings: MonitorSettings,
) {
  if (!settings.monitor) {
    core.info("Post-Deployment Monitoring is disabled");

    return;
  }

  core.info(`Monitoring Service "${service}" for Post-Deployment Issues`);

  const interval = durationInMilliseconds(
    "monitor interval",
    settings.monitorInterval,
  );
  const deadline =
    Date.now() + durationInMilliseconds("monitor timeout", settings.monitorTimeout);

  while (true) {
    const description = await describeService(cluster, service, settings);

    if (isRolloutComplete(description)) {
      break;
    }

    if (Date.now() + interval > deadline) {
      throw new Error("Deployment timed out");
    }

    await sleep(interval);
  }

  core.info(`Service "${service}" has been deployed successfully`);
}

function durationInMilliseconds(description: string, seconds: number) {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(
      `Invalid ${description}: expected a positive number of seconds, got ${seconds}`,
    );
  }

  return seconds * 1_000;
}

/**
 * Check if the primary deployment of a service has rolled out
 *
 * Services with the deployment circuit breaker report a rollout state; for all
 * others, the deployment is complete once it is the only one left and all of
 * its desired tasks are running.
 *
 * @throws If the rollout failed, or the service has no primary deployment
 */
export function isRolloutComplete(
  service: Pick<EcsService, "serviceName" | "deployments">,
) {
  const name = service.serviceName;
  const primary = service.deployments.find(
    ({ status }) => status === "PRIMARY",
  );

  if (!primary) {
    throw new Error(`Service "${name}" has no primary deployment`);
  }

  if (primary.rolloutState === "FAILED") {
    throw new Error(
      `Rollout of service "${name}" failed: ` +
        (primary.rolloutStateReason ?? "Unknown failure reason"),
      { cause: primary },
    );
  }

  if (primary.rolloutState === "COMPLETED") {
    core.debug(`Rollout of service "${name}" is complete`);

    return true;
  }

  if (primary.rolloutState === undefined) {
    const converged =
      service.deployments.length === 1 &&
      primary.runningCount === primary.desiredCount;

    core.debug(
      `Service "${name}": ${primary.runningCount}/${primary.desiredCount} ` +
        `tasks running, ${service.deployments.length} deployment(s) active`,
    );

    return converged;
  }

  core.info(`Rollout of service "${name}" is still in progress`);

  return false;
}
