import * as core from "@actions/core";
import { awsEnvironment, executeAwsCommand } from "./aws.js";
import { executeCommand } from "./command.js";
import { resolveResourceNames, stackPrefix } from "./names.js";
import type { ResolvedSettings } from "./settings.js";
import type { StackSummary } from "./types.js";
import { parseJsonOutput } from "./utils.js";

/**
 * Stack states in which a stack exists and accepts an update
 */
export const deployableStackStatuses = [
  "CREATE_COMPLETE",
  "UPDATE_COMPLETE",
  "UPDATE_ROLLBACK_COMPLETE",
] as const;

export interface StackTarget {
  name: string;
  tag: string;
  exists: boolean;
}

export async function listStacks(
  settings: Pick<ResolvedSettings, "awsProfile" | "region">,
) {
  core.debug("Listing CloudFormation stacks");

  const { stdout } = await executeAwsCommand(
    [
      "cloudformation",
      "list-stacks",
      "--stack-status-filter",
      ...deployableStackStatuses,
      "--output",
      "json",
    ],
    settings,
    { silent: true },
  );

  return (
    parseJsonOutput<{ StackSummaries?: StackSummary[] }>(stdout, "stack list")
      .StackSummaries ?? []
  );
}

/**
 * Decide whether to create a new stack or update an existing one
 *
 * A stack named after the current tag is updated. Failing that, a single
 * stack carrying the project's stack prefix is adopted, together with the tag
 * embedded in its name; all resource names downstream derive from the
 * returned tag. Several candidates are ambiguous and abort the deployment.
 *
 * @param summaries Stacks that currently exist
 * @param project   Project name
 * @param tag       Deployment tag from the state file
 */
export function resolveStackTarget(
  summaries: readonly Pick<StackSummary, "StackName">[],
  project: string,
  tag: string,
): StackTarget {
  const { stack } = resolveResourceNames(project, tag);

  if (summaries.some(({ StackName }) => StackName === stack)) {
    return { name: stack, tag, exists: true };
  }

  const prefix = stackPrefix(project);
  const candidates = [
    ...new Set(
      summaries
        .map(({ StackName }) => StackName)
        .filter((name) => name.startsWith(prefix)),
    ),
  ];

  if (candidates.length > 1) {
    throw new Error(
      `Found multiple stacks with the prefix "${prefix}": ` +
        `${candidates.join(", ")}. Remove the stale stacks, or store the tag ` +
        "of the stack to update in the state file.",
    );
  }

  if (candidates.length === 1) {
    const [name] = candidates;
    const existingTag = name.slice(prefix.length);

    core.warning(
      `Stack "${name}" does not match the STACK_TAG "${tag}". Updating it ` +
        `with its own tag "${existingTag}" instead of creating "${stack}".`,
    );

    return { name, tag: existingTag, exists: true };
  }

  return { name: stack, tag, exists: false };
}

/**
 * Deploy the stack with the AWS CDK
 */
export async function deployStack(
  target: StackTarget,
  settings: Pick<ResolvedSettings, "awsProfile" | "region" | "cdkApp">,
) {
  const common = [
    "--require-approval",
    "never",
    "--app",
    settings.cdkApp,
    "--context",
    `stackTag=${target.tag}`,
  ];
  const args = target.exists
    ? ["cdk", "deploy", target.name, ...common]
    : ["cdk", "deploy", ...common, target.name];

  core.info(
    target.exists
      ? `Updating existing stack "${target.name}"`
      : `Creating stack "${target.name}"`,
  );

  await executeCommand("npx", args, { env: awsEnvironment(settings) });

  core.info(`Deployed stack ${target.name}`);
}

/**
 * Create the stack for the tag, or update the existing one
 *
 * @returns The stack that was deployed
 */
export async function deployOrUpdateStack(
  settings: Pick<
    ResolvedSettings,
    "awsProfile" | "region" | "cdkApp" | "project"
  >,
  tag: string,
): Promise<StackTarget> {
  const summaries = await listStacks(settings);
  const target = resolveStackTarget(summaries, settings.project, tag);

  await deployStack(target, settings);

  return target;
}
