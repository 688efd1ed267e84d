export interface ResourceNames {
  cluster: string;
  repository: string;
  service: string;
  stack: string;
  taskFamily: string;
}

/**
 * Derive the names of all cloud resources of a deployment
 *
 * The infrastructure stack receives the tag as `stackTag` context and names
 * its resources the same way, so every later step can address them directly
 * instead of searching for them.
 *
 * @param project Project name, used as a prefix
 * @param tag     Deployment tag
 */
export function resolveResourceNames(
  project: string,
  tag: string,
): ResourceNames {
  return {
    cluster: `${project}-ecs-cluster-${tag}`,
    repository: `${project}-ecr-repository`,
    service: `${project}-fargate-service-${tag}`,
    stack: `${stackPrefix(project)}${tag}`,
    taskFamily: `${project}-task-definition-${tag}`,
  };
}

export function stackPrefix(project: string) {
  return `${project}-stack-`;
}

/**
 * Check a project name against the naming rules of the resources it prefixes
 *
 * ECR repository names are lowercase, and CloudFormation stack names start
 * with a letter; dashes may only separate alphanumeric groups.
 */
export function validateProjectName(project: string) {
  if (!/^[a-z][a-z0-9]*(?:-[a-z0-9]+)*$/.test(project)) {
    throw new Error(
      `Invalid project name "${project}": use lowercase letters, digits and ` +
        "single dashes, starting with a letter",
    );
  }

  return project;
}
