/**
 * @see https://docs.aws.amazon.com/AmazonECR/latest/APIReference/API_Repository.html
 */
export interface Repository {
  repositoryArn: string;
  registryId: string;
  repositoryName: string;
  repositoryUri: string;
  createdAt?: string;

  [key: string]: unknown;
}

/**
 * @see https://docs.aws.amazon.com/AWSCloudFormation/latest/APIReference/API_StackSummary.html
 */
export interface StackSummary {
  StackId?: string;
  StackName: string;
  StackStatus: string;
  CreationTime?: string;
  LastUpdatedTime?: string;

  [key: string]: unknown;
}

export type RolloutState = "COMPLETED" | "FAILED" | "IN_PROGRESS";

/**
 * @see https://docs.aws.amazon.com/AmazonECS/latest/APIReference/API_Deployment.html
 */
export interface EcsDeployment {
  id: string;
  status: "PRIMARY" | "ACTIVE" | "INACTIVE";
  taskDefinition: string;
  desiredCount: number;
  runningCount: number;
  pendingCount?: number;
  rolloutState?: RolloutState;
  rolloutStateReason?: string;

  [key: string]: unknown;
}

/**
 * @see https://docs.aws.amazon.com/AmazonECS/latest/APIReference/API_Service.html
 */
export interface EcsService {
  serviceArn: string;
  serviceName: string;
  clusterArn: string;
  status: string;
  taskDefinition: string;
  desiredCount: number;
  runningCount: number;
  deployments: EcsDeployment[];

  [key: string]: unknown;
}

export interface EcsFailure {
  arn?: string;
  reason?: string;
  detail?: string;
}

/**
 * @see https://docs.aws.amazon.com/AmazonECS/latest/APIReference/API_TaskDefinition.html
 */
export interface TaskDefinition {
  taskDefinitionArn: string;
  family: string;
  revision: number;

  [key: string]: unknown;
}
