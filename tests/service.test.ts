import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveResourceNames } from "../src/names.js";
import {
  findCluster,
  findService,
  registerTaskDefinition,
  resourceName,
  updateEcsService,
} from "../src/service.js";
import { executedCommands, respondToCommands } from "./helpers/exec.js";

vi.mock("@actions/core");
vi.mock("@actions/exec");

const account = "arn:aws:ecs:eu-west-1:123456789012";
const settings = { awsProfile: undefined, region: "eu-west-1" };
const taskDefinitionArn = `${account}:task-definition/shop-task-definition-1a2b3c4d:7`;

describe("service", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("resourceName", () => {
    it("should handle short and long ARN formats", () => {
      expect(resourceName(`${account}:cluster/shop-ecs-cluster-1a2b3c4d`)).toBe(
        "shop-ecs-cluster-1a2b3c4d",
      );
      expect(resourceName(`${account}:service/shop-fargate-service-1a`)).toBe(
        "shop-fargate-service-1a",
      );
      expect(
        resourceName(`${account}:service/shop-cluster/shop-fargate-service-1a`),
      ).toBe("shop-fargate-service-1a");
    });
  });

  describe("findCluster", () => {
    it("should match the cluster name exactly", async () => {
      respondToCommands(() => ({
        stdout: JSON.stringify({
          clusterArns: [
            `${account}:cluster/shop-ecs-cluster-1a2b3c4d-staging`,
            `${account}:cluster/shop-ecs-cluster-1a2b3c4d`,
          ],
        }),
      }));

      await expect(
        findCluster("shop-ecs-cluster-1a2b3c4d", settings),
      ).resolves.toEqual({
        arn: `${account}:cluster/shop-ecs-cluster-1a2b3c4d`,
        name: "shop-ecs-cluster-1a2b3c4d",
      });
    });

    it("should fail if the cluster does not exist", async () => {
      respondToCommands(() => ({ stdout: JSON.stringify({ clusterArns: [] }) }));

      await expect(
        findCluster("shop-ecs-cluster-1a2b3c4d", settings),
      ).rejects.toThrow('ECS cluster "shop-ecs-cluster-1a2b3c4d" not found.');
    });
  });

  describe("findService", () => {
    it("should find the service within the cluster", async () => {
      respondToCommands(() => ({
        stdout: JSON.stringify({
          serviceArns: [
            `${account}:service/shop-ecs-cluster-1a2b3c4d/shop-fargate-service-1a2b3c4d`,
          ],
        }),
      }));

      await expect(
        findService(
          "shop-ecs-cluster-1a2b3c4d",
          "shop-fargate-service-1a2b3c4d",
          settings,
        ),
      ).resolves.toMatchObject({ name: "shop-fargate-service-1a2b3c4d" });
      expect(executedCommands()).toEqual([
        "aws ecs list-services --cluster shop-ecs-cluster-1a2b3c4d --output json",
      ]);
    });

    it("should fail if the service does not exist", async () => {
      respondToCommands(() => ({ stdout: "{}" }));

      await expect(
        findService("shop-ecs-cluster-1a2b3c4d", "web", settings),
      ).rejects.toThrow(
        'ECS service "web" not found in cluster "shop-ecs-cluster-1a2b3c4d".',
      );
    });
  });

  describe("registerTaskDefinition", () => {
    const response = JSON.stringify({
      taskDefinition: {
        taskDefinitionArn,
        family: "shop-task-definition-1a2b3c4d",
        revision: 7,
      },
    });

    it("should register container definitions", async () => {
      respondToCommands(() => ({ stdout: response }));

      await expect(
        registerTaskDefinition(
          "shop-task-definition-1a2b3c4d",
          "out.json",
          [{ name: "server" }],
          settings,
        ),
      ).resolves.toBe(taskDefinitionArn);
      expect(executedCommands()).toEqual([
        "aws ecs register-task-definition --family shop-task-definition-1a2b3c4d " +
          "--container-definitions file://out.json --output json",
      ]);
    });

    it("should register full task definitions", async () => {
      respondToCommands(() => ({ stdout: response }));

      await registerTaskDefinition(
        "shop-task-definition-1a2b3c4d",
        "out.json",
        { containerDefinitions: [{ name: "server" }] },
        settings,
      );

      expect(executedCommands()).toEqual([
        "aws ecs register-task-definition --family shop-task-definition-1a2b3c4d " +
          "--cli-input-json file://out.json --output json",
      ]);
    });

    it("should fail without a task definition ARN", async () => {
      respondToCommands(() => ({ stdout: "{}" }));

      await expect(
        registerTaskDefinition("family", "out.json", [{ name: "a" }], settings),
      ).rejects.toThrow(
        'Failed to register task definition "family": The response contains no task definition ARN',
      );
    });
  });

  describe("updateEcsService", () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), "service-"));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it("should register a new revision and point the service at it", async () => {
      const template = join(directory, "containers.json");
      const output = join(directory, "containers.rendered.json");
      const repositoryUri =
        "123456789012.dkr.ecr.eu-west-1.amazonaws.com/shop-ecr-repository";

      await writeFile(
        template,
        JSON.stringify([
          {
            name: "server",
            image: "${ECR_REPOSITORY_URI}:${IMAGE_TAG}",
            environment: [
              { name: "REGION", value: "${AWS_REGION}" },
              { name: "SERVICE", value: "${SERVICE_NAME}" },
              { name: "LOG_LEVEL", value: "${LOG_LEVEL}" },
            ],
          },
        ]),
      );
      respondToCommands((_command, [, subcommand]) => {
        switch (subcommand) {
          case "list-clusters":
            return {
              stdout: JSON.stringify({
                clusterArns: [`${account}:cluster/shop-ecs-cluster-1a2b3c4d`],
              }),
            };

          case "list-services":
            return {
              stdout: JSON.stringify({
                serviceArns: [
                  `${account}:service/shop-ecs-cluster-1a2b3c4d/shop-fargate-service-1a2b3c4d`,
                ],
              }),
            };

          case "register-task-definition":
            return {
              stdout: JSON.stringify({ taskDefinition: { taskDefinitionArn } }),
            };

          default:
            return { stdout: "{}" };
        }
      });

      const result = await updateEcsService(
        {
          image: `${repositoryUri}:4fadb58`,
          imageTag: "4fadb58",
          names: resolveResourceNames("shop", "1a2b3c4d"),
          repositoryUri,
          stack: { name: "shop-stack-1a2b3c4d", tag: "1a2b3c4d", exists: true },
        },
        {
          ...settings,
          taskDefinitionOutput: output,
          taskDefinitionTemplate: template,
          variables: new Map([["LOG_LEVEL", "debug"]]),
        },
      );

      expect(result).toEqual({
        cluster: "shop-ecs-cluster-1a2b3c4d",
        service: "shop-fargate-service-1a2b3c4d",
        taskDefinitionArn,
        taskDefinitionFile: output,
      });
      expect(executedCommands()).toEqual([
        "aws ecs list-clusters --output json",
        "aws ecs list-services --cluster shop-ecs-cluster-1a2b3c4d --output json",
        "aws ecs register-task-definition --family shop-task-definition-1a2b3c4d " +
          `--container-definitions file://${output} --output json`,
        "aws ecs update-service --cluster shop-ecs-cluster-1a2b3c4d " +
          "--service shop-fargate-service-1a2b3c4d " +
          `--task-definition ${taskDefinitionArn} --output json`,
      ]);
      await expect(
        readFile(output, "utf8").then((text) => JSON.parse(text)),
      ).resolves.toEqual([
        {
          name: "server",
          image: `${repositoryUri}:4fadb58`,
          environment: [
            { name: "REGION", value: "eu-west-1" },
            { name: "SERVICE", value: "shop-fargate-service-1a2b3c4d" },
            { name: "LOG_LEVEL", value: "debug" },
          ],
        },
      ]);
    });

    it("should not register anything if the service is missing", async () => {
      respondToCommands((_command, [, subcommand]) =>
        subcommand === "list-clusters"
          ? {
              stdout: JSON.stringify({
                clusterArns: [`${account}:cluster/shop-ecs-cluster-1a2b3c4d`],
              }),
            }
          : { stdout: JSON.stringify({ serviceArns: [] }) },
      );

      await expect(
        updateEcsService(
          {
            image: "image:tag",
            imageTag: "tag",
            names: resolveResourceNames("shop", "1a2b3c4d"),
            repositoryUri: "image",
            stack: { name: "shop-stack-1a2b3c4d", tag: "1a2b3c4d", exists: true },
          },
          {
            ...settings,
            taskDefinitionOutput: join(directory, "out.json"),
            taskDefinitionTemplate: join(directory, "template.json"),
            variables: new Map(),
          },
        ),
      ).rejects.toThrow('ECS service "shop-fargate-service-1a2b3c4d" not found');
      expect(executedCommands()).toHaveLength(2);
    });
  });
});
