import { beforeEach, describe, expect, it, vi } from "vitest";
import { CommandError } from "../src/errors.js";
import {
  createRepository,
  describeRepository,
  ensureRepository,
} from "../src/registry.js";
import { executedCommands, respondToCommands } from "./helpers/exec.js";

vi.mock("@actions/core");
vi.mock("@actions/exec");

const repository = {
  repositoryArn:
    "arn:aws:ecr:eu-west-1:123456789012:repository/shop-ecr-repository",
  registryId: "123456789012",
  repositoryName: "shop-ecr-repository",
  repositoryUri:
    "123456789012.dkr.ecr.eu-west-1.amazonaws.com/shop-ecr-repository",
};
const notFound =
  "An error occurred (RepositoryNotFoundException) when calling the " +
  "DescribeRepositories operation: The repository with name " +
  "'shop-ecr-repository' does not exist";
const settings = { awsProfile: "deploy", region: "eu-west-1" };

function createCalls() {
  return executedCommands().filter((line) =>
    line.startsWith("aws ecr create-repository"),
  );
}

describe("registry", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("describeRepository", () => {
    it("should return the repository", async () => {
      respondToCommands(() => ({
        stdout: JSON.stringify({ repositories: [repository] }),
      }));

      await expect(
        describeRepository("shop-ecr-repository", settings),
      ).resolves.toEqual(repository);
      expect(executedCommands()).toEqual([
        "aws ecr describe-repositories --repository-names shop-ecr-repository --output json",
      ]);
    });

    it("should return null for missing repositories", async () => {
      respondToCommands(() => ({ exitCode: 254, stderr: notFound }));

      await expect(
        describeRepository("shop-ecr-repository", settings),
      ).resolves.toBeNull();
    });

    it("should propagate other failures", async () => {
      respondToCommands(() => ({
        exitCode: 255,
        stderr: "An error occurred (AccessDeniedException)",
      }));

      const promise = describeRepository("shop-ecr-repository", settings);

      await expect(promise).rejects.toBeInstanceOf(CommandError);
      await expect(promise).rejects.toMatchObject({ exitCode: 255 });
    });
  });

  describe("createRepository", () => {
    it("should reject responses without a repository URI", async () => {
      respondToCommands(() => ({ stdout: "{}" }));

      await expect(
        createRepository("shop-ecr-repository", settings),
      ).rejects.toThrow(
        'Failed to create repository "shop-ecr-repository": The response contains no repository URI',
      );
    });
  });

  describe("ensureRepository", () => {
    it("should create a missing repository exactly once", async () => {
      respondToCommands((_command, [, subcommand]) =>
        subcommand === "describe-repositories"
          ? { exitCode: 254, stderr: notFound }
          : { stdout: JSON.stringify({ repository }) },
      );

      await expect(
        ensureRepository("shop-ecr-repository", settings),
      ).resolves.toEqual(repository);
      expect(createCalls()).toEqual([
        "aws ecr create-repository --repository-name shop-ecr-repository --output json",
      ]);
    });

    it("should not create an existing repository", async () => {
      respondToCommands(() => ({
        stdout: JSON.stringify({ repositories: [repository] }),
      }));

      await expect(
        ensureRepository("shop-ecr-repository", settings),
      ).resolves.toEqual(repository);
      expect(createCalls()).toEqual([]);
    });

    it("should only create the repository on the first of two runs", async () => {
      let created = false;

      respondToCommands((_command, [, subcommand]) => {
        if (subcommand === "create-repository") {
          created = true;

          return { stdout: JSON.stringify({ repository }) };
        }

        return created
          ? { stdout: JSON.stringify({ repositories: [repository] }) }
          : { exitCode: 254, stderr: notFound };
      });

      await ensureRepository("shop-ecr-repository", settings);
      await ensureRepository("shop-ecr-repository", settings);

      expect(createCalls()).toHaveLength(1);
    });

    it("should not create the repository if the lookup fails", async () => {
      respondToCommands(() => ({ exitCode: 255, stderr: "ExpiredToken" }));

      await expect(
        ensureRepository("shop-ecr-repository", settings),
      ).rejects.toBeInstanceOf(CommandError);
      expect(createCalls()).toEqual([]);
    });
  });
});
