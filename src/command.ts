import * as core from "@actions/core";
import { exec } from "@actions/exec";
import { CommandError } from "./errors.js";
import { mergeEnvironment } from "./utils.js";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  stdin?: Buffer | string;
  env?: Record<string, string>;
  silent?: boolean;
  allowFailure?: boolean;
}

/**
 * Execute an external command
 *
 * This function executes a command with the given arguments and options,
 * capturing the output from stdout and stderr. A non-zero exit status throws a
 * {@link CommandError}, unless `allowFailure` is set, in which case the caller
 * receives the result and decides.
 *
 * @param command         The executable to run
 * @param args            The arguments to pass; empty strings are dropped
 * @param [stdin]         Optional input to pass to the command's stdin
 * @param [env]           Optional environment overrides, merged over the
 *                        process environment
 * @param [silent]        If true, suppresses the output of the command to the
 *                        action log output
 * @param [allowFailure]  If true, return non-zero results instead of throwing
 */
export async function executeCommand(
  command: string,
  args: string[],
  {
    stdin = undefined,
    env = undefined,
    silent = false,
    allowFailure = false,
  }: CommandOptions = {},
): Promise<CommandResult> {
  const input = stdin
    ? Buffer.isBuffer(stdin)
      ? stdin
      : Buffer.from(stdin)
    : undefined;
  const filteredArgs = args.filter((arg) => arg !== "");
  let stdout = "";
  let stderr = "";
  let exitCode: number;

  core.startGroup(`${command} ${filteredArgs.join(" ")}`);

  try {
    try {
      exitCode = await exec(command, filteredArgs, {
        input,
        silent,
        env: env ? mergeEnvironment(env) : undefined,
        ignoreReturnCode: true,
        listeners: {
          stdout: (data) => (stdout += data.toString()),
          stderr: (data) => (stderr += data.toString()),
        },
      });
    } catch (cause) {
      // exec only rejects when the executable cannot be started at all
      const message = cause instanceof Error ? cause.message : String(cause);
      core.error(`Command could not be started: ${message}`);

      throw new CommandError(command, filteredArgs, 127, message, { cause });
    }

    if (exitCode !== 0 && !allowFailure) {
      core.error(`Command failed with exit code ${exitCode}`);

      if (stdout.trim()) {
        core.error(stdout);
      }

      if (stderr.trim()) {
        core.error(stderr);
      }

      throw new CommandError(command, filteredArgs, exitCode, stderr);
    }
  } finally {
    core.endGroup();
  }

  return { exitCode, stdout, stderr };
}
