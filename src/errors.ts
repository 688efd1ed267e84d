/**
 * An external command exited with a non-zero status, or could not be started
 */
export class CommandError extends Error {
  public override readonly name = "CommandError";

  public constructor(
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly exitCode: number,
    public readonly stderr = "",
    options?: ErrorOptions,
  ) {
    super(
      `Command "${[command, ...args].join(" ")}" failed with exit code ${exitCode}`,
      options,
    );
  }
}

/**
 * Resolve the process exit status for an error
 *
 * Walks the cause chain for the command failure that triggered the error and
 * uses its exit code; anything else exits with 1.
 */
export function resolveExitStatus(error: unknown): number {
  let current: unknown = error;

  while (current instanceof Error) {
    if (current instanceof CommandError) {
      return current.exitCode || 1;
    }

    current = current.cause;
  }

  return 1;
}
