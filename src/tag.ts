import * as core from "@actions/core";
import { randomUUID } from "node:crypto";
import { readFile, writeFile } from "node:fs/promises";
import { exists, log } from "./utils.js";

export interface StackTag {
  tag: string;
  created: boolean;
}

/**
 * Generate a short, random deployment identifier: the first group of a v4
 * UUID, i.e. eight lowercase hex characters.
 */
export function generateStackTag() {
  return randomUUID().split("-")[0];
}

/**
 * Load the deployment tag from the state file, or generate and persist one
 *
 * The tag stays stable for as long as the state file exists, so repeated runs
 * target the same stack. An empty state file is treated as missing.
 *
 * @param path Path to the state file
 */
export async function loadOrCreateStackTag(path: string): Promise<StackTag> {
  if (await exists(path)) {
    log("Loading existing STACK_TAG from file...");

    const tag = (await readFile(path, "utf8")).trim();

    if (tag) {
      log(`Loaded existing STACK_TAG: ${tag}`);

      return { tag, created: false };
    }

    core.warning(`State file "${path}" is empty. Generating a new STACK_TAG.`);
  } else {
    log("Generating new STACK_TAG and saving to file...");
  }

  const tag = generateStackTag();

  try {
    await writeFile(path, `${tag}\n`, "utf8");
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);

    throw new Error(`Failed to write STACK_TAG to "${path}": ${message}`, {
      cause,
    });
  }

  log(`Generated new STACK_TAG: ${tag}`);

  return { tag, created: true };
}
