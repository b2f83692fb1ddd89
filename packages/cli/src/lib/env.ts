/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { CONFIG_FILE_NAME, readEnv } from "@tablemat/sdk";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" references are left as they are
    return input;
  }

  return path.join(homedir(), match[2] ?? "");
}

/**
 * Resolve the data root directory
 * Priority: CLI option > TABLEMAT_ROOT env var > default "./data"
 */
export function resolveRoot(cliRoot: string | undefined, env: NodeJS.ProcessEnv): string {
  const root = cliRoot ?? readEnv(env).root ?? "./data";
  return path.resolve(expandTilde(root));
}

/**
 * Resolve the config file path: the --config option, else tablemat.config.json in the root
 */
export function resolveConfigPath(cliConfig: string | undefined, root: string): string {
  return cliConfig ? path.resolve(expandTilde(cliConfig)) : path.join(root, CONFIG_FILE_NAME);
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv, flag = false): boolean {
  return flag || env.TABLEMAT_CLI_DEBUG === "1";
}
