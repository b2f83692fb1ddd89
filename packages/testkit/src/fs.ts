/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileTableBackend, type FileTableBackendOptions } from "@tablemat/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "tablemat-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempRoot(prefix = "tablemat-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a file backend rooted in a temp directory, removing it afterwards
 */
export async function withFileBackend<T>(
  fn: (backend: FileTableBackend, root: string) => Promise<T>,
  options: Omit<FileTableBackendOptions, "root"> = {}
): Promise<T> {
  return withTempDir((root) => fn(new FileTableBackend({ ...options, root }), root));
}
