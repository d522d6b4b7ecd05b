/**
 * Test utilities for service tests.
 * These helpers create temporary directories with automatic cleanup.
 */

import { mkdtemp, rm, realpath } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a temporary directory with automatic cleanup.
 * Uses realpath to resolve Windows 8.3 short paths (e.g., RUNNER~1 -> runneradmin).
 * @returns Object with path and cleanup function
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const tempPath = await mkdtemp(join(tmpdir(), "lsprovision-test-"));
  // Resolve to canonical path so path comparisons in tests match
  const resolvedPath = await realpath(tempPath);
  return {
    path: resolvedPath,
    cleanup: async () => {
      await rm(resolvedPath, {
        recursive: true,
        force: true,
        // Retry on EBUSY/EPERM errors - file handles may take time to release
        maxRetries: 5,
        retryDelay: 200,
      });
    },
  };
}

/**
 * Run a function with a temporary directory that is cleaned up afterwards.
 *
 * @param fn Test function that receives the directory path
 */
export async function withTempDir(fn: (dirPath: string) => Promise<void>): Promise<void> {
  const { path, cleanup } = await createTempDir();
  try {
    await fn(path);
  } finally {
    await cleanup();
  }
}
