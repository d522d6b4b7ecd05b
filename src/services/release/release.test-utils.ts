/**
 * Test utilities for release index consumers.
 */

import { vi, type Mock } from "vitest";
import type { Release, ReleaseIndexClient, ReleaseQueryOptions } from "./types";

export interface MockReleaseIndexClient extends ReleaseIndexClient {
  latestRelease: Mock<(repository: string, options: ReleaseQueryOptions) => Promise<Release>>;
}

/**
 * Create a release with marksman-style assets.
 *
 * @example
 * createRelease({ tagName: "2024-12-18", assets: [] })
 */
export function createRelease(overrides?: Partial<Release>): Release {
  const tagName = overrides?.tagName ?? "2024-12-18";
  return {
    tagName,
    prerelease: false,
    draft: false,
    assets: [
      {
        name: "marksman-linux-x64",
        downloadUrl: `https://github.com/artempyanykh/marksman/releases/download/${tagName}/marksman-linux-x64`,
      },
      {
        name: "marksman-macos",
        downloadUrl: `https://github.com/artempyanykh/marksman/releases/download/${tagName}/marksman-macos`,
      },
    ],
    ...overrides,
  };
}

/**
 * Create a release client that resolves to the given release, or rejects with the given error.
 */
export function createMockReleaseIndexClient(
  result: Release | Error = createRelease()
): MockReleaseIndexClient {
  return {
    latestRelease: vi.fn(async () => {
      if (result instanceof Error) {
        throw result;
      }
      return result;
    }),
  };
}
