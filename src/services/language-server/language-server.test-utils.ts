/**
 * Test utilities for LanguageServerAdapter consumers.
 */

import { vi, type Mock } from "vitest";
import type { LanguageServerAdapter } from "./types";

type Methods = Pick<
  LanguageServerAdapter,
  | "checkIfUserInstalled"
  | "fetchLatestServerVersion"
  | "fetchServerBinary"
  | "cachedServerBinary"
  | "labelForCompletion"
>;

export type MockLanguageServerAdapter = LanguageServerAdapter & {
  [K in keyof Methods]: Mock<Methods[K]>;
};

/**
 * Create an adapter that finds nothing installed or cached and downloads
 * `<containerDir>/<name>-<version>`.
 *
 * @example
 * const adapter = createMockLanguageServerAdapter();
 * adapter.cachedServerBinary.mockResolvedValue({ path: "/cache/marksman-1", env: null, arguments: [] });
 */
export function createMockLanguageServerAdapter(
  overrides?: Partial<Pick<LanguageServerAdapter, "name" | "serverArguments">>
): MockLanguageServerAdapter {
  const name = overrides?.name ?? "marksman";
  const serverArguments = overrides?.serverArguments ?? ["server"];
  return {
    name,
    serverArguments,
    checkIfUserInstalled: vi.fn<Methods["checkIfUserInstalled"]>(async () => null),
    fetchLatestServerVersion: vi.fn<Methods["fetchLatestServerVersion"]>(async () => ({
      name: "2024-12-18",
      url: `https://example.com/${name}`,
    })),
    fetchServerBinary: vi.fn<Methods["fetchServerBinary"]>(async (version, containerDir) => ({
      path: `${containerDir}/${name}-${version.name}`,
      env: null,
      arguments: serverArguments,
    })),
    cachedServerBinary: vi.fn<Methods["cachedServerBinary"]>(async () => null),
    labelForCompletion: vi.fn<Methods["labelForCompletion"]>(() => null),
  };
}
