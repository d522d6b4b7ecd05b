/**
 * Test utilities for PathProvider.
 */
import { join } from "node:path";
import { assertToolDirName, type PathProvider } from "./path-provider";

/**
 * Options for createMockPathProvider.
 * Derived paths follow dataRootDir unless overridden themselves.
 */
export interface MockPathProviderOptions extends Partial<
  Omit<PathProvider, "getContainerDir">
> {
  getContainerDir?: (toolName: string) => string;
}

/**
 * Create a mock PathProvider with controllable behavior.
 * Defaults to test paths under `/test/app-data/`.
 *
 * @param overrides - Optional overrides for PathProvider properties
 * @returns Mock PathProvider object
 */
export function createMockPathProvider(overrides?: MockPathProviderOptions): PathProvider {
  // Use join() for all paths to ensure cross-platform compatibility
  const dataRootDir = overrides?.dataRootDir ?? join("/test", "app-data");
  const languagesDir = overrides?.languagesDir ?? join(dataRootDir, "languages");

  const defaultGetContainerDir = (toolName: string): string => {
    assertToolDirName(toolName);
    return join(languagesDir, toolName);
  };

  return {
    dataRootDir,
    logsDir: overrides?.logsDir ?? join(dataRootDir, "logs"),
    languagesDir,
    configPath: overrides?.configPath ?? join(dataRootDir, "config.json"),
    getContainerDir: overrides?.getContainerDir ?? defaultGetContainerDir,
  };
}
