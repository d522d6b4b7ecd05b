/**
 * Tests for LanguageServerBinaryProvider.
 */

import { join } from "node:path";
import { describe, it, expect, vi } from "vitest";
import { LanguageServerBinaryProvider } from "./binary-provider";
import { createMockLanguageServerAdapter } from "./language-server.test-utils";
import { ConfigService } from "../config/config-service";
import type { AppConfig } from "../config/types";
import { ProvisioningError } from "../errors";
import { createFileSystemMock, directory, file } from "../platform/filesystem.state-mock";
import { createMockPathProvider } from "../platform/path-provider.test-utils";
import { createMockLogger, type MockLogger } from "../logging/logging.test-utils";
import { SILENT_LOGGER } from "../logging";

const DATA_ROOT = join("/test", "app-data");
const CONTAINER_DIR = join(DATA_ROOT, "languages", "marksman");

function createProvider(config?: AppConfig): {
  provider: LanguageServerBinaryProvider;
  logger: MockLogger;
} {
  const pathProvider = createMockPathProvider({ dataRootDir: DATA_ROOT });
  const fileSystem = createFileSystemMock(
    config !== undefined
      ? { entries: { [pathProvider.configPath]: file(JSON.stringify(config)) } }
      : undefined
  );
  const configService = new ConfigService({
    fileSystem,
    pathProvider,
    logger: SILENT_LOGGER,
    env: {},
  });
  const logger = createMockLogger();
  return {
    provider: new LanguageServerBinaryProvider({ configService, pathProvider, logger }),
    logger,
  };
}

async function captureError(promise: Promise<unknown>): Promise<ProvisioningError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ProvisioningError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected promise to reject");
}

const OFFLINE_CONFIG: AppConfig = {
  network: { allowDownloads: false, githubToken: null },
  binaries: {},
};

describe("LanguageServerBinaryProvider", () => {
  describe("settings", () => {
    it("uses the configured binary before anything else", async () => {
      const { provider } = createProvider({
        network: { allowDownloads: true, githubToken: null },
        binaries: {
          marksman: { path: "/opt/marksman", arguments: ["server", "--verbose"], env: { A: "1" } },
        },
      });
      const adapter = createMockLanguageServerAdapter();

      const result = await provider.getBinary(adapter);

      expect(result).toEqual({
        source: "settings",
        binary: { path: "/opt/marksman", env: { A: "1" }, arguments: ["server", "--verbose"] },
      });
      expect(adapter.checkIfUserInstalled).not.toHaveBeenCalled();
    });

    it("defaults override arguments and env", async () => {
      const { provider } = createProvider({
        network: { allowDownloads: true, githubToken: null },
        binaries: { marksman: { path: "/opt/marksman" } },
      });

      const result = await provider.getBinary(createMockLanguageServerAdapter());

      expect(result.binary).toEqual({ path: "/opt/marksman", env: null, arguments: ["server"] });
    });

    it("ignores overrides of other tools", async () => {
      const { provider } = createProvider({
        network: { allowDownloads: false, githubToken: null },
        binaries: { other: { path: "/opt/other" } },
      });
      const adapter = createMockLanguageServerAdapter();
      adapter.checkIfUserInstalled.mockResolvedValue({
        path: "/usr/bin/marksman",
        env: null,
        arguments: ["server"],
      });

      const result = await provider.getBinary(adapter);

      expect(result.source).toBe("system");
    });
  });

  it("keeps resolving when the default config cannot be written", async () => {
    const pathProvider = createMockPathProvider({ dataRootDir: DATA_ROOT });
    const configService = new ConfigService({
      fileSystem: createFileSystemMock({ entries: { [DATA_ROOT]: directory({ error: "EACCES" }) } }),
      pathProvider,
      logger: SILENT_LOGGER,
      env: {},
    });
    const provider = new LanguageServerBinaryProvider({
      configService,
      pathProvider,
      logger: SILENT_LOGGER,
    });
    const adapter = createMockLanguageServerAdapter();
    adapter.checkIfUserInstalled.mockResolvedValue({
      path: "/usr/bin/marksman",
      env: null,
      arguments: ["server"],
    });

    const result = await provider.getBinary(adapter);

    expect(result).toEqual({
      source: "system",
      binary: { path: "/usr/bin/marksman", env: null, arguments: ["server"] },
    });
    expect(adapter.checkIfUserInstalled).toHaveBeenCalledTimes(1);
  });

  it("prefers an installed binary over the network", async () => {
    const { provider } = createProvider();
    const adapter = createMockLanguageServerAdapter();
    const installed = { path: "/usr/bin/marksman", env: null, arguments: ["server"] };
    adapter.checkIfUserInstalled.mockResolvedValue(installed);

    const result = await provider.getBinary(adapter);

    expect(result).toEqual({ source: "system", binary: installed });
    expect(adapter.fetchLatestServerVersion).not.toHaveBeenCalled();
  });

  it("downloads the latest release into the tool container", async () => {
    const { provider } = createProvider();
    const adapter = createMockLanguageServerAdapter();
    const onProgress = vi.fn();

    const result = await provider.getBinary(adapter, { onProgress });

    expect(result).toEqual({
      source: "downloaded",
      binary: {
        path: `${CONTAINER_DIR}/marksman-2024-12-18`,
        env: null,
        arguments: ["server"],
      },
    });
    expect(adapter.fetchServerBinary).toHaveBeenCalledWith(
      { name: "2024-12-18", url: "https://example.com/marksman" },
      CONTAINER_DIR,
      onProgress
    );
    expect(adapter.cachedServerBinary).not.toHaveBeenCalled();
  });

  it("uses the cache without network when downloads are disabled in config", async () => {
    const { provider } = createProvider(OFFLINE_CONFIG);
    const adapter = createMockLanguageServerAdapter();
    const cached = { path: `${CONTAINER_DIR}/marksman-2024-11-20`, env: null, arguments: [] };
    adapter.cachedServerBinary.mockResolvedValue(cached);

    const result = await provider.getBinary(adapter);

    expect(result).toEqual({ source: "cached", binary: cached });
    expect(adapter.fetchLatestServerVersion).not.toHaveBeenCalled();
    expect(adapter.cachedServerBinary).toHaveBeenCalledWith(CONTAINER_DIR);
  });

  it("lets the caller override the network policy", async () => {
    const { provider } = createProvider(OFFLINE_CONFIG);
    const adapter = createMockLanguageServerAdapter();

    const result = await provider.getBinary(adapter, { allowNetwork: true });

    expect(result.source).toBe("downloaded");
  });

  it("falls back to the cache when the download fails", async () => {
    const { provider, logger } = createProvider();
    const adapter = createMockLanguageServerAdapter();
    const failure = new ProvisioningError("download failed with status 502", "DOWNLOAD_FAILED", {
      status: 502,
    });
    adapter.fetchServerBinary.mockRejectedValue(failure);
    const cached = { path: `${CONTAINER_DIR}/marksman-2024-11-20`, env: null, arguments: [] };
    adapter.cachedServerBinary.mockResolvedValue(cached);

    const result = await provider.getBinary(adapter);

    expect(result).toEqual({ source: "cached", binary: cached });
    expect(logger.error).toHaveBeenCalledWith(
      "Failed to fetch binary, falling back to cache",
      { tool: "marksman", error: "download failed with status 502" },
      failure
    );
  });

  it("wraps the network error when nothing is cached", async () => {
    const { provider } = createProvider();
    const adapter = createMockLanguageServerAdapter();
    const failure = new ProvisioningError(
      'no asset found matching "marksman-linux-arm64"',
      "NO_MATCHING_ASSET"
    );
    adapter.fetchLatestServerVersion.mockRejectedValue(failure);

    const error = await captureError(provider.getBinary(adapter));

    expect(error.errorCode).toBe("BINARY_UNAVAILABLE");
    expect(error.message).toBe(
      'no marksman binary available: no asset found matching "marksman-linux-arm64"'
    );
    expect(error.cause).toBe(failure);
  });

  it("fails without a cause when offline and nothing is cached", async () => {
    const { provider } = createProvider(OFFLINE_CONFIG);

    const error = await captureError(provider.getBinary(createMockLanguageServerAdapter()));

    expect(error.errorCode).toBe("BINARY_UNAVAILABLE");
    expect(error.message).toBe("no marksman binary available");
    expect(error.cause).toBeUndefined();
  });
});
