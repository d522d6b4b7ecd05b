/**
 * Tests for GitHubReleaseClient against the behavioral HttpClient mock.
 */

import { describe, it, expect, vi } from "vitest";
import { GitHubReleaseClient } from "./github-release-client";
import { createMockHttpClient } from "../platform/http-client.state-mock";
import { SILENT_LOGGER } from "../logging";
import { ProvisioningError } from "../errors";

const RELEASES_URL = "https://api.github.com/repos/artempyanykh/marksman/releases?per_page=100";

const STABLE_OPTIONS = { includePrereleases: false, includeDrafts: false };

function githubRelease(
  tag: string,
  flags: { prerelease?: boolean; draft?: boolean; assets?: readonly string[] } = {}
): Record<string, unknown> {
  return {
    tag_name: tag,
    prerelease: flags.prerelease ?? false,
    draft: flags.draft ?? false,
    html_url: `https://github.com/artempyanykh/marksman/releases/tag/${tag}`,
    assets: (flags.assets ?? ["marksman-linux-x64"]).map((name) => ({
      name,
      size: 1024,
      browser_download_url: `https://github.com/artempyanykh/marksman/releases/download/${tag}/${name}`,
    })),
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

describe("GitHubReleaseClient", () => {
  it("returns the newest stable release with assets", async () => {
    const httpClient = createMockHttpClient({
      responses: {
        [RELEASES_URL]: {
          body: JSON.stringify([
            githubRelease("2025-01-10", { draft: true }),
            githubRelease("2025-01-05", { prerelease: true }),
            githubRelease("2025-01-01", { assets: [] }),
            githubRelease("2024-12-18"),
            githubRelease("2024-11-20"),
          ]),
        },
      },
    });
    const client = new GitHubReleaseClient({ httpClient, logger: SILENT_LOGGER });

    const release = await client.latestRelease("artempyanykh/marksman", STABLE_OPTIONS);

    expect(release).toEqual({
      tagName: "2024-12-18",
      prerelease: false,
      draft: false,
      assets: [
        {
          name: "marksman-linux-x64",
          downloadUrl:
            "https://github.com/artempyanykh/marksman/releases/download/2024-12-18/marksman-linux-x64",
        },
      ],
    });
    expect(httpClient).toHaveRequestCount(1);
  });

  it("accepts prereleases and drafts when asked", async () => {
    const httpClient = createMockHttpClient({
      responses: {
        [RELEASES_URL]: {
          body: JSON.stringify([
            githubRelease("2025-01-10", { draft: true }),
            githubRelease("2025-01-05", { prerelease: true }),
          ]),
        },
      },
    });
    const client = new GitHubReleaseClient({ httpClient, logger: SILENT_LOGGER });

    const prerelease = await client.latestRelease("artempyanykh/marksman", {
      includePrereleases: true,
      includeDrafts: false,
    });
    const draft = await client.latestRelease("artempyanykh/marksman", {
      includePrereleases: true,
      includeDrafts: true,
    });

    expect(prerelease.tagName).toBe("2025-01-05");
    expect(draft.tagName).toBe("2025-01-10");
  });

  it("sends the GitHub accept header and token", async () => {
    const httpClient = createMockHttpClient({
      responses: { [RELEASES_URL]: { body: JSON.stringify([githubRelease("2024-12-18")]) } },
    });
    const client = new GitHubReleaseClient({
      httpClient,
      logger: SILENT_LOGGER,
      githubToken: "test-secret",
    });

    await client.latestRelease("artempyanykh/marksman", STABLE_OPTIONS);

    expect(httpClient.$.requests[0]?.options?.headers).toEqual({
      Accept: "application/vnd.github+json",
      Authorization: "Bearer test-secret",
    });
  });

  it("asks the token reader before every query", async () => {
    const httpClient = createMockHttpClient({
      responses: { [RELEASES_URL]: { body: JSON.stringify([githubRelease("2024-12-18")]) } },
    });
    const readToken = vi
      .fn<() => Promise<string | null>>()
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce("test-secret");
    const client = new GitHubReleaseClient({
      httpClient,
      logger: SILENT_LOGGER,
      githubToken: readToken,
    });

    await client.latestRelease("artempyanykh/marksman", STABLE_OPTIONS);
    await client.latestRelease("artempyanykh/marksman", STABLE_OPTIONS);

    expect(httpClient.$.requests.map((request) => request.options?.headers)).toEqual([
      { Accept: "application/vnd.github+json" },
      { Accept: "application/vnd.github+json", Authorization: "Bearer test-secret" },
    ]);
  });

  it("omits authorization without a token", async () => {
    const httpClient = createMockHttpClient({
      responses: { [RELEASES_URL]: { body: JSON.stringify([githubRelease("2024-12-18")]) } },
    });
    const client = new GitHubReleaseClient({ httpClient, logger: SILENT_LOGGER });

    await client.latestRelease("artempyanykh/marksman", STABLE_OPTIONS);

    expect(httpClient.$.requests[0]?.options?.headers).toEqual({
      Accept: "application/vnd.github+json",
    });
  });

  it("queries a custom API URL", async () => {
    const httpClient = createMockHttpClient({
      defaultResponse: { body: JSON.stringify([githubRelease("2024-12-18")]) },
    });
    const client = new GitHubReleaseClient({
      httpClient,
      logger: SILENT_LOGGER,
      apiUrl: "https://github.example.com/api/v3",
    });

    await client.latestRelease("artempyanykh/marksman", STABLE_OPTIONS);

    expect(httpClient).toHaveRequested(
      "https://github.example.com/api/v3/repos/artempyanykh/marksman/releases?per_page=100"
    );
  });

  describe("failures", () => {
    it("fails when no release qualifies", async () => {
      const httpClient = createMockHttpClient({
        responses: {
          [RELEASES_URL]: {
            body: JSON.stringify([githubRelease("2025-01-05", { prerelease: true })]),
          },
        },
      });
      const client = new GitHubReleaseClient({ httpClient, logger: SILENT_LOGGER });

      const error = await captureError(client.latestRelease("artempyanykh/marksman", STABLE_OPTIONS));

      expect(error.errorCode).toBe("RELEASE_QUERY_FAILED");
      expect(error.message).toBe("no qualifying release found for artempyanykh/marksman");
    });

    it("reports non-2xx statuses", async () => {
      const httpClient = createMockHttpClient({
        responses: { [RELEASES_URL]: { status: 403, body: '{"message":"rate limited"}' } },
      });
      const client = new GitHubReleaseClient({ httpClient, logger: SILENT_LOGGER });

      const error = await captureError(client.latestRelease("artempyanykh/marksman", STABLE_OPTIONS));

      expect(error.errorCode).toBe("RELEASE_QUERY_FAILED");
      expect(error.status).toBe(403);
      expect(error.message).toBe("release query failed with status 403");
    });

    it("wraps network errors", async () => {
      const httpClient = createMockHttpClient();
      httpClient.simulateNetworkDown();
      const client = new GitHubReleaseClient({ httpClient, logger: SILENT_LOGGER });

      const error = await captureError(client.latestRelease("artempyanykh/marksman", STABLE_OPTIONS));

      expect(error.errorCode).toBe("RELEASE_QUERY_FAILED");
      expect(error.message).toBe(
        "error querying releases of artempyanykh/marksman: fetch failed"
      );
      expect(error.cause).toBeInstanceOf(Error);
    });

    it("rejects invalid JSON", async () => {
      const httpClient = createMockHttpClient({
        responses: { [RELEASES_URL]: { body: "<html>" } },
      });
      const client = new GitHubReleaseClient({ httpClient, logger: SILENT_LOGGER });

      const error = await captureError(client.latestRelease("artempyanykh/marksman", STABLE_OPTIONS));

      expect(error.errorCode).toBe("RELEASE_QUERY_FAILED");
      expect(error.message).toMatch(/^invalid release index response for artempyanykh\/marksman: /);
    });

    it("rejects payloads of the wrong shape", async () => {
      const httpClient = createMockHttpClient({
        responses: { [RELEASES_URL]: { body: JSON.stringify([{ tag_name: 42 }]) } },
      });
      const client = new GitHubReleaseClient({ httpClient, logger: SILENT_LOGGER });

      const error = await captureError(client.latestRelease("artempyanykh/marksman", STABLE_OPTIONS));

      expect(error.errorCode).toBe("RELEASE_QUERY_FAILED");
      expect(error.message).toMatch(/^invalid release index response for artempyanykh\/marksman: 0\.tag_name: /);
    });
  });
});
