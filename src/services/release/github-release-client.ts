/**
 * Release index backed by the GitHub REST API.
 */

import { z } from "zod";
import { ProvisioningError, getErrorMessage } from "../errors";
import type { Logger } from "../logging";
import type { HttpClient } from "../platform/network";
import type { Release, ReleaseIndexClient, ReleaseQueryOptions } from "./types";

export const GITHUB_API_URL = "https://api.github.com";

/**
 * Release as returned by `GET /repos/{owner}/{repo}/releases`.
 * Only the fields used here are validated; the rest are ignored.
 */
const GitHubReleaseSchema = z.object({
  tag_name: z.string(),
  prerelease: z.boolean(),
  draft: z.boolean(),
  assets: z.array(
    z.object({
      name: z.string(),
      browser_download_url: z.string(),
    })
  ),
});

const GitHubReleaseListSchema = z.array(GitHubReleaseSchema);

type GitHubRelease = z.infer<typeof GitHubReleaseSchema>;

function toRelease(release: GitHubRelease): Release {
  return {
    tagName: release.tag_name,
    prerelease: release.prerelease,
    draft: release.draft,
    assets: release.assets.map((asset) => ({
      name: asset.name,
      downloadUrl: asset.browser_download_url,
    })),
  };
}

/**
 * A fixed token, or a reader asked before every query.
 */
export type GitHubTokenSource = string | null | (() => Promise<string | null>);

/**
 * Dependencies for GitHubReleaseClient.
 */
export interface GitHubReleaseClientDeps {
  readonly httpClient: HttpClient;
  readonly logger: Logger;
  /** Sent as a bearer token when set */
  readonly githubToken?: GitHubTokenSource;
  /** Default: https://api.github.com */
  readonly apiUrl?: string;
}

/**
 * Reads releases from GitHub. The API lists releases newest first.
 */
export class GitHubReleaseClient implements ReleaseIndexClient {
  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly githubToken: GitHubTokenSource;
  private readonly apiUrl: string;

  constructor(deps: GitHubReleaseClientDeps) {
    this.httpClient = deps.httpClient;
    this.logger = deps.logger;
    this.githubToken = deps.githubToken ?? null;
    this.apiUrl = deps.apiUrl ?? GITHUB_API_URL;
  }

  async latestRelease(repository: string, options: ReleaseQueryOptions): Promise<Release> {
    const releases = await this.listReleases(repository);

    const release = releases.find(
      (candidate) =>
        (options.includeDrafts || !candidate.draft) &&
        (options.includePrereleases || !candidate.prerelease) &&
        candidate.assets.length > 0
    );
    if (release === undefined) {
      throw new ProvisioningError(
        `no qualifying release found for ${repository}`,
        "RELEASE_QUERY_FAILED"
      );
    }

    this.logger.debug("Selected release", { repository, tag: release.tagName });
    return release;
  }

  private async listReleases(repository: string): Promise<readonly Release[]> {
    const url = `${this.apiUrl}/repos/${repository}/releases?per_page=100`;
    const headers: Record<string, string> = { Accept: "application/vnd.github+json" };
    const token =
      typeof this.githubToken === "function" ? await this.githubToken() : this.githubToken;
    if (token !== null) {
      headers.Authorization = `Bearer ${token}`;
    }

    let response: Response;
    try {
      response = await this.httpClient.fetch(url, { headers });
    } catch (error) {
      throw new ProvisioningError(
        `error querying releases of ${repository}: ${getErrorMessage(error)}`,
        "RELEASE_QUERY_FAILED",
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new ProvisioningError(
        `release query failed with status ${response.status}`,
        "RELEASE_QUERY_FAILED",
        { status: response.status }
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new ProvisioningError(
        `invalid release index response for ${repository}: ${getErrorMessage(error)}`,
        "RELEASE_QUERY_FAILED",
        { cause: error }
      );
    }

    const parsed = GitHubReleaseListSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join(".")}: ${issue.message}` : "unexpected shape";
      throw new ProvisioningError(
        `invalid release index response for ${repository}: ${detail}`,
        "RELEASE_QUERY_FAILED",
        { cause: parsed.error }
      );
    }

    return parsed.data.map(toRelease);
  }
}
