/**
 * Types for querying a release index.
 */

/**
 * A downloadable file attached to a release.
 */
export interface ReleaseAsset {
  readonly name: string;
  readonly downloadUrl: string;
}

/**
 * A published release of a tool.
 */
export interface Release {
  readonly tagName: string;
  readonly prerelease: boolean;
  readonly draft: boolean;
  readonly assets: readonly ReleaseAsset[];
}

/**
 * Filters applied when selecting the latest release.
 */
export interface ReleaseQueryOptions {
  readonly includePrereleases: boolean;
  readonly includeDrafts: boolean;
}

/**
 * Remote index of published releases.
 */
export interface ReleaseIndexClient {
  /**
   * Get the newest release that passes the filters and has at least one asset.
   *
   * @param repository - Repository as `owner/name`
   * @throws ProvisioningError RELEASE_QUERY_FAILED when the index can't be read
   *   or no release qualifies
   */
  latestRelease(repository: string, options: ReleaseQueryOptions): Promise<Release>;
}
