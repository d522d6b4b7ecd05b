export type { Release, ReleaseAsset, ReleaseIndexClient, ReleaseQueryOptions } from "./types";
export {
  GitHubReleaseClient,
  GITHUB_API_URL,
  type GitHubReleaseClientDeps,
  type GitHubTokenSource,
} from "./github-release-client";
export { ReleaseResolver, type ReleaseResolverDeps } from "./release-resolver";
