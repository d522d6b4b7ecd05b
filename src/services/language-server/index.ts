export {
  CompletionItemKind,
  type CodeLabel,
  type CompletionItem,
  type LabelRange,
  type LanguageServerAdapter,
} from "./types";
export { formatCompletionLabel, plainLabel } from "./completion-label";
export { GitHubReleaseAdapter, type GitHubReleaseAdapterDeps } from "./github-release-adapter";
export {
  LanguageServerBinaryProvider,
  type GetBinaryOptions,
  type LanguageServerBinaryProviderDeps,
} from "./binary-provider";
