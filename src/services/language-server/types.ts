/**
 * Types describing a language server to the host.
 */

import type {
  DownloadProgressCallback,
  LanguageServerBinary,
  ReleaseVersion,
} from "../types";

/**
 * Completion item kinds of the Language Server Protocol.
 */
export const CompletionItemKind = {
  Text: 1,
  Method: 2,
  Function: 3,
  Constructor: 4,
  Field: 5,
  Variable: 6,
  Class: 7,
  Interface: 8,
  Module: 9,
  Property: 10,
  Unit: 11,
  Value: 12,
  Enum: 13,
  Keyword: 14,
  Snippet: 15,
  Color: 16,
  File: 17,
  Reference: 18,
  Folder: 19,
  EnumMember: 20,
  Constant: 21,
  Struct: 22,
  Event: 23,
  Operator: 24,
  TypeParameter: 25,
} as const;

export type CompletionItemKind = (typeof CompletionItemKind)[keyof typeof CompletionItemKind];

/**
 * The parts of a protocol completion item used for labels.
 */
export interface CompletionItem {
  readonly label: string;
  readonly kind?: CompletionItemKind;
  readonly detail?: string;
}

/**
 * Character range of a label, end exclusive.
 */
export interface LabelRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Label shown for a completion, with the range matched against typed input.
 */
export interface CodeLabel {
  readonly text: string;
  readonly filterRange: LabelRange;
}

/**
 * Everything the host needs to provision and present one language server.
 */
export interface LanguageServerAdapter {
  /** Tool name, also the name of its container directory */
  readonly name: string;
  /** Arguments the server is launched with */
  readonly serverArguments: readonly string[];

  /**
   * Look for the server on PATH.
   *
   * @returns Binary with the server arguments, or null if not installed
   */
  checkIfUserInstalled(): Promise<LanguageServerBinary | null>;

  /**
   * Resolve the latest release and this platform's asset.
   *
   * @throws ProvisioningError
   */
  fetchLatestServerVersion(): Promise<ReleaseVersion>;

  /**
   * Download the version into the container unless it is already there.
   *
   * @throws ProvisioningError DOWNLOAD_FAILED
   */
  fetchServerBinary(
    version: ReleaseVersion,
    containerDir: string,
    onProgress?: DownloadProgressCallback
  ): Promise<LanguageServerBinary>;

  /**
   * Use whatever the container holds, without network access.
   */
  cachedServerBinary(containerDir: string): Promise<LanguageServerBinary | null>;

  /**
   * Custom completion label, or null for the host's default.
   */
  labelForCompletion(item: CompletionItem): CodeLabel | null;
}
