import { CompletionItemKind, type CodeLabel, type CompletionItem } from "./types";

/**
 * Label whose filter range covers the whole text.
 */
export function plainLabel(text: string): CodeLabel {
  return { text, filterRange: { start: 0, end: text.length } };
}

/**
 * Show reference completions as "<detail> - <label>".
 * Every other item keeps the host's default label.
 *
 * @example
 * formatCompletionLabel({ label: "intro", kind: CompletionItemKind.Reference, detail: "notes.md" });
 * // { text: "notes.md - intro", filterRange: { start: 0, end: 16 } }
 */
export function formatCompletionLabel(item: CompletionItem): CodeLabel | null {
  if (item.kind !== CompletionItemKind.Reference || item.detail === undefined) {
    return null;
  }
  return plainLabel(`${item.detail} - ${item.label}`);
}
