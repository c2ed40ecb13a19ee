/**
 * Text normalization for single-line fields and heading anchors.
 * Code snippets never pass through here; they are emitted verbatim.
 */

/** Collapse newlines, tabs and control characters into single spaces. */
export function sanitizeLine(val: unknown): string {
  let s = String(val ?? '');
  s = s.replace(/[\r\n\t]+/g, ' ');
  s = s.replace(/[\u0000-\u001F\u007F]+/g, ' ');
  s = s.replace(/\s{2,}/g, ' ');
  return s.trim();
}

/**
 * Heading anchor as GitHub computes it: lowercase, punctuation dropped, each space a hyphen.
 * "1. Numbers & Strings" -> "1-numbers--strings".
 */
export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s_-]/gu, '')
    .replace(/\s/g, '-');
}

/** A backtick fence one longer than the longest run inside `code`, minimum three. */
export function fenceFor(code: string): string {
  let longest = 0;
  for (const run of code.match(/`+/g) ?? []) longest = Math.max(longest, run.length);
  return '`'.repeat(Math.max(3, longest + 1));
}
