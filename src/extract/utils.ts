/**
 * Utility functions for the extract module
 */

/** Elements whose text never counts as page content. */
export const NON_CONTENT_SELECTORS = ['script', 'style', 'noscript', 'template'];

/** Collapse whitespace runs to single spaces and trim. */
export function normalizeWhitespace(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Wrap an HTML fragment in a full document so linkedom builds a regular
 * html/body tree around it.
 */
export function toFullDocument(html: string): string {
  return /<html[\s>]/i.test(html) ? html : `<!DOCTYPE html><html><body>${html}</body></html>`;
}

/** Count non-overlapping, case-insensitive occurrences of `needle`. */
export function countOccurrences(haystack: string, needle: string): number {
  const target = needle.trim().toLowerCase();
  if (!target) return 0;

  const text = haystack.toLowerCase();
  let count = 0;
  let index = text.indexOf(target);
  while (index !== -1) {
    count++;
    index = text.indexOf(target, index + target.length);
  }
  return count;
}
