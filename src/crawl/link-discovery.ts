/**
 * Link discovery through the regular extractor, plus URL filtering
 */
import picomatch from 'picomatch';
import { extract } from '../extract/extractor.js';
import type { FetchedDocument } from '../fetch/types.js';
import { createSelectorRule } from '../rules/selector-rule.js';
import type { SelectorRule } from '../rules/types.js';
import type { LinkFilterOptions } from './types.js';

export const DEFAULT_LINK_SELECTOR = 'a[href]';
const LINK_FIELD = 'links';

/** A multiple `url` rule over `selector`, used for search results and link following. */
export function linkRule(selector: string = DEFAULT_LINK_SELECTOR): SelectorRule {
  return createSelectorRule({
    fieldName: LINK_FIELD,
    path: selector,
    multiple: true,
    transform: { kind: 'url', name: 'href' },
  });
}

/**
 * Absolute http(s) links matched by `rule`, deduplicated, in document order.
 * Returns an empty list for documents that cannot be parsed.
 */
export function discoverLinks(document: FetchedDocument, rule: SelectorRule = linkRule()): string[] {
  const outcome = extract(document, [rule]);
  if (!outcome.success) return [];

  const value = outcome.record.fields[rule.fieldName];
  const links = typeof value === 'string' ? [value] : (value ?? []);
  return Array.from(new Set(links));
}

export interface UrlFilterOptions extends LinkFilterOptions {
  /** Only accept URLs on this origin */
  origin?: string;
  /** Reject URLs on these hosts */
  excludeHosts?: string[];
}

/**
 * Build a predicate over absolute URLs. Include/exclude globs match the
 * URL path.
 */
export function createUrlFilter(options: UrlFilterOptions = {}): (url: string) => boolean {
  const includeMatcher =
    options.include && options.include.length > 0
      ? picomatch(options.include, { dot: true })
      : null;
  const excludeMatcher =
    options.exclude && options.exclude.length > 0
      ? picomatch(options.exclude, { dot: true })
      : null;
  const excludeHosts = new Set((options.excludeHosts ?? []).map((host) => host.toLowerCase()));

  return (url: string) => {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }

    if (options.origin && parsed.origin !== options.origin) return false;
    if (excludeHosts.has(parsed.host)) return false;
    if (includeMatcher && !includeMatcher(parsed.pathname)) return false;
    if (excludeMatcher && excludeMatcher(parsed.pathname)) return false;
    return true;
  };
}
