/**
 * Parse robots.txt Allow/Disallow rules for the wildcard user-agent
 */
import { logger } from '../logger.js';

export interface RobotsRules {
  allowPaths: string[];
  disallowPaths: string[];
}

/**
 * Parse robots.txt content into structured rules.
 * Only groups addressed to the wildcard user-agent (*) are kept.
 */
export function parseRobotsTxt(content: string): RobotsRules {
  const allowPaths: string[] = [];
  const disallowPaths: string[] = [];
  let inWildcardBlock = false;
  let lastWasAgent = false;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const field = line.slice(0, colonIdx).trim().toLowerCase();
    const value = line.slice(colonIdx + 1).trim();

    if (field === 'user-agent') {
      // Consecutive User-agent lines share one group
      inWildcardBlock = lastWasAgent ? inWildcardBlock || value === '*' : value === '*';
      lastWasAgent = true;
      continue;
    }
    lastWasAgent = false;

    if (!inWildcardBlock || !value) continue;
    if (field === 'disallow') disallowPaths.push(value);
    else if (field === 'allow') allowPaths.push(value);
  }

  return { allowPaths, disallowPaths };
}

/**
 * Check a URL path (with query) against the rules. The longest matching
 * prefix wins; Allow wins a tie.
 */
export function isAllowedByRobots(urlPath: string, rules: RobotsRules): boolean {
  let longestDisallow = -1;
  for (const path of rules.disallowPaths) {
    if (urlPath.startsWith(path)) longestDisallow = Math.max(longestDisallow, path.length);
  }
  if (longestDisallow === -1) return true;

  for (const path of rules.allowPaths) {
    if (urlPath.startsWith(path) && path.length >= longestDisallow) return true;
  }
  return false;
}

/**
 * Fetch and parse robots.txt for a given origin.
 * Returns null if robots.txt is missing or cannot be fetched.
 */
export async function fetchRobotsTxt(
  origin: string,
  fetchFn: (url: string) => Promise<{ ok: boolean; text: string } | null>
): Promise<RobotsRules | null> {
  try {
    const response = await fetchFn(`${origin}/robots.txt`);
    if (!response?.ok || !response.text) return null;

    const rules = parseRobotsTxt(response.text);
    logger.debug(
      { origin, allowCount: rules.allowPaths.length, disallowCount: rules.disallowPaths.length },
      'Parsed robots.txt'
    );
    return rules;
  } catch (e) {
    logger.debug({ origin, error: String(e) }, 'Failed to fetch robots.txt');
    return null;
  }
}
