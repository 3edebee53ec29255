/**
 * Value derivation for a matched element
 */
import type { Transform } from '../rules/types.js';
import { normalizeWhitespace } from './utils.js';

/**
 * `ok: false` means the transform could not produce a value (an unparsable
 * number). `value: null` means there is nothing to extract (missing attribute).
 */
export type TransformResult = { ok: true; value: string | null } | { ok: false };

const LEADING_CURRENCY = /^[$€£¥₹]\s*/;
const NUMBER_PATTERN = /^[+-]?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?|^[+-]?\.\d+/;

/**
 * Parse the leading numeric part of a string, allowing one currency
 * symbol in front and thousands separators: "$1,299.50 incl. VAT" -> "1299.5".
 * Returns null when the text does not start with a number.
 */
export function parseLeadingNumber(text: string): string | null {
  const candidate = text.trim().replace(LEADING_CURRENCY, '');
  const match = NUMBER_PATTERN.exec(candidate);
  if (!match) return null;

  return canonicalDecimal(match[0].replace(/,/g, ''));
}

/**
 * Canonical decimal text without a float round-trip, so long IDs keep
 * every digit: "+007.50" -> "7.5", "-0.0" -> "0", ".5" -> "0.5".
 */
function canonicalDecimal(raw: string): string {
  const negative = raw.startsWith('-');
  const unsigned = raw.replace(/^[+-]/, '');
  const [intPart, fracPart = ''] = unsigned.split('.');
  const integer = intPart.replace(/^0+/, '') || '0';
  const fraction = fracPart.replace(/0+$/, '');
  const digits = fraction ? `${integer}.${fraction}` : integer;
  return negative && digits !== '0' ? `-${digits}` : digits;
}

/**
 * Resolve a link against the document URL. Only http(s) URLs are kept;
 * fragments are dropped.
 */
export function resolveHttpUrl(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed) return null;
  try {
    const resolved = new URL(trimmed, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
    resolved.hash = '';
    return resolved.href;
  } catch {
    return null;
  }
}

export function applyTransform(element: Element, transform: Transform, baseUrl: string): TransformResult {
  switch (transform.kind) {
    case 'text':
      return { ok: true, value: normalizeWhitespace(element.textContent) };
    case 'attribute':
      return { ok: true, value: element.getAttribute(transform.name) };
    case 'number': {
      const value = parseLeadingNumber(normalizeWhitespace(element.textContent));
      return value === null ? { ok: false } : { ok: true, value };
    }
    case 'url': {
      const href = element.getAttribute(transform.name);
      return { ok: true, value: href === null ? null : resolveHttpUrl(href, baseUrl) };
    }
  }
}
