/**
 * Apply selector rules to a fetched document and build one record.
 *
 * `extract` is a pure function of its inputs: the same document and rule
 * set always produce an identical record.
 */
import { parseHTML } from 'linkedom';
import type { FetchedDocument } from '../fetch/types.js';
import { ruleTransform } from '../rules/selector-rule.js';
import type { SelectorRule } from '../rules/types.js';
import { logger } from '../logger.js';
import { applyTransform } from './transforms.js';
import type {
  ExtractedRecord,
  ExtractError,
  ExtractOptions,
  ExtractOutcome,
  FieldValue,
} from './types.js';
import { countOccurrences, NON_CONTENT_SELECTORS, normalizeWhitespace, toFullDocument } from './utils.js';

const MARKUP_CONTENT_TYPES = [
  'text/html',
  'application/xhtml+xml',
  'text/xml',
  'application/xml',
];

function isMarkupContentType(contentType: string): boolean {
  const mime = contentType.split(';')[0].trim().toLowerCase();
  return MARKUP_CONTENT_TYPES.includes(mime) || mime.endsWith('+xml');
}

/**
 * Reason the document cannot be treated as structured markup, or null.
 */
export function detectNonMarkup(document: FetchedDocument): string | null {
  const raw = document.rawContent;
  if (!raw.trim()) return 'Document is empty';
  if (document.contentType && !isMarkupContentType(document.contentType)) {
    return `Unsupported content type: ${document.contentType}`;
  }
  if (raw.includes('\0')) return 'Document contains binary data';
  if (!/<[a-zA-Z!?/]/.test(raw)) return 'Document contains no markup';
  return null;
}

type FieldResult =
  | { kind: 'value'; value: FieldValue }
  | { kind: 'absent' }
  | { kind: 'transform_failed' };

function extractField(
  dom: Document,
  rule: SelectorRule,
  baseUrl: string,
  maxItems: number
): FieldResult {
  const transform = ruleTransform(rule);

  if (!rule.multiple) {
    const element = dom.querySelector(rule.path);
    if (!element) return { kind: 'absent' };
    const result = applyTransform(element, transform, baseUrl);
    if (!result.ok) return { kind: 'transform_failed' };
    return result.value === null ? { kind: 'absent' } : { kind: 'value', value: result.value };
  }

  const values: string[] = [];
  for (const element of dom.querySelectorAll(rule.path)) {
    if (values.length >= maxItems) break;
    const result = applyTransform(element, transform, baseUrl);
    if (!result.ok) return { kind: 'transform_failed' };
    if (result.value !== null) values.push(result.value);
  }
  return { kind: 'value', value: Object.freeze(values) };
}

function countKeywords(dom: Document, keywords: readonly string[]): Record<string, number> {
  for (const selector of NON_CONTENT_SELECTORS) {
    for (const el of dom.querySelectorAll(selector)) el.remove();
  }
  const text = normalizeWhitespace(dom.body?.textContent ?? dom.documentElement?.textContent);

  const counts: Record<string, number> = {};
  for (const keyword of keywords) {
    counts[keyword] = countOccurrences(text, keyword);
  }
  return counts;
}

function failure(error: ExtractError): ExtractOutcome {
  return { success: false, error };
}

/**
 * Extract a record from `document` using `selectors`.
 *
 * Fails the whole record only when the document is not markup, or when a
 * required field has no value. A field whose transform fails is left
 * absent and listed in `failedFields`.
 */
export function extract(
  document: FetchedDocument,
  selectors: readonly SelectorRule[],
  options: ExtractOptions = {}
): ExtractOutcome {
  const notMarkup = detectNonMarkup(document);
  if (notMarkup) {
    return failure({ kind: 'parse_failure', message: notMarkup });
  }

  let dom: Document;
  try {
    dom = parseHTML(toFullDocument(document.rawContent)).document;
  } catch (e) {
    return failure({ kind: 'parse_failure', message: `Failed to parse document: ${String(e)}` });
  }

  const baseUrl = document.finalUrl || document.url;
  const maxItems = options.maxItems ?? Infinity;
  const fields: Record<string, FieldValue> = {};
  const failedFields: string[] = [];

  for (const rule of selectors) {
    let result: FieldResult;
    try {
      result = extractField(dom, rule, baseUrl, maxItems);
    } catch (e) {
      // Rules built through createSelectorRule never get here; plain-data rules might
      logger.debug({ url: document.url, field: rule.fieldName, error: String(e) }, 'Selector evaluation failed');
      result = { kind: 'transform_failed' };
    }

    if (result.kind === 'transform_failed') {
      failedFields.push(rule.fieldName);
    } else if (result.kind === 'value') {
      fields[rule.fieldName] = result.value;
    }

    if (rule.required && (result.kind !== 'value' || result.value.length === 0)) {
      return failure({
        kind: 'required_field_missing',
        fieldName: rule.fieldName,
        message: `Required field "${rule.fieldName}" has no value`,
      });
    }
  }

  const record: ExtractedRecord = {
    sourceUrl: document.url,
    scrapeType: options.scrapeType ?? 'generic',
    fields: Object.freeze(fields),
    failedFields: Object.freeze(failedFields),
    ...(options.keywords && options.keywords.length > 0
      ? { keywordCounts: Object.freeze(countKeywords(dom, options.keywords)) }
      : {}),
  };

  return { success: true, record: Object.freeze(record) };
}
