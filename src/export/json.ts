/**
 * JSON and JSON Lines rendering
 */
import type { ExtractedRecord, FieldValue } from '../extract/types.js';
import { collectFieldNames } from './csv.js';

export interface SerializedRecord {
  source_url: string;
  scrape_type: string;
  fields: Record<string, FieldValue | null>;
  failed_fields?: readonly string[];
  keyword_counts?: Readonly<Record<string, number>>;
}

/** Every record carries the same field keys; missing ones are null. */
export function serializeRecords(records: readonly ExtractedRecord[]): SerializedRecord[] {
  const fieldNames = collectFieldNames(records);
  return records.map((record) => {
    const fields: Record<string, FieldValue | null> = {};
    for (const name of fieldNames) fields[name] = record.fields[name] ?? null;
    return {
      source_url: record.sourceUrl,
      scrape_type: record.scrapeType,
      fields,
      ...(record.failedFields.length > 0 ? { failed_fields: record.failedFields } : {}),
      ...(record.keywordCounts ? { keyword_counts: record.keywordCounts } : {}),
    };
  });
}

export function toJson(records: readonly ExtractedRecord[]): string {
  return JSON.stringify(serializeRecords(records), null, 2) + '\n';
}

export function toJsonLines(items: readonly unknown[]): string {
  return items.map((item) => JSON.stringify(item) + '\n').join('');
}
