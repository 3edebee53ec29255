/**
 * CSV rendering of extracted records
 */
import type { ExtractedRecord, FieldValue } from '../extract/types.js';

const LIST_SEPARATOR = '; ';

/** Field names across all records, in first-seen order. */
export function collectFieldNames(records: readonly ExtractedRecord[]): string[] {
  const names = new Set<string>();
  for (const record of records) {
    for (const name of Object.keys(record.fields)) names.add(name);
  }
  return [...names];
}

export function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value)) return '"' + value.replace(/"/g, '""') + '"';
  return value;
}

function cell(value: FieldValue | undefined): string {
  if (value === undefined) return '';
  return csvEscape(typeof value === 'string' ? value : value.join(LIST_SEPARATOR));
}

/**
 * One row per record. Lists are joined with "; ", missing fields are empty.
 * Returns an empty string when there are no records.
 */
export function toCsv(records: readonly ExtractedRecord[]): string {
  if (records.length === 0) return '';
  const fieldNames = collectFieldNames(records);
  const header = ['source_url', 'scrape_type', ...fieldNames].map(csvEscape).join(',');

  const rows = records.map((record) =>
    [
      csvEscape(record.sourceUrl),
      csvEscape(record.scrapeType),
      ...fieldNames.map((name) => cell(record.fields[name])),
    ].join(',')
  );

  return [header, ...rows].join('\r\n') + '\r\n';
}
