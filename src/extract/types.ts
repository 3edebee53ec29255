/**
 * Shared types for the extract module
 */
import type { ScrapeType } from '../rules/types.js';

export type FieldValue = string | readonly string[];

/** Structured result for one document. Never mutated once created. */
export interface ExtractedRecord {
  readonly sourceUrl: string;
  readonly scrapeType: ScrapeType;
  /** Absent fields are omitted; multiple fields hold values in document order */
  readonly fields: Readonly<Record<string, FieldValue>>;
  /** Fields left absent because their transform failed */
  readonly failedFields: readonly string[];
  /** Case-insensitive occurrence count per requested keyword */
  readonly keywordCounts?: Readonly<Record<string, number>>;
}

export type ExtractErrorKind = 'parse_failure' | 'required_field_missing';

export interface ExtractError {
  kind: ExtractErrorKind;
  message: string;
  fieldName?: string;
}

export type ExtractOutcome =
  | { success: true; record: ExtractedRecord }
  | { success: false; error: ExtractError };

export interface ExtractOptions {
  scrapeType?: ScrapeType;
  /** Cap on values kept for each multiple field */
  maxItems?: number;
  /** Count these keywords in the page text */
  keywords?: readonly string[];
}
