/**
 * Extract module barrel exports
 */
export { extract, detectNonMarkup } from './extractor.js';
export { applyTransform, parseLeadingNumber, resolveHttpUrl } from './transforms.js';
export type {
  ExtractedRecord,
  ExtractError,
  ExtractErrorKind,
  ExtractOptions,
  ExtractOutcome,
  FieldValue,
} from './types.js';
