export { toCsv, csvEscape, collectFieldNames } from './csv.js';
export { toJson, toJsonLines, serializeRecords } from './json.js';
export type { SerializedRecord } from './json.js';
