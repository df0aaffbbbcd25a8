/**
 * CSV field and record formatting.
 */

import type { CsvRecord, CsvValue } from './types.js';

/**
 * Cast a value to its text form. Null and undefined become empty strings,
 * dates become ISO-8601.
 */
export function valueToText(value: CsvValue): string {
  if (value == null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Format one field. The field is wrapped in `enclosure` when it contains the
 * delimiter, the enclosure, or a line break; embedded enclosures are doubled.
 */
export function formatField(value: CsvValue, delimiter: string, enclosure: string): string {
  const text = valueToText(value);
  if (
    text.includes(delimiter) ||
    text.includes(enclosure) ||
    text.includes('\n') ||
    text.includes('\r')
  ) {
    return enclosure + text.split(enclosure).join(enclosure + enclosure) + enclosure;
  }
  return text;
}

/**
 * Format a record as one line, without a line terminator.
 *
 * @example
 * ```ts
 * formatRecord(['a,a', 'b'], ',', '"'); // '"a,a",b'
 * ```
 */
export function formatRecord(record: CsvRecord, delimiter: string, enclosure: string): string {
  return record.map((v) => formatField(v, delimiter, enclosure)).join(delimiter);
}
