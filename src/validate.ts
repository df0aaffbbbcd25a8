/**
 * Argument validation for writer configuration.
 */

import iconv from 'iconv-lite';
import { InvalidConfigurationError, type CsvRecord } from './types.js';

const FIELD_NAME = /^[A-Za-z0-9]+$/;

/**
 * Accept a non-negative integer, or null to disable buffering.
 */
export function validateBufferSize(size: unknown): number | null {
  if (size === null) return null;
  if (typeof size !== 'number' || !Number.isSafeInteger(size) || size < 0) {
    throw new InvalidConfigurationError(
      `Buffer size must be a non-negative integer or null. Given: \`${String(size)}\`.`,
    );
  }
  return size;
}

/**
 * Reject anything but a string of exactly one character.
 *
 * `label` names the setting in the error message.
 */
export function validateSingleChar(value: unknown, label: string): string {
  if (typeof value !== 'string' || [...value].length !== 1) {
    throw new InvalidConfigurationError(`${label} must be a string, exactly 1 character long.`);
  }
  return value;
}

/**
 * Header names must be a non-empty list of non-empty alphanumeric strings.
 */
export function validateFieldNames(names: unknown): string[] {
  if (!Array.isArray(names) || names.length === 0) {
    throw new InvalidConfigurationError(
      'Field names must be a non-empty array of strings.',
    );
  }
  const result: string[] = [];
  for (const name of names) {
    if (typeof name !== 'string' || !FIELD_NAME.test(name)) {
      throw new InvalidConfigurationError(
        `Field name must only contain letters and numbers: '${String(name)}'`,
      );
    }
    result.push(name);
  }
  return result;
}

export function validateEncoding(encoding: unknown): string {
  if (typeof encoding !== 'string' || !iconv.encodingExists(encoding)) {
    throw new InvalidConfigurationError(`Unknown encoding: '${String(encoding)}'`);
  }
  return encoding;
}

export function validateRecord(record: unknown): CsvRecord {
  if (!Array.isArray(record)) {
    throw new InvalidConfigurationError('Record must be an array of values.');
  }
  return record;
}
