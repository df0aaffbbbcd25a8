/**
 * textcsv-writer — buffered text and CSV file writers.
 *
 * @example
 * ```ts
 * import { CsvWriter, EolSymbol, FileMode } from 'textcsv-writer';
 *
 * const csv = new CsvWriter({ bufferSize: 8192, eolSymbol: EolSymbol.LF });
 * csv.openWithFieldNames('report.csv', ['id', 'label']);
 * csv.write([1, 'first']);
 * csv.write([2, 'needs, quoting']);
 * csv.close();
 *
 * // Later: add rows under the same header without rewriting it
 * csv.openWithFieldNames('report.csv', ['id', 'label'], FileMode.APPEND);
 * csv.write([3, 'third']);
 * csv.close();
 * ```
 */

// Writers
export { TextWriter, type TextWriterOptions } from './textwriter.js';
export { CsvWriter, type CsvWriterOptions } from './csvwriter.js';
export { withWriter, type Closable } from './scope.js';

// Filesystem
export { NodeFileSystem } from './nodefs.js';

// Types and data structures
export {
  // Enums
  FileMode,
  EolSymbol,
  isFileMode,
  isEolSymbol,

  // Errors
  CsvWriterError,
  InvalidConfigurationError,
  NotOpenError,
  IOFailureError,
  SchemaViolationError,

  // Data structures
  type CsvValue,
  type CsvRecord,
  type FileHandle,
  type FileSystem,
  type FsModule,
} from './types.js';

// Formatting (usable standalone)
export { formatField, formatRecord, valueToText } from './format.js';
