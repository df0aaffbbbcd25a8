/**
 * CSV writer: one record per line over a `TextWriter`.
 */

import { formatRecord } from './format.js';
import { TextWriter, type TextWriterOptions } from './textwriter.js';
import {
  FileMode,
  InvalidConfigurationError,
  NotOpenError,
  SchemaViolationError,
  isFileMode,
  type CsvRecord,
  type EolSymbol,
} from './types.js';
import { validateFieldNames, validateRecord, validateSingleChar } from './validate.js';

export interface CsvWriterOptions extends TextWriterOptions {
  /** Field separator (default: ","). */
  delimiter?: string;
  /** Quote character (default: '"'). */
  enclosure?: string;
}

/**
 * Writes records as delimited lines, optionally under a fixed header.
 *
 * Delimiter and enclosure belong to the writer and survive `close()`. The
 * header schema belongs to the open file and is dropped on `close()`.
 *
 * @example
 * ```ts
 * const csv = new CsvWriter({ eolSymbol: EolSymbol.LF });
 * csv.openWithFieldNames('people.csv', ['name', 'city']);
 * csv.write(['Ada', 'London']);
 * csv.write(['Grace', 'New York, NY']);
 * csv.close();
 * // name,city
 * // Ada,London
 * // Grace,"New York, NY"
 * ```
 */
export class CsvWriter {
  private _text: TextWriter;
  private _delimiter = ',';
  private _enclosure = '"';
  private _fieldNames: string[] | null = null;

  constructor(opts: CsvWriterOptions = {}) {
    const { delimiter, enclosure, ...textOpts } = opts;
    if (delimiter !== undefined) this.setDelimiter(delimiter);
    if (enclosure !== undefined) this.setEnclosure(enclosure);
    this._text = new TextWriter(textOpts);
  }

  /** Whether a file is currently open. */
  get isOpen(): boolean {
    return this._text.isOpen;
  }

  /** Path of the open file, or null. */
  get path(): string | null {
    return this._text.path;
  }

  getDelimiter(): string {
    return this._delimiter;
  }

  /** @throws {InvalidConfigurationError} Unless exactly one character. */
  setDelimiter(delimiter: string): this {
    this._delimiter = validateSingleChar(delimiter, 'Delimiter');
    return this;
  }

  getEnclosure(): string {
    return this._enclosure;
  }

  /** @throws {InvalidConfigurationError} Unless exactly one character. */
  setEnclosure(enclosure: string): this {
    this._enclosure = validateSingleChar(enclosure, 'Enclosure');
    return this;
  }

  getBufferSize(): number {
    return this._text.getBufferSize();
  }

  setBufferSize(size: number | null): this {
    this._text.setBufferSize(size);
    return this;
  }

  getEolSymbol(): EolSymbol {
    return this._text.getEolSymbol();
  }

  setEolSymbol(eolSymbol: EolSymbol | string): this {
    this._text.setEolSymbol(eolSymbol);
    return this;
  }

  getEncoding(): string {
    return this._text.getEncoding();
  }

  setEncoding(encoding: string): this {
    this._text.setEncoding(encoding);
    return this;
  }

  /** Active header names, or null when the file was opened without them. */
  getFieldNames(): string[] | null {
    return this._fieldNames ? [...this._fieldNames] : null;
  }

  /** Number of header fields, 0 when no header is active. */
  getFieldNamesCount(): number {
    return this._fieldNames?.length ?? 0;
  }

  /**
   * Open a file without a header. Any open file is closed first.
   *
   * @throws {InvalidConfigurationError} On an unknown mode, leaving the
   *   current file and its header untouched.
   */
  open(path: string, mode: FileMode | string = FileMode.CREATE): this {
    if (!isFileMode(mode)) {
      throw new InvalidConfigurationError('Invalid file mode. Use FileMode values.');
    }
    this._fieldNames = null;
    this._text.open(path, mode);
    return this;
  }

  /**
   * Open a file under a header. Every later record must have as many fields.
   *
   * In `FileMode.CREATE` the header is written as the first line. In
   * `FileMode.APPEND` it is assumed to be in the file already and only the
   * field count is enforced.
   *
   * @throws {InvalidConfigurationError} If `names` is empty or a name is not
   *   alphanumeric. Checked before the file is touched.
   */
  openWithFieldNames(
    path: string,
    names: readonly string[],
    mode: FileMode | string = FileMode.CREATE,
  ): this {
    const fieldNames = validateFieldNames(names);
    this.open(path, mode);
    if (mode === FileMode.CREATE) this.write(fieldNames);
    this._fieldNames = fieldNames;
    return this;
  }

  /**
   * Write one record as a line. An absent record writes an empty line.
   *
   * @throws {NotOpenError} If no file is open.
   * @throws {InvalidConfigurationError} If `record` is not an array.
   * @throws {SchemaViolationError} If a header is active and the field count differs.
   */
  write(record?: CsvRecord | null): this {
    if (!this._text.isOpen) throw new NotOpenError();
    const values = validateRecord(record ?? []);
    if (this._fieldNames && values.length !== this._fieldNames.length) {
      throw new SchemaViolationError(this._fieldNames.length, values.length);
    }
    this._text.writeln(formatRecord(values, this._delimiter, this._enclosure));
    return this;
  }

  /** Same as `write()`; every record ends its line. */
  writeln(record?: CsvRecord | null): this {
    return this.write(record);
  }

  /** Write each record in turn. */
  writeRecords(records: Iterable<CsvRecord>): this {
    for (const record of records) this.write(record);
    return this;
  }

  flush(): this {
    this._text.flush();
    return this;
  }

  /**
   * Close the file and drop the header schema, even if the final flush fails.
   */
  close(): this {
    try {
      this._text.close();
    } finally {
      this._fieldNames = null;
    }
    return this;
  }
}
