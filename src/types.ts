/**
 * Shared types, constants, enums, and error classes for the writers.
 */

// ---------------------------------------------------------------------------
// FileMode enum
// ---------------------------------------------------------------------------

export const FileMode = {
  /** Create the file, truncating existing content. */
  CREATE: 'w',
  /** Append to existing content, creating the file if missing. */
  APPEND: 'a',
} as const;

export type FileMode = (typeof FileMode)[keyof typeof FileMode];

const FILE_MODES: ReadonlySet<string> = new Set(Object.values(FileMode));

export function isFileMode(value: unknown): value is FileMode {
  return typeof value === 'string' && FILE_MODES.has(value);
}

// ---------------------------------------------------------------------------
// EolSymbol enum
// ---------------------------------------------------------------------------

export const EolSymbol = {
  CRLF: '\r\n',
  LF: '\n',
  CR: '\r',
} as const;

export type EolSymbol = (typeof EolSymbol)[keyof typeof EolSymbol];

const EOL_SYMBOLS: ReadonlySet<string> = new Set(Object.values(EolSymbol));

export function isEolSymbol(value: unknown): value is EolSymbol {
  return typeof value === 'string' && EOL_SYMBOLS.has(value);
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** A single field value. Cast to text when the record is written. */
export type CsvValue = string | number | bigint | boolean | Date | null | undefined;

/** One row: an ordered sequence of field values. */
export type CsvRecord = readonly CsvValue[];

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class CsvWriterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CsvWriterError';
  }
}

/** Malformed setter argument, mode, EOL, header name, or record shape. */
export class InvalidConfigurationError extends CsvWriterError {
  code = 'EINVAL';
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

export class NotOpenError extends CsvWriterError {
  code = 'ENOTOPEN';
  constructor() {
    super('No writable file opened.');
    this.name = 'NotOpenError';
  }
}

export class IOFailureError extends CsvWriterError {
  code = 'EIO';
  readonly path: string;
  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'IOFailureError';
    this.path = path;
  }
}

export class SchemaViolationError extends CsvWriterError {
  code = 'ESCHEMA';
  readonly expected: number;
  readonly actual: number;
  constructor(expected: number, actual: number) {
    super(`Record must have exactly ${expected} fields, got ${actual}.`);
    this.name = 'SchemaViolationError';
    this.expected = expected;
    this.actual = actual;
  }
}

// ---------------------------------------------------------------------------
// Filesystem collaborator
// ---------------------------------------------------------------------------

/** Opaque open file, owned by the `FileSystem` that returned it. */
export interface FileHandle {
  readonly path: string;
}

/**
 * The filesystem surface the writers call through.
 *
 * Every method is synchronous and throws on failure. The writers never touch
 * a path except through this interface, so an in-memory implementation can
 * stand in for the disk.
 */
export interface FileSystem {
  open(path: string, mode: FileMode): FileHandle;
  /** Take an exclusive advisory lock. Throws if another holder has it. */
  lockExclusive(handle: FileHandle): void;
  write(handle: FileHandle, data: Uint8Array): void;
  /** Push the handle's data to stable storage. */
  flush(handle: FileHandle): void;
  unlock(handle: FileHandle): void;
  close(handle: FileHandle): void;
  setWriteBufferSize(handle: FileHandle, size: number): void;
}

/**
 * The synchronous subset of Node's `fs` module used by `NodeFileSystem`.
 * Compatible with `node:fs`.
 */
export interface FsModule {
  openSync(path: string, flags: string, mode?: number): number;
  writeSync(fd: number, buffer: Uint8Array, offset?: number, length?: number): number;
  ftruncateSync(fd: number, len?: number): void;
  fsyncSync(fd: number): void;
  closeSync(fd: number): void;
  unlinkSync(path: string): void;
}
