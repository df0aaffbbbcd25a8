/**
 * Buffered text writer over a single locked file handle.
 *
 * Writes either go straight to the handle (buffer size 0) or accumulate
 * until the buffer is full, at which point the accumulated bytes are
 * written out. `flush()` additionally asks the filesystem to push the
 * handle's data to stable storage.
 */

import { EOL } from 'node:os';
import iconv from 'iconv-lite';
import { NodeFileSystem } from './nodefs.js';
import {
  EolSymbol,
  FileMode,
  IOFailureError,
  InvalidConfigurationError,
  NotOpenError,
  isEolSymbol,
  isFileMode,
  type FileHandle,
  type FileSystem,
} from './types.js';
import { validateBufferSize, validateEncoding } from './validate.js';

const DEFAULT_EOL: EolSymbol = isEolSymbol(EOL) ? EOL : EolSymbol.LF;
const DEFAULT_ENCODING = 'utf8';

interface Session {
  fs: FileSystem;
  handle: FileHandle;
  chunks: Uint8Array[];
  size: number;
}

function concatChunks(chunks: Uint8Array[]): Uint8Array {
  if (chunks.length === 0) return new Uint8Array(0);
  if (chunks.length === 1) return chunks[0];
  const total = chunks.reduce((n, c) => n + c.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.length;
  }
  return out;
}

function io<T>(action: string, path: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new IOFailureError(`Could not ${action} file ${path}.`, path, err);
  }
}

/** Write accumulated bytes to the handle. The accumulator is kept on failure. */
function drain(session: Session): void {
  if (session.size === 0) return;
  const data = concatChunks(session.chunks);
  io('write to', session.handle.path, () => session.fs.write(session.handle, data));
  session.chunks = [];
  session.size = 0;
}

function flushSession(session: Session): void {
  drain(session);
  io('flush', session.handle.path, () => session.fs.flush(session.handle));
}

/** Flush, unlock and close. Every step runs; the first failure is rethrown. */
function releaseSession(session: Session): void {
  const { fs, handle } = session;
  const steps = [
    () => flushSession(session),
    () => io('unlock', handle.path, () => fs.unlock(handle)),
    () => io('close', handle.path, () => fs.close(handle)),
  ];
  let failed = false;
  let failure: unknown;
  for (const step of steps) {
    try {
      step();
    } catch (err) {
      if (!failed) {
        failed = true;
        failure = err;
      }
    }
  }
  if (failed) throw failure;
}

// Writers dropped without close() still get their buffer written and lock released.
const abandoned = new FinalizationRegistry<Session>((session) => {
  try {
    releaseSession(session);
  } catch (err) {
    console.warn(`Failed to release abandoned writer for ${session.handle.path}:`, err);
  }
});

export interface TextWriterOptions {
  /** Filesystem collaborator (default: `NodeFileSystem` over `node:fs`). */
  fs?: FileSystem;
  /** Bytes to accumulate before writing out. 0 or null writes through. */
  bufferSize?: number | null;
  /** Line terminator appended by `writeln()` (default: the platform's). */
  eolSymbol?: EolSymbol;
  /** iconv-lite encoding label for output bytes (default: "utf8"). */
  encoding?: string;
}

/**
 * Sequential text output to one file at a time.
 *
 * @example
 * ```ts
 * const w = new TextWriter({ bufferSize: 4096, eolSymbol: EolSymbol.LF });
 * w.open('out.txt');
 * w.writeln('first line');
 * w.write('partial').writeln(' second line');
 * w.close();
 * ```
 */
export class TextWriter {
  private _fs: FileSystem;
  private _bufferSize: number | null = null;
  private _eolSymbol: EolSymbol = DEFAULT_EOL;
  private _encoding = DEFAULT_ENCODING;
  private _session: Session | null = null;

  constructor(opts: TextWriterOptions = {}) {
    this._fs = opts.fs ?? new NodeFileSystem();
    if (opts.bufferSize !== undefined) this.setBufferSize(opts.bufferSize);
    if (opts.eolSymbol !== undefined) this.setEolSymbol(opts.eolSymbol);
    if (opts.encoding !== undefined) this.setEncoding(opts.encoding);
  }

  /** Whether a file is currently open. */
  get isOpen(): boolean {
    return this._session !== null;
  }

  /** Path of the open file, or null. */
  get path(): string | null {
    return this._session?.handle.path ?? null;
  }

  /** Buffer size in bytes (0 when unbuffered). */
  getBufferSize(): number {
    return this._bufferSize ?? 0;
  }

  /**
   * Set the buffer size in bytes; null disables buffering.
   *
   * If a file is open, pending bytes are flushed under the old size first.
   *
   * @throws {InvalidConfigurationError} On negative or non-integer sizes.
   */
  setBufferSize(size: number | null): this {
    const validated = validateBufferSize(size);
    const session = this._session;
    if (session) {
      flushSession(session);
      io('resize buffer of', session.handle.path, () =>
        session.fs.setWriteBufferSize(session.handle, validated ?? 0),
      );
    }
    this._bufferSize = validated;
    return this;
  }

  getEolSymbol(): EolSymbol {
    return this._eolSymbol;
  }

  /**
   * Set the terminator for lines written from now on.
   *
   * @throws {InvalidConfigurationError} Unless one of the `EolSymbol` values.
   */
  setEolSymbol(eolSymbol: EolSymbol | string): this {
    if (!isEolSymbol(eolSymbol)) {
      throw new InvalidConfigurationError('Invalid EOL symbol. Use EolSymbol values.');
    }
    this._eolSymbol = eolSymbol;
    return this;
  }

  getEncoding(): string {
    return this._encoding;
  }

  /**
   * Transcode text written from now on to `encoding`.
   *
   * @throws {InvalidConfigurationError} If iconv-lite does not know the label.
   */
  setEncoding(encoding: string): this {
    this._encoding = validateEncoding(encoding);
    return this;
  }

  /**
   * Open `path` and take an exclusive advisory lock on it.
   *
   * Any file already open is closed first.
   *
   * @param mode - `FileMode.CREATE` truncates, `FileMode.APPEND` preserves.
   * @throws {InvalidConfigurationError} On an unknown mode, before any I/O.
   * @throws {IOFailureError} If the file cannot be opened or locked.
   */
  open(path: string, mode: FileMode | string = FileMode.CREATE): this {
    if (!isFileMode(mode)) {
      throw new InvalidConfigurationError('Invalid file mode. Use FileMode values.');
    }
    this.close();

    const fs = this._fs;
    const handle = io('open', path, () => fs.open(path, mode));
    let locked = false;
    try {
      io('lock', path, () => fs.lockExclusive(handle));
      locked = true;
      if (this._bufferSize !== null) {
        const size = this._bufferSize;
        io('resize buffer of', path, () => fs.setWriteBufferSize(handle, size));
      }
    } catch (err) {
      try {
        if (locked) io('unlock', path, () => fs.unlock(handle));
      } finally {
        io('close', path, () => fs.close(handle));
      }
      throw err;
    }

    const session: Session = { fs, handle, chunks: [], size: 0 };
    this._session = session;
    abandoned.register(this, session, session);
    return this;
  }

  /**
   * Write text. Empty or absent text is a no-op.
   *
   * @throws {NotOpenError} If no file is open.
   * @throws {IOFailureError} If writing out to the file fails.
   */
  write(text?: string | null): this {
    const session = this._requireSession();
    if (!text) return this;
    this._append(session, this._encode(text));
    return this;
  }

  /**
   * Write text followed by the EOL symbol. Absent text writes the EOL alone.
   */
  writeln(text?: string | null): this {
    this._requireSession();
    return this.write((text ?? '') + this._eolSymbol);
  }

  /**
   * Write out the buffer and push the file to stable storage.
   *
   * @throws {NotOpenError} If no file is open.
   * @throws {IOFailureError} If the write or the flush fails.
   */
  flush(): this {
    flushSession(this._requireSession());
    return this;
  }

  /**
   * Flush, unlock and close the open file. A no-op when nothing is open.
   *
   * The session is released even when the flush fails; the failure is
   * rethrown afterwards.
   */
  close(): this {
    const session = this._session;
    if (!session) return this;
    this._session = null;
    abandoned.unregister(session);
    releaseSession(session);
    return this;
  }

  private _requireSession(): Session {
    if (!this._session) throw new NotOpenError();
    return this._session;
  }

  private _encode(text: string): Uint8Array {
    if (this._encoding === DEFAULT_ENCODING) return new TextEncoder().encode(text);
    // Each write is encoded on its own; a BOM would repeat before every chunk.
    return iconv.encode(text, this._encoding, { addBOM: false });
  }

  private _append(session: Session, data: Uint8Array): void {
    const limit = this._bufferSize ?? 0;
    if (limit === 0) {
      io('write to', session.handle.path, () => session.fs.write(session.handle, data));
      return;
    }
    // Fill to capacity, write out, continue with the remainder.
    let keptChunks = session.chunks.length;
    let keptSize = session.size;
    let offset = 0;
    while (offset < data.length) {
      const end = Math.min(data.length, offset + limit - session.size);
      session.chunks.push(data.subarray(offset, end));
      session.size += end - offset;
      offset = end;
      if (session.size >= limit) {
        try {
          drain(session);
        } catch (err) {
          // Nothing of this call stays queued behind a failed write.
          session.chunks.length = keptChunks;
          session.size = keptSize;
          throw err;
        }
        keptChunks = 0;
        keptSize = 0;
      }
    }
  }
}
