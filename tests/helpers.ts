import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileMode, type FileHandle, type FileSystem } from '../src/index.js';

const dec = new TextDecoder();

export function fromBytes(b: Uint8Array): string {
  return dec.decode(b);
}

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'csvwriter-test-'));
}

export function rmTmpDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

class MemoryHandle implements FileHandle {
  readonly path: string;
  closed = false;
  locked = false;
  constructor(path: string) {
    this.path = path;
  }
}

function own(handle: FileHandle): MemoryHandle {
  if (!(handle instanceof MemoryHandle)) throw new TypeError('foreign handle');
  if (handle.closed) throw new Error(`handle closed: ${handle.path}`);
  return handle;
}

/**
 * In-process FileSystem. Records every call and can be told to fail.
 */
export class MemoryFileSystem implements FileSystem {
  files = new Map<string, Uint8Array>();
  locks = new Set<string>();
  /** One entry per call, e.g. `open /a.csv w`, `write /a.csv 4`. */
  calls: string[] = [];
  /** Decoded payload of each `write()` call. */
  writes: string[] = [];
  openHandles = 0;
  fail: { open?: boolean; write?: boolean; flush?: boolean; unlock?: boolean } = {};

  open(path: string, mode: FileMode): FileHandle {
    this.calls.push(`open ${path} ${mode}`);
    if (this.fail.open) throw new Error(`EACCES: permission denied, open '${path}'`);
    if (mode === FileMode.CREATE || !this.files.has(path)) {
      this.files.set(path, new Uint8Array(0));
    }
    this.openHandles++;
    return new MemoryHandle(path);
  }

  lockExclusive(handle: FileHandle): void {
    const h = own(handle);
    this.calls.push(`lock ${h.path}`);
    if (this.locks.has(h.path)) throw new Error(`EEXIST: lock held, '${h.path}'`);
    this.locks.add(h.path);
    h.locked = true;
  }

  write(handle: FileHandle, data: Uint8Array): void {
    const h = own(handle);
    this.calls.push(`write ${h.path} ${data.length}`);
    if (this.fail.write) throw new Error('ENOSPC: no space left on device');
    const prev = this.files.get(h.path) ?? new Uint8Array(0);
    const next = new Uint8Array(prev.length + data.length);
    next.set(prev, 0);
    next.set(data, prev.length);
    this.files.set(h.path, next);
    this.writes.push(fromBytes(data));
  }

  flush(handle: FileHandle): void {
    const h = own(handle);
    this.calls.push(`flush ${h.path}`);
    if (this.fail.flush) throw new Error('EIO: i/o error, fsync');
  }

  unlock(handle: FileHandle): void {
    const h = own(handle);
    this.calls.push(`unlock ${h.path}`);
    if (this.fail.unlock) throw new Error(`EPERM: operation not permitted, unlink '${h.path}.lock'`);
    if (h.locked) {
      this.locks.delete(h.path);
      h.locked = false;
    }
  }

  close(handle: FileHandle): void {
    const h = own(handle);
    this.calls.push(`close ${h.path}`);
    h.closed = true;
    this.openHandles--;
  }

  setWriteBufferSize(handle: FileHandle, size: number): void {
    const h = own(handle);
    this.calls.push(`buffer ${h.path} ${size}`);
  }

  bytes(path: string): Uint8Array {
    const data = this.files.get(path);
    if (!data) throw new Error(`no such file: ${path}`);
    return data;
  }

  read(path: string): string {
    return fromBytes(this.bytes(path));
  }
}

/** Parse one CSV line back into fields. */
export function parseLine(line: string, delimiter: string, enclosure: string): string[] {
  const fields: string[] = [];
  let field = '';
  let inQuotes = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === enclosure) {
        if (line[i + 1] === enclosure) {
          field += enclosure;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
    } else if (ch === enclosure) {
      inQuotes = true;
    } else if (ch === delimiter) {
      fields.push(field);
      field = '';
    } else {
      field += ch;
    }
  }
  fields.push(field);
  return fields;
}
