/**
 * Default filesystem collaborator over Node's synchronous `fs` API.
 *
 * Node has no portable `flock`, so the exclusive advisory lock is an atomic
 * lockfile (`<path>.lock`, created with `wx`) held for the life of the
 * session. Writers that honor the same convention exclude one another.
 *
 * Files are opened for appending and a create-mode open truncates only once
 * the lock is held, so a writer that loses the lock race leaves the file
 * intact. Opening still creates a missing target before the lock is tried,
 * so a losing writer can leave an empty file behind.
 *
 * The lockfile is not tied to the process. One left by a process that died
 * without closing blocks every later open until it is removed by hand.
 */

import * as nodeFs from 'node:fs';
import { FileMode, type FileHandle, type FileSystem, type FsModule } from './types.js';

class NodeFileHandle implements FileHandle {
  readonly path: string;
  readonly fd: number;
  lockPath: string | null = null;
  lockFd: number | null = null;
  truncateOnLock: boolean;

  constructor(path: string, fd: number, truncateOnLock: boolean) {
    this.path = path;
    this.fd = fd;
    this.truncateOnLock = truncateOnLock;
  }
}

function own(handle: FileHandle): NodeFileHandle {
  if (!(handle instanceof NodeFileHandle)) {
    throw new TypeError(`Handle for ${handle.path} was not opened by this filesystem`);
  }
  return handle;
}

/**
 * `FileSystem` backed by a Node.js `fs` compatible module.
 *
 * @param fsModule - Filesystem module (default: Node.js `node:fs`).
 * @param lockSuffix - Suffix appended to the target path for the lockfile.
 */
export class NodeFileSystem implements FileSystem {
  private _fs: FsModule;
  private _lockSuffix: string;

  constructor(fsModule: FsModule = nodeFs, lockSuffix = '.lock') {
    this._fs = fsModule;
    this._lockSuffix = lockSuffix;
  }

  open(path: string, mode: FileMode): FileHandle {
    const fd = this._fs.openSync(path, FileMode.APPEND);
    return new NodeFileHandle(path, fd, mode === FileMode.CREATE);
  }

  lockExclusive(handle: FileHandle): void {
    const h = own(handle);
    if (h.lockFd !== null) return;
    const lockPath = h.path + this._lockSuffix;
    // O_CREAT | O_EXCL: fails with EEXIST while another writer holds it
    const lockFd = this._fs.openSync(lockPath, 'wx');
    try {
      this._fs.writeSync(lockFd, new TextEncoder().encode(`${process.pid}\n`));
      if (h.truncateOnLock) {
        this._fs.ftruncateSync(h.fd, 0);
        h.truncateOnLock = false;
      }
    } catch (err) {
      try {
        this._fs.closeSync(lockFd);
      } finally {
        this._fs.unlinkSync(lockPath);
      }
      throw err;
    }
    h.lockPath = lockPath;
    h.lockFd = lockFd;
  }

  write(handle: FileHandle, data: Uint8Array): void {
    const h = own(handle);
    let offset = 0;
    while (offset < data.length) {
      offset += this._fs.writeSync(h.fd, data, offset, data.length - offset);
    }
  }

  flush(handle: FileHandle): void {
    this._fs.fsyncSync(own(handle).fd);
  }

  unlock(handle: FileHandle): void {
    const h = own(handle);
    if (h.lockFd === null || h.lockPath === null) return;
    const { lockFd, lockPath } = h;
    h.lockFd = null;
    h.lockPath = null;
    try {
      this._fs.closeSync(lockFd);
    } finally {
      this._fs.unlinkSync(lockPath);
    }
  }

  close(handle: FileHandle): void {
    this._fs.closeSync(own(handle).fd);
  }

  /** `writeSync` goes straight to the descriptor; there is no stream buffer to size. */
  setWriteBufferSize(handle: FileHandle, _size: number): void {
    own(handle);
  }
}
