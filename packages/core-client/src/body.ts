import { createReadStream } from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';
import type { Readable } from 'node:stream';

/**
 * A file sent as a streamed request body. One open handle backs every request
 * that uses it; each use reads again from the start. Transports never close it.
 */
export class FileStream {
  readonly path: string;
  private handle: FileHandle | undefined;

  constructor(path: string, handle: FileHandle) {
    this.path = path;
    this.handle = handle;
  }

  static async open(path: string): Promise<FileStream> {
    return new FileStream(path, await open(path, 'r'));
  }

  get isClosed(): boolean {
    return this.handle === undefined;
  }

  /**
   * A fresh reader positioned at byte 0. Readers share the descriptor and
   * leave it open when they end; never destroy one.
   */
  rewind(): Readable {
    if (!this.handle) {
      throw new Error(`file stream ${this.path} is closed`);
    }
    return createReadStream(this.path, { fd: this.handle.fd, start: 0, autoClose: false });
  }

  async size(): Promise<number> {
    if (!this.handle) {
      throw new Error(`file stream ${this.path} is closed`);
    }
    return (await this.handle.stat()).size;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    await handle?.close();
  }
}
