import type { Readable } from 'node:stream';

import type { FileStream } from './body.js';

export type PooledBody =
  | { kind: 'none' }
  | { kind: 'bytes'; payload: Uint8Array }
  | { kind: 'stream'; stream: FileStream; reader: Readable };

/**
 * Mutable wire-level request reused across calls of one request definition.
 * Every setter overwrites; nothing is merged with what a previous call left.
 */
export class PooledRequest {
  uri = '';
  method = 'GET';
  host: string | undefined;
  headers: Record<string, string> = {};
  keepAlive = true;
  body: PooledBody = { kind: 'none' };

  setRequestUri(uri: string): void {
    this.uri = uri;
  }

  setHost(host: string): void {
    this.host = host;
  }

  setHeader(name: string, value: string): void {
    this.headers[name] = value;
  }

  setMethod(method: string): void {
    this.method = method;
  }

  setKeepAlive(keepAlive: boolean): void {
    this.keepAlive = keepAlive;
  }

  setBody(payload: Uint8Array): void {
    this.body = { kind: 'bytes', payload };
  }

  /** Rewinds `stream`; throws when it can no longer be read. */
  setBodyStream(stream: FileStream): void {
    this.body = { kind: 'stream', stream, reader: stream.rewind() };
  }

  clearBody(): void {
    this.body = { kind: 'none' };
  }
}

/**
 * LIFO free list. `get` hands out an idle instance or nothing; callers build a
 * fresh one themselves when it is empty.
 */
export class RequestPool<T> {
  private readonly idle: T[] = [];

  get(): T | undefined {
    return this.idle.pop();
  }

  put(item: T): void {
    this.idle.push(item);
  }

  get size(): number {
    return this.idle.length;
  }
}
