import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';

import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import type { Logger, LoggerContext } from '@loadwire/core-logging';

import { createRequest, FileStream, methodSendsBody, RequestPool, type PooledRequest } from '../src/index.js';

type LogEntry = Record<string, unknown>;

const createMemoryLogger = (sink: LogEntry[]): Logger => {
  const write = (level: string) => (message: string, extra?: LoggerContext) => {
    sink.push({ level, message, ...extra });
  };
  const logger: Logger = {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: () => logger
  };
  return logger;
};

const readerOf = (request: PooledRequest): Readable => {
  if (request.body.kind !== 'stream') throw new Error(`expected a stream body, got ${request.body.kind}`);
  return request.body.reader;
};

let dir: string;
let filePath: string;

beforeAll(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'loadwire-request-'));
  filePath = path.join(dir, 'payload.txt');
  await writeFile(filePath, 'streamed payload');
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('RequestPool', () => {
  it('hands out the most recently returned instance first', () => {
    const pool = new RequestPool<string>();
    expect(pool.get()).toBeUndefined();

    pool.put('a');
    pool.put('b');
    expect(pool.size).toBe(2);
    expect(pool.get()).toBe('b');
    expect(pool.get()).toBe('a');
    expect(pool.size).toBe(0);
  });
});

describe('methodSendsBody', () => {
  it('is false only for GET and HEAD', () => {
    expect(['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'].map(methodSendsBody)).toEqual([
      false,
      false,
      true,
      true,
      true,
      true,
      true
    ]);
  });
});

describe('RequestDefinition', () => {
  it('builds a fresh request from the definition', () => {
    const logger = createMemoryLogger([]);
    const definition = createRequest('http://localhost/items', {
      host: 'api.example.test',
      headers: { 'X-Trace': 'abc' },
      disableKeepAlive: true,
      body: 'payload'
    });

    const request = definition.acquire('POST', logger);

    expect(request.uri).toBe('http://localhost/items');
    expect(request.method).toBe('POST');
    expect(request.host).toBe('api.example.test');
    expect(request.headers).toEqual({ 'X-Trace': 'abc' });
    expect(request.keepAlive).toBe(false);
    expect(request.body).toEqual({ kind: 'bytes', payload: Buffer.from('payload') });
  });

  it('resets method and body when reusing a pooled request', () => {
    const logger = createMemoryLogger([]);
    const definition = createRequest('http://localhost/items', { body: 'payload' });

    const first = definition.acquire('POST', logger);
    definition.release(first);
    const second = definition.acquire('GET', logger);

    expect(second).toBe(first);
    expect(second.method).toBe('GET');
    expect(second.body).toEqual({ kind: 'none' });
    expect(definition.pool.size).toBe(0);

    definition.release(second);
    const third = definition.acquire('PUT', logger);
    expect(third.method).toBe('PUT');
    expect(third.body).toEqual({ kind: 'bytes', payload: Buffer.from('payload') });
  });

  it('rewinds a file body for every acquisition', async () => {
    const logger = createMemoryLogger([]);
    const stream = await FileStream.open(filePath);
    try {
      const definition = createRequest('http://localhost/upload', { body: stream });

      const first = definition.acquire('POST', logger);
      const firstReader = readerOf(first);
      expect((await buffer(firstReader)).toString()).toBe('streamed payload');
      definition.release(first);

      const second = definition.acquire('POST', logger);
      const secondReader = readerOf(second);
      expect(secondReader).not.toBe(firstReader);
      expect((await buffer(secondReader)).toString()).toBe('streamed payload');
      expect(stream.isClosed).toBe(false);
    } finally {
      await stream.close();
    }
  });

  it('logs and keeps the pooled request when the file can no longer be read', async () => {
    const entries: LogEntry[] = [];
    const logger = createMemoryLogger(entries);
    const stream = await FileStream.open(filePath);
    const definition = createRequest('http://localhost/upload', { body: stream });

    definition.release(definition.acquire('POST', logger));
    await stream.close();

    expect(() => definition.acquire('POST', logger)).toThrow(`file stream ${filePath} is closed`);
    expect(definition.pool.size).toBe(1);
    expect(entries).toEqual([
      expect.objectContaining({
        level: 'error',
        message: 'failed to rewind body stream',
        url: 'http://localhost/upload',
        method: 'POST',
        path: filePath
      })
    ]);
  });
});
