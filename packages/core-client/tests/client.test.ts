import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { createServer, type IncomingHttpHeaders, type Server } from 'node:http';
import { createServer as createNetServer } from 'node:net';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import { gzipSync } from 'node:zlib';

import express from 'express';
import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';

import { ClassifiedError, RequestUrlError } from '@loadwire/core-errors';
import type { Logger, LoggerContext } from '@loadwire/core-logging';
import { BufferedSampleSink, expectedStatuses, TagsAndMeta, type Sample } from '@loadwire/core-metrics';

import {
  createClient,
  createRequest,
  FileStream,
  type Client,
  type ClientOptions,
  type HttpTransport,
  type TransportResponse
} from '../src/index.js';

type LogEntry = Record<string, unknown>;

type ReceivedRequest = {
  method: string;
  path: string;
  headers: IncomingHttpHeaders;
  body: string;
};

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

type Closable = { close(callback: (error?: Error) => void): unknown };

const closeServer = (server: Closable): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

const portOf = (address: ReturnType<Server['address']>): number => {
  if (address === null || typeof address === 'string') throw new Error('server has no TCP address');
  return address.port;
};

/** A port nothing listens on. */
async function unusedPort(): Promise<number> {
  const probe = createNetServer();
  await new Promise<void>((resolve) => probe.listen(0, '127.0.0.1', resolve));
  const port = portOf(probe.address());
  await closeServer(probe);
  return port;
}

/** Answers each URI from the script; the body streams stay under the test's control. */
function scriptedTransport(script: Record<string, () => TransportResponse>): HttpTransport {
  return {
    roundTrip: async (request) => {
      const respond = script[request.uri];
      if (!respond) throw new RequestUrlError(request.method, request.uri, new Error('unscripted request'));
      return respond();
    },
    close: () => undefined
  };
}

const scripted = (status: number, body: PassThrough): TransportResponse => ({
  status,
  statusText: '',
  proto: 'HTTP/1.1',
  headers: {},
  body,
  connDuration: 0
});

const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

const statusAndError = (client: { sink: BufferedSampleSink }) =>
  client.sink.batches().map((batch) => {
    const tags = batch.getSamples()[0]?.tags;
    return [tags?.url, tags?.status, tags?.error];
  });

const metricNames = (samples: readonly Sample[]) => samples.map((sample) => sample.metric.name);

let server: Server;
let baseUrl: string;
let dir: string;
const received: ReceivedRequest[] = [];
const clients: Client[] = [];

beforeAll(async () => {
  const app = express();

  app.use((req, _res, next) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      received.push({
        method: req.method,
        path: req.path,
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf8')
      });
      next();
    });
  });

  app.get('/missing', (_req, res) => {
    res.status(404).type('text/plain').send('not here');
  });

  app.get('/gzip', (_req, res) => {
    res.set('Content-Encoding', 'gzip').type('text/plain').send(gzipSync('squeezed'));
  });

  app.get('/corrupt', (_req, res) => {
    res.set('Content-Encoding', 'gzip').type('text/plain').send(Buffer.from('not gzip at all'));
  });

  app.get('/hang', () => {
    // never answers
  });

  app.use((req, res) => {
    res.status(200).type('text/plain').send(`ok ${req.method}`);
  });

  server = createServer(app);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  baseUrl = `http://127.0.0.1:${portOf(server.address())}`;
  dir = await mkdtemp(path.join(tmpdir(), 'loadwire-client-'));
});

afterEach(() => {
  for (const client of clients.splice(0)) {
    client.close();
  }
  received.length = 0;
});

afterAll(async () => {
  server.closeAllConnections();
  await closeServer(server);
  await rm(dir, { recursive: true, force: true });
});

function setup(options: ClientOptions = {}) {
  const sink = new BufferedSampleSink();
  const entries: LogEntry[] = [];
  const client = createClient({ sink, logger: createMemoryLogger(entries), ...options });
  clients.push(client);
  return { client, sink, entries };
}

describe('Client', () => {
  describe('round trips', () => {
    it('sends a GET and reads the body as text', async () => {
      const { client } = setup();
      const url = `${baseUrl}/hello`;

      const res = await client.get(createRequest(url));

      expect(res).toMatchObject({
        url,
        status: 200,
        statusText: 'OK',
        proto: 'HTTP/1.1',
        body: 'ok GET',
        remoteIp: '127.0.0.1',
        remotePort: Number(new URL(baseUrl).port)
      });
      expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
      expect(res.errorCode).toBeUndefined();
      expect(res.error).toBeUndefined();
      expect(res.timings.duration).toBeGreaterThan(0);
      expect(received).toEqual([expect.objectContaining({ method: 'GET', path: '/hello', body: '' })]);
    });

    it('keeps a failing status as a response with a status error code', async () => {
      const { client } = setup();

      const res = await client.get(createRequest(`${baseUrl}/missing`));

      expect(res.status).toBe(404);
      expect(res.body).toBe('not here');
      expect(res.errorCode).toBe(1404);
    });

    it('reads HEAD responses as empty', async () => {
      const { client } = setup();

      const res = await client.head(createRequest(`${baseUrl}/hello`));

      expect(res.status).toBe(200);
      expect(res.body).toBe('');
      expect(received[0]?.method).toBe('HEAD');
    });

    it('returns raw bytes or nothing depending on the response type', async () => {
      const { client } = setup();

      const binary = await client.get(createRequest(`${baseUrl}/bytes`, { responseType: 'binary' }));
      const none = await client.get(createRequest(`${baseUrl}/skipped`, { responseType: 'none' }));

      expect(binary.body).toEqual(new Uint8Array(Buffer.from('ok GET')));
      expect(none.status).toBe(200);
      expect(none.body).toBeUndefined();
    });

    it('decompresses encoded bodies', async () => {
      const { client } = setup();

      const res = await client.get(createRequest(`${baseUrl}/gzip`));

      expect(res.body).toBe('squeezed');
    });
  });

  describe('request building', () => {
    it('sends the same file body in full on every call', async () => {
      const { client } = setup();
      const filePath = path.join(dir, 'upload.txt');
      const content = 'line of upload data\n'.repeat(5000);
      await writeFile(filePath, content);
      const stream = await FileStream.open(filePath);

      try {
        const upload = createRequest(`${baseUrl}/upload`, { body: stream });
        await client.post(upload);
        await client.post(upload);
      } finally {
        await stream.close();
      }

      expect(received.map((request) => request.body.length)).toEqual([content.length, content.length]);
      expect(received[0]?.body).toBe(content);
      expect(received[1]?.body).toBe(content);
      expect(received[1]?.headers['transfer-encoding']).toBe('chunked');
    });

    it('does not leak a body into a later bodyless call on the same definition', async () => {
      const { client } = setup();
      const definition = createRequest(`${baseUrl}/echo`, { body: 'payload' });

      await client.post(definition);
      await client.get(definition);

      expect(received[0]).toMatchObject({ method: 'POST', body: 'payload' });
      expect(received[0]?.headers['content-length']).toBe('7');
      expect(received[1]).toMatchObject({ method: 'GET', body: '' });
      expect(received[1]?.headers['content-length']).toBeUndefined();
      expect(received[1]?.headers['transfer-encoding']).toBeUndefined();
    });

    it('applies headers, the host override and connection flags', async () => {
      const { client } = setup({ config: { userAgent: 'loadwire-test/1.0' } });

      await client.get(
        createRequest(`${baseUrl}/headers`, {
          host: 'api.example.test',
          headers: { 'X-Trace': 'abc' },
          disableKeepAlive: true
        })
      );
      await client.get(createRequest(`${baseUrl}/headers`, { headers: { 'User-Agent': 'custom-agent' } }));

      expect(received[0]?.headers).toMatchObject({
        host: 'api.example.test',
        'x-trace': 'abc',
        'user-agent': 'loadwire-test/1.0',
        connection: 'close'
      });
      expect(received[1]?.headers).toMatchObject({ 'user-agent': 'custom-agent', connection: 'keep-alive' });
    });
  });

  describe('metrics', () => {
    it('holds samples back until the next request or a flush', async () => {
      const { client, sink } = setup();
      const first = `${baseUrl}/first`;
      const second = `${baseUrl}/second`;

      await client.get(createRequest(first));
      expect(sink.samples()).toEqual([]);

      await client.get(createRequest(second));
      expect(metricNames(sink.samples())).toEqual(['http_reqs', 'http_req_duration']);
      expect(sink.samples().map((sample) => sample.tags.url)).toEqual([first, first]);

      const finished = client.flush();
      expect(finished?.request.uri).toBe(second);
      expect(sink.batches().map((batch) => batch.getSamples()[0]?.tags.url)).toEqual([first, second]);
      expect(client.flush()).toBeUndefined();
    });

    it('tags failing statuses', async () => {
      const { client, sink } = setup();
      const url = `${baseUrl}/missing`;

      await client.get(createRequest(url));
      client.flush();

      expect(sink.samples()[0]?.tags).toEqual({
        name: url,
        url,
        method: 'GET',
        status: '404',
        error_code: '1404'
      });
    });

    it('reports a caller-set name as the url', async () => {
      const { client, sink } = setup({ tagsAndMeta: new TagsAndMeta({ name: 'users list' }) });

      await client.get(createRequest(`${baseUrl}/users/42`));
      client.flush();

      expect(sink.samples()[0]?.tags).toMatchObject({ name: 'users list', url: 'users list' });
    });

    it('emits http_req_failed when a response callback is set', async () => {
      const { client, sink } = setup({ responseCallback: expectedStatuses({ min: 200, max: 399 }) });

      await client.get(createRequest(`${baseUrl}/missing`));
      client.flush();

      const samples = sink.samples();
      expect(metricNames(samples)).toEqual(['http_reqs', 'http_req_duration', 'http_req_failed']);
      expect(samples[2]?.value).toBe(1);
      expect(samples[2]?.tags.expected_response).toBe('false');
    });
  });

  describe('concurrent callers', () => {
    it('emits overlapping calls in stage order, each with its own outcome', async () => {
      const alpha = new PassThrough();
      const beta = new PassThrough();
      alpha.end('alpha');
      beta.end('beta');
      const refusal = Object.assign(new Error('connect ECONNREFUSED 10.0.0.3:80'), {
        code: 'ECONNREFUSED',
        errno: -111,
        syscall: 'connect'
      });
      const context = setup({
        transport: scriptedTransport({
          'http://a.test/': () => scripted(200, alpha),
          'http://b.test/': () => scripted(404, beta),
          'http://c.test/': () => {
            throw new RequestUrlError('GET', 'http://c.test/', refusal);
          }
        })
      });
      const { client, entries } = context;

      const [a, b, c] = await Promise.all([
        client.get(createRequest('http://a.test/')),
        client.get(createRequest('http://b.test/')),
        client.get(createRequest('http://c.test/'))
      ]);
      client.flush();

      expect(a).toMatchObject({ status: 200, body: 'alpha' });
      expect(b).toMatchObject({ status: 404, body: 'beta', errorCode: 1404 });
      expect(c).toMatchObject({ status: 0, errorCode: 1212, error: 'dial: connection refused' });
      expect(statusAndError(context)).toEqual([
        ['http://a.test/', '200', undefined],
        ['http://b.test/', '404', undefined],
        ['http://c.test/', '0', 'dial: connection refused']
      ]);
      expect(
        entries
          .filter((entry) => entry.message === 'metric dispatcher found unprocessed request')
          .map((entry) => entry.url)
      ).toEqual(['http://a.test/', 'http://b.test/']);
    });

    it('keeps a late body failure on the request it belongs to', async () => {
      const alpha = new PassThrough();
      const beta = new PassThrough();
      const context = setup({
        transport: scriptedTransport({
          'http://a.test/': () => scripted(200, alpha),
          'http://b.test/': () => scripted(200, beta)
        })
      });
      const { client, entries } = context;

      const first = client.get(createRequest('http://a.test/'));
      const second = client.get(createRequest('http://b.test/'));
      await settle();

      alpha.destroy(new Error('a broke'));
      const a = await first;
      beta.end('fine');
      const b = await second;
      client.flush();

      expect(a).toMatchObject({ status: 200, errorCode: 1000, error: 'a broke', body: undefined });
      expect(b).toMatchObject({ status: 200, body: 'fine' });
      expect(b.error).toBeUndefined();
      expect(statusAndError(context)).toEqual([
        ['http://a.test/', '200', undefined],
        ['http://b.test/', '200', undefined]
      ]);
      expect(entries).toContainEqual(
        expect.objectContaining({
          level: 'warn',
          message: 'request already emitted, dropping late error',
          url: 'http://a.test/'
        })
      );
    });
  });

  describe('failures', () => {
    it('rejects with the transport error when throwing is on', async () => {
      const { client, sink } = setup();
      const url = `http://127.0.0.1:${await unusedPort()}/`;

      await expect(client.get(createRequest(url, { throw: true }))).rejects.toBeInstanceOf(RequestUrlError);
      client.flush();

      expect(sink.samples()[0]?.tags).toEqual({
        name: url,
        url,
        method: 'GET',
        status: '0',
        error: 'dial: connection refused',
        error_code: '1212'
      });
    });

    it('returns the classified error by default', async () => {
      const { client, entries } = setup();
      const url = `http://127.0.0.1:${await unusedPort()}/`;

      const res = await client.get(createRequest(url));

      expect(res).toMatchObject({ url, status: 0, errorCode: 1212, error: 'dial: connection refused', body: undefined });
      expect(entries).toEqual([
        expect.objectContaining({ level: 'warn', message: 'request failed', method: 'GET', url, errorCode: 1212 })
      ]);
    });

    it('classifies malformed URLs', async () => {
      const { client, sink } = setup();

      const res = await client.get(createRequest('not a url', { throw: false }));
      client.flush();

      expect(res).toMatchObject({ status: 0, errorCode: 1020, error: 'invalid URL' });
      expect(sink.samples()[0]?.tags).toMatchObject({ url: 'not a url', status: '0', error_code: '1020' });
    });

    it('blocks addresses resolved from a hostname', async () => {
      const { client } = setup({ config: { blockedIps: ['127.0.0.0/8', '::1'] } });
      const url = `http://localhost:${new URL(baseUrl).port}/`;

      const res = await client.get(createRequest(url, { throw: false }));

      expect(res).toMatchObject({ status: 0, errorCode: 1110, error: 'ip is blocked' });
      expect(received).toEqual([]);
    });

    it('blocks hostnames matching a pattern', async () => {
      const { client } = setup({ config: { blockedHostnames: ['*.blocked.test'] } });

      const res = await client.get(createRequest('http://api.blocked.test/', { throw: false }));

      expect(res).toMatchObject({ status: 0, errorCode: 1111, error: 'hostname is blocked' });
    });

    it('gives up on a server that stops answering', async () => {
      const { client } = setup({ config: { readTimeout: 1 } });

      const res = await client.get(createRequest(`${baseUrl}/hang`, { throw: false }));

      expect(res).toMatchObject({ status: 0, errorCode: 1050, error: 'request timeout' });
    }, 10_000);

    it('emits a body read failure right away and rethrows it', async () => {
      const { client, sink } = setup();

      const failure = await client.get(createRequest(`${baseUrl}/corrupt`, { throw: true })).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(ClassifiedError);
      expect(sink.samples()[0]?.tags).toMatchObject({ status: '0', error_code: '1701' });
      expect(client.flush()).toBeUndefined();
    });

    it('returns the response with the body read failure by default', async () => {
      const { client, entries } = setup();

      const res = await client.get(createRequest(`${baseUrl}/corrupt`));

      expect(res).toMatchObject({ status: 200, errorCode: 1701, body: undefined });
      expect(entries).toEqual([expect.objectContaining({ level: 'warn', message: 'request failed', errorCode: 1701 })]);
    });
  });
});
