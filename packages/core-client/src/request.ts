import type { Logger } from '@loadwire/core-logging';
import { parseOrThrow } from '@loadwire/core-validation';

import { FileStream } from './body.js';
import { PooledRequest, RequestPool } from './pool.js';
import { RequestOptionsSchema, type RequestOptions, type RequestOptionsInput } from './schemas.js';

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

export function methodSendsBody(method: string): boolean {
  return !BODYLESS_METHODS.has(method);
}

/**
 * A reusable request: target, headers, body and behaviour flags, plus its own
 * pool of wire-level requests.
 */
export class RequestDefinition {
  readonly url: string;
  readonly options: RequestOptions;
  readonly pool = new RequestPool<PooledRequest>();
  private readonly payload: Uint8Array | undefined;

  constructor(url: string, options: RequestOptions) {
    this.url = url;
    this.options = options;
    const body = options.body;
    this.payload = typeof body === 'string' ? Buffer.from(body) : body instanceof Uint8Array ? body : undefined;
  }

  /**
   * Takes an idle pooled request (or builds one) and prepares it for `method`.
   * Pair every call with `release`.
   */
  acquire(method: string, logger: Logger): PooledRequest {
    const cached = this.pool.get();
    if (cached) {
      try {
        this.prepareCached(cached, method, logger);
      } catch (error) {
        this.pool.put(cached);
        throw error;
      }
      return cached;
    }

    const fresh = new PooledRequest();
    this.prepareFresh(fresh, method, logger);
    return fresh;
  }

  release(request: PooledRequest): void {
    this.pool.put(request);
  }

  // uri, host and headers survive from construction; everything a previous
  // call could have changed is set again
  private prepareCached(request: PooledRequest, method: string, logger: Logger): void {
    request.setMethod(method);
    request.setKeepAlive(!this.options.disableKeepAlive);
    this.applyBody(request, method, logger);
  }

  private prepareFresh(request: PooledRequest, method: string, logger: Logger): void {
    request.setRequestUri(this.url);
    if (this.options.host !== undefined) {
      request.setHost(this.options.host);
    }
    for (const [name, value] of Object.entries(this.options.headers)) {
      request.setHeader(name, value);
    }
    request.setKeepAlive(!this.options.disableKeepAlive);
    this.applyBody(request, method, logger);
    request.setMethod(method);
  }

  private applyBody(request: PooledRequest, method: string, logger: Logger): void {
    const body = this.options.body;
    if (body === undefined || !methodSendsBody(method)) {
      request.clearBody();
      return;
    }

    if (body instanceof FileStream) {
      try {
        request.setBodyStream(body);
      } catch (error) {
        logger.error('failed to rewind body stream', { url: this.url, method, path: body.path, error });
        throw error;
      }
      return;
    }

    if (this.payload) {
      request.setBody(this.payload);
    }
  }
}

/**
 * Validates `options` and returns a definition to pass to the client's
 * method calls.
 *
 * @example
 * const upload = createRequest('http://localhost:8080/upload', { body: await FileStream.open('./data.bin') });
 * await client.post(upload);
 */
export function createRequest(url: string, options: RequestOptionsInput = {}): RequestDefinition {
  return new RequestDefinition(url, parseOrThrow(RequestOptionsSchema, options, 'request options'));
}
