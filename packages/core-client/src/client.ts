/**
 * @loadwire/core-client/client
 *
 * The request engine. Each call drains the previously staged request's
 * metrics, performs the round trip, stages the new request and then reads the
 * body, so the body read is folded into the staged duration.
 */

import { classifyError, errorCodeForStatus, type ErrorCode } from '@loadwire/core-errors';
import { createLogger, type Logger } from '@loadwire/core-logging';
import {
  createBuiltinMetrics,
  LoggerSampleSink,
  MetricDispatcher,
  SystemTagSet,
  TagsAndMeta,
  Trail,
  type BuiltinMetrics,
  type FinishedRequest,
  type ResponseCallback,
  type SampleSink,
  type UnfinishedRequest
} from '@loadwire/core-metrics';
import { parseOrThrow } from '@loadwire/core-validation';

import type { PooledRequest } from './pool.js';
import type { RequestDefinition } from './request.js';
import { readResponseBody, type ResponseBody } from './response.js';
import { ClientConfigSchema, type ClientConfig, type ClientConfigInput } from './schemas.js';
import { createNodeTransport, type HttpTransport, type TransportResponse } from './transport.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

export type HttpResponse = {
  url: string;
  /** 0 when no response arrived. */
  status: number;
  statusText: string;
  proto: string;
  headers: Record<string, string>;
  body: ResponseBody;
  remoteIp?: string;
  remotePort?: number;
  error?: string;
  errorCode?: ErrorCode;
  timings: {
    /** ms from sending the request until the body was read */
    duration: number;
    /** ms spent connecting */
    connecting: number;
  };
};

export interface ClientOptions {
  config?: ClientConfigInput;
  logger?: Logger;
  /** Defaults to writing samples as `metric` log entries. */
  sink?: SampleSink;
  tagsAndMeta?: TagsAndMeta;
  systemTags?: SystemTagSet;
  builtinMetrics?: BuiltinMetrics;
  responseCallback?: ResponseCallback;
  transport?: HttpTransport;
  /** Aborting it cancels in-flight requests and drops further samples. */
  signal?: AbortSignal;
}

function buildLogger(options: ClientOptions): Logger {
  return options.logger ?? createLogger({ service: 'loadwire', component: 'http-client' });
}

export class Client {
  readonly config: ClientConfig;
  private readonly logger: Logger;
  private readonly transport: HttpTransport;
  private readonly dispatcher: MetricDispatcher;
  private readonly signal?: AbortSignal;

  constructor(options: ClientOptions = {}) {
    this.config = parseOrThrow(ClientConfigSchema, options.config ?? {}, 'client config');
    this.logger = buildLogger(options);
    this.transport = options.transport ?? createNodeTransport(this.config);
    this.signal = options.signal;
    this.dispatcher = new MetricDispatcher({
      tagsAndMeta: options.tagsAndMeta ?? new TagsAndMeta(),
      systemTags: options.systemTags ?? new SystemTagSet(),
      builtinMetrics: options.builtinMetrics ?? createBuiltinMetrics(),
      sink: options.sink ?? new LoggerSampleSink(this.logger),
      logger: this.logger,
      responseCallback: options.responseCallback
    });
  }

  get(request: RequestDefinition): Promise<HttpResponse> {
    return this.request(request, 'GET');
  }

  post(request: RequestDefinition): Promise<HttpResponse> {
    return this.request(request, 'POST');
  }

  put(request: RequestDefinition): Promise<HttpResponse> {
    return this.request(request, 'PUT');
  }

  patch(request: RequestDefinition): Promise<HttpResponse> {
    return this.request(request, 'PATCH');
  }

  delete(request: RequestDefinition): Promise<HttpResponse> {
    return this.request(request, 'DELETE');
  }

  options(request: RequestDefinition): Promise<HttpResponse> {
    return this.request(request, 'OPTIONS');
  }

  head(request: RequestDefinition): Promise<HttpResponse> {
    return this.request(request, 'HEAD');
  }

  async request(definition: RequestDefinition, method: HttpMethod): Promise<HttpResponse> {
    const pooled = definition.acquire(method, this.logger);
    try {
      return await this.roundTrip(definition, pooled);
    } finally {
      definition.release(pooled);
    }
  }

  /**
   * Emits the staged request, if any. Call once the last request is done.
   */
  flush(): FinishedRequest | undefined {
    return this.dispatcher.drainAndEmit(undefined, this.signal);
  }

  close(): FinishedRequest | undefined {
    try {
      return this.flush();
    } finally {
      this.transport.close();
    }
  }

  private async roundTrip(definition: RequestDefinition, pooled: PooledRequest): Promise<HttpResponse> {
    const { method, uri } = pooled;
    const context = { method, url: uri };

    this.dispatcher.drainAndEmit(undefined, this.signal);

    const startedAt = performance.now();
    let response: TransportResponse | undefined;
    let failure: unknown;
    try {
      response = await this.transport.roundTrip(
        {
          method,
          uri,
          host: pooled.host,
          headers: pooled.headers,
          keepAlive: pooled.keepAlive,
          body: pooled.body
        },
        { signal: this.signal }
      );
    } catch (error) {
      failure = error;
    }

    const trail = new Trail({
      endTime: new Date(),
      connDuration: response?.connDuration ?? 0,
      duration: performance.now() - startedAt,
      remoteAddress: response?.remoteAddress
    });

    const unfinished: UnfinishedRequest = {
      request: { method, uri },
      response: response ? { status: response.status } : undefined,
      trail,
      error: failure
    };
    this.dispatcher.stage(unfinished, this.signal);

    if (!response) {
      if (definition.options.throw) throw failure;

      const classified = classifyError(failure);
      this.logger.warn('request failed', { ...context, error: failure, errorCode: classified.code });
      return {
        url: uri,
        status: 0,
        statusText: '',
        proto: '',
        headers: {},
        body: undefined,
        error: classified.message,
        errorCode: classified.code,
        timings: { duration: trail.duration, connecting: trail.connDuration }
      };
    }

    const result: HttpResponse = {
      url: uri,
      status: response.status,
      statusText: response.statusText,
      proto: response.proto,
      headers: response.headers,
      body: undefined,
      remoteIp: response.remoteAddress?.address,
      remotePort: response.remoteAddress?.port,
      errorCode: errorCodeForStatus(response.status),
      timings: { duration: trail.duration, connecting: trail.connDuration }
    };

    try {
      result.body = await readResponseBody(definition.options.responseType, response, {
        decompress: this.config.decompress
      });
    } catch (readError) {
      trail.complete(new Date(), performance.now() - startedAt);
      // another caller may have emitted this request already; never touch theirs
      const finished = this.dispatcher.drainAndEmit(readError, this.signal, unfinished);
      const classified =
        finished?.errorCode !== undefined && finished.errorMessage !== undefined
          ? { code: finished.errorCode, message: finished.errorMessage }
          : classifyError(readError);

      result.error = classified.message;
      result.errorCode = classified.code;
      result.timings.duration = trail.duration;

      if (definition.options.throw) throw readError;
      this.logger.warn('request failed', { ...context, error: readError, errorCode: classified.code });
      return result;
    }

    trail.complete(new Date(), performance.now() - startedAt);
    result.timings.duration = trail.duration;
    return result;
  }
}

export function createClient(options: ClientOptions = {}): Client {
  return new Client(options);
}
