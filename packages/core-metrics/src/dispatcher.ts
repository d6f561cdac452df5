/**
 * @loadwire/core-metrics/dispatcher
 *
 * Deferred per-client metric emission. A round trip is staged as soon as its
 * response head arrives and emitted when the next one is staged (or on a final
 * drain), so the body read can still be folded into its duration.
 *
 * KEY INVARIANTS:
 * - Each staged request is emitted exactly once
 * - Emission of the previous request happens inside the same critical
 *   section as the slot swap, so it always precedes the next request's samples
 * - Emission never throws; classification falls back to a generic code and
 *   sink failures are logged
 */

import { classifyError, errorCodeForStatus, type ErrorCode } from '@loadwire/core-errors';
import type { Logger } from '@loadwire/core-logging';
import { parseOrThrow } from '@loadwire/core-validation';
import { z } from 'zod';

import { TAGS, type BuiltinMetrics } from './constants.js';
import { pushIfNotDone } from './sinks.js';
import type { SystemTagSet, TagsAndMeta } from './tags.js';
import type { Trail } from './trail.js';
import type { ResponseCallback, SampleSink } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// REQUEST RECORDS
// ─────────────────────────────────────────────────────────────────────────────

export interface RequestHead {
  readonly method: string;
  /** Resolved request URI, as sent. */
  readonly uri: string;
}

export interface ResponseHead {
  readonly status: number;
}

/**
 * A round trip whose response head is known but whose metrics are not yet
 * emitted. `error` may still be filled in once, while it is staged.
 */
export type UnfinishedRequest = {
  readonly request: RequestHead;
  readonly response?: ResponseHead;
  readonly trail: Trail;
  error?: unknown;
};

export type FinishedRequest = {
  readonly request: RequestHead;
  readonly response?: ResponseHead;
  readonly trail: Trail;
  readonly error?: unknown;
  readonly errorCode?: ErrorCode;
  readonly errorMessage?: string;
};

export class DispatcherReentryError extends Error {
  constructor() {
    super('metric dispatcher re-entered while emitting');
    this.name = 'DispatcherReentryError';
  }
}

export type MetricDispatcherOptions = {
  tagsAndMeta: TagsAndMeta;
  systemTags: SystemTagSet;
  builtinMetrics: BuiltinMetrics;
  sink: SampleSink;
  logger: Logger;
  responseCallback?: ResponseCallback;
};

// ─────────────────────────────────────────────────────────────────────────────
// DISPATCHER
// ─────────────────────────────────────────────────────────────────────────────

export class MetricDispatcher {
  private readonly options: MetricDispatcherOptions;
  private staged: UnfinishedRequest | undefined;
  private locked = false;

  constructor(options: MetricDispatcherOptions) {
    this.options = options;
  }

  get hasStaged(): boolean {
    return this.staged !== undefined;
  }

  /**
   * Puts `request` in the slot. A previous occupant means a drain was missed;
   * it is emitted right away so nothing is lost.
   */
  stage(request: UnfinishedRequest, signal?: AbortSignal): void {
    this.withLock(() => {
      const previous = this.staged;
      this.staged = request;

      if (previous) {
        this.options.logger.warn('metric dispatcher found unprocessed request', {
          component: 'metric-dispatcher',
          method: previous.request.method,
          url: previous.request.uri
        });
        this.measureAndEmit(previous, signal);
      }
    });
  }

  /**
   * Empties the slot and emits its occupant. `lastError` is attached only when
   * the staged request carries no error of its own.
   *
   * With `expected`, only that request is drained: when another caller's
   * request holds the slot, it is left alone and nothing is emitted.
   */
  drainAndEmit(lastError?: unknown, signal?: AbortSignal, expected?: UnfinishedRequest): FinishedRequest | undefined {
    return this.withLock(() => {
      const pending = this.staged;
      if (expected !== undefined && pending !== expected) {
        if (lastError !== undefined) {
          this.options.logger.warn('request already emitted, dropping late error', {
            component: 'metric-dispatcher',
            method: expected.request.method,
            url: expected.request.uri,
            error: lastError
          });
        }
        return undefined;
      }

      this.staged = undefined;
      if (!pending) return undefined;

      if (pending.error === undefined && lastError !== undefined) {
        pending.error = lastError;
      }
      return this.measureAndEmit(pending, signal);
    });
  }

  private withLock<T>(section: () => T): T {
    if (this.locked) throw new DispatcherReentryError();
    this.locked = true;
    try {
      return section();
    } finally {
      this.locked = false;
    }
  }

  private measureAndEmit(unfinished: UnfinishedRequest, signal?: AbortSignal): FinishedRequest {
    const { systemTags: enabled, builtinMetrics, logger, responseCallback } = this.options;
    const { request, response, trail, error } = unfinished;
    const tags = this.options.tagsAndMeta.clone();

    // a caller-set name also becomes the url, keeping raw URLs out of the series
    const name = tags.get(TAGS.NAME);
    if (name === undefined) {
      tags.setSystemTagOrMetaIfEnabled(enabled, TAGS.NAME, request.uri);
      tags.setSystemTagOrMetaIfEnabled(enabled, TAGS.URL, request.uri);
    } else {
      tags.setSystemTagOrMetaIfEnabled(enabled, TAGS.URL, name);
    }

    tags.setSystemTagOrMetaIfEnabled(enabled, TAGS.METHOD, request.method);

    let errorCode: ErrorCode | undefined;
    let errorMessage: string | undefined;
    if (error !== undefined) {
      const classified = classifyError(error);
      errorCode = classified.code;
      errorMessage = classified.message;
      tags.setSystemTagOrMetaIfEnabled(enabled, TAGS.ERROR, errorMessage);
      tags.setSystemTagOrMetaIfEnabled(enabled, TAGS.ERROR_CODE, String(errorCode));
      tags.setSystemTagOrMetaIfEnabled(enabled, TAGS.STATUS, '0');
    } else {
      const status = response?.status ?? 0;
      tags.setSystemTagOrMetaIfEnabled(enabled, TAGS.STATUS, String(status));
      errorCode = errorCodeForStatus(status);
      if (errorCode !== undefined) {
        tags.setSystemTagOrMetaIfEnabled(enabled, TAGS.ERROR_CODE, String(errorCode));
      }
    }

    if (trail.remoteAddress) {
      tags.setSystemTagOrMetaIfEnabled(enabled, TAGS.IP, trail.remoteAddress.address);
    }

    let expected: boolean | undefined;
    if (responseCallback) {
      expected = this.judgeResponse(responseCallback, error === undefined ? (response?.status ?? 0) : 0, request);
      tags.setSystemTagOrMetaIfEnabled(enabled, TAGS.EXPECTED_RESPONSE, String(expected));
    }

    const finished: FinishedRequest = Object.freeze({
      request,
      response,
      trail,
      error,
      errorCode,
      errorMessage
    });

    if (!trail.saveSamples(builtinMetrics, tags)) {
      logger.warn('trail samples already saved, skipping emission', {
        component: 'metric-dispatcher',
        method: request.method,
        url: request.uri
      });
      return finished;
    }

    if (expected !== undefined) {
      trail.failed = !expected;
      trail.samples.push({
        metric: builtinMetrics.httpReqFailed,
        tags: trail.tags,
        metadata: trail.metadata,
        time: trail.endTime,
        value: expected ? 0 : 1
      });
    }

    try {
      pushIfNotDone(signal, this.options.sink, trail);
    } catch (pushError) {
      logger.error('metric sink push failed', {
        component: 'metric-dispatcher',
        url: request.uri,
        error: pushError
      });
    }

    return finished;
  }

  private judgeResponse(callback: ResponseCallback, status: number, request: RequestHead): boolean {
    try {
      return callback(status);
    } catch (callbackError) {
      this.options.logger.warn('response callback failed, counting response as unexpected', {
        component: 'metric-dispatcher',
        url: request.uri,
        status,
        error: callbackError
      });
      return false;
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// RESPONSE CALLBACKS
// ─────────────────────────────────────────────────────────────────────────────

const statusSchema = z.number().int().min(100).max(599);
const expectedStatusesSchema = z
  .array(
    z.union([
      statusSchema,
      z
        .object({ min: statusSchema, max: statusSchema })
        .refine((range) => range.min <= range.max, { message: 'min must not be greater than max' })
    ])
  )
  .min(1, { message: 'at least one status or range is required' });

export type StatusRange = { min: number; max: number };

/**
 * Builds a response callback accepting the listed statuses and inclusive ranges.
 *
 * @example
 * expectedStatuses({ min: 200, max: 299 }, 304)
 */
export function expectedStatuses(...statuses: Array<number | StatusRange>): ResponseCallback {
  const parsed = parseOrThrow(expectedStatusesSchema, statuses, 'expectedStatuses');
  return (status) =>
    parsed.some((entry) => (typeof entry === 'number' ? entry === status : status >= entry.min && status <= entry.max));
}
