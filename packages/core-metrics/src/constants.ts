/**
 * @loadwire/core-metrics/constants
 *
 * Centralized metric names and tag names.
 * All metric and tag names should be referenced from here to ensure consistency.
 */

import type { BuiltinMetricName, MetricDescriptor, SystemTagName } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// BUILTIN METRICS
// ─────────────────────────────────────────────────────────────────────────────

export const BUILTIN_METRICS = {
  /** One sample per round trip */
  HTTP_REQS: 'http_reqs',
  /** Round trip duration including body read, in milliseconds */
  HTTP_REQ_DURATION: 'http_req_duration',
  /** 1 when the response was not expected, 0 otherwise */
  HTTP_REQ_FAILED: 'http_req_failed',
  /** 1 for a passed check, 0 for a failed one */
  CHECKS: 'checks'
} as const satisfies Record<string, BuiltinMetricName>;

export type BuiltinMetrics = {
  readonly httpReqs: MetricDescriptor;
  readonly httpReqDuration: MetricDescriptor;
  readonly httpReqFailed: MetricDescriptor;
  readonly checks: MetricDescriptor;
};

export function createBuiltinMetrics(): BuiltinMetrics {
  return Object.freeze({
    httpReqs: { name: BUILTIN_METRICS.HTTP_REQS, type: 'counter', contains: 'default' },
    httpReqDuration: { name: BUILTIN_METRICS.HTTP_REQ_DURATION, type: 'trend', contains: 'time' },
    httpReqFailed: { name: BUILTIN_METRICS.HTTP_REQ_FAILED, type: 'rate', contains: 'default' },
    checks: { name: BUILTIN_METRICS.CHECKS, type: 'rate', contains: 'default' }
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// SYSTEM TAGS
// ─────────────────────────────────────────────────────────────────────────────

export const TAGS = {
  PROTO: 'proto',
  STATUS: 'status',
  METHOD: 'method',
  URL: 'url',
  NAME: 'name',
  GROUP: 'group',
  CHECK: 'check',
  ERROR: 'error',
  ERROR_CODE: 'error_code',
  TLS_VERSION: 'tls_version',
  SCENARIO: 'scenario',
  SERVICE: 'service',
  EXPECTED_RESPONSE: 'expected_response',
  IP: 'ip',
  VU: 'vu',
  ITER: 'iter'
} as const satisfies Record<string, SystemTagName>;

export const ALL_SYSTEM_TAGS: readonly SystemTagName[] = Object.values(TAGS);

/**
 * Per-execution values that would explode series cardinality; they travel as
 * sample metadata instead of indexed tags.
 */
export const METADATA_TAGS: ReadonlySet<SystemTagName> = new Set<SystemTagName>([TAGS.VU, TAGS.ITER]);

export const DEFAULT_SYSTEM_TAGS: readonly SystemTagName[] = ALL_SYSTEM_TAGS.filter(
  (tag) => tag !== TAGS.IP && !METADATA_TAGS.has(tag)
);
