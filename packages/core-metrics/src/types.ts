/**
 * @loadwire/core-metrics/types
 *
 * Type definitions for samples, sinks and tag names.
 */

// ─────────────────────────────────────────────────────────────────────────────
// NAMES (UNION TYPES)
// ─────────────────────────────────────────────────────────────────────────────

export type SystemTagName =
  | 'proto'
  | 'status'
  | 'method'
  | 'url'
  | 'name'
  | 'group'
  | 'check'
  | 'error'
  | 'error_code'
  | 'tls_version'
  | 'scenario'
  | 'service'
  | 'expected_response'
  | 'ip'
  | 'vu'
  | 'iter';

export type BuiltinMetricName = 'http_reqs' | 'http_req_duration' | 'http_req_failed' | 'checks';

// ─────────────────────────────────────────────────────────────────────────────
// METRICS & SAMPLES
// ─────────────────────────────────────────────────────────────────────────────

export type MetricType = 'counter' | 'gauge' | 'rate' | 'trend';

/**
 * What a metric value measures. `time` values are milliseconds.
 */
export type ValueType = 'default' | 'time' | 'data';

export type MetricDescriptor = {
  readonly name: string;
  readonly type: MetricType;
  readonly contains: ValueType;
};

export type TagSet = Readonly<Record<string, string>>;

export type Sample = {
  readonly metric: MetricDescriptor;
  readonly tags: TagSet;
  readonly metadata: TagSet;
  readonly time: Date;
  readonly value: number;
};

/**
 * A batch handed to a sink in one push.
 */
export interface SampleContainer {
  getSamples(): readonly Sample[];
}

export interface SampleSink {
  push(container: SampleContainer): void;
}

// ─────────────────────────────────────────────────────────────────────────────
// CONNECTION FACTS
// ─────────────────────────────────────────────────────────────────────────────

export type RemoteAddress = {
  readonly address: string;
  readonly port: number;
  readonly family?: 'IPv4' | 'IPv6';
};

/**
 * Decides whether a status counts as an expected response. Status 0 stands
 * for "no response".
 */
export type ResponseCallback = (status: number) => boolean;
