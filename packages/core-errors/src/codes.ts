/**
 * @loadwire/core-errors/codes
 *
 * Numeric error codes attached to request samples. The leading digits select
 * the partition, so codes must never be renumbered once published.
 */

// ─────────────────────────────────────────────────────────────────────────────
// ERROR CODES
// ─────────────────────────────────────────────────────────────────────────────

export const ERROR_CODES = {
  // non specific
  DEFAULT: 1000,
  NET_NON_TCP: 1010,
  INVALID_URL: 1020,
  REQUEST_TIMEOUT: 1050,
  // DNS
  DNS_DEFAULT: 1100,
  DNS_NO_SUCH_HOST: 1101,
  BLOCKED_IP: 1110,
  BLOCKED_HOSTNAME: 1111,
  // TCP
  TCP_DEFAULT: 1200,
  TCP_BROKEN_PIPE: 1201,
  NET_UNKNOWN_ERRNO: 1202,
  TCP_DIAL: 1210,
  TCP_DIAL_TIMEOUT: 1211,
  TCP_DIAL_REFUSED: 1212,
  TCP_DIAL_UNKNOWN_ERRNO: 1213,
  TCP_RESET_BY_PEER: 1220,
  // TLS
  TLS_DEFAULT: 1300,
  TLS_HEADER: 1301,
  X509_UNKNOWN_AUTHORITY: 1310,
  X509_HOSTNAME: 1311,
  // HTTP/2; each partition spans "unknown" plus one code per known subcode
  HTTP2_GOAWAY_UNKNOWN: 1610,
  HTTP2_STREAM_UNKNOWN: 1630,
  HTTP2_CONNECTION_UNKNOWN: 1650,
  // content
  RESPONSE_DECOMPRESSION: 1701
} as const;

export type ErrorCode = number;

/** Offset between a response status and its synthetic error code. */
export const HTTP_STATUS_CODE_BASE = 1000;

export const ERROR_MESSAGES = {
  TCP_RESET_BY_PEER: (op: string) => `${op}: connection reset by peer`,
  TCP_BROKEN_PIPE: (op: string) => `${op}: broken pipe`,
  NET_UNKNOWN_ERRNO: (op: string, errno: number, platform: string, message: string) =>
    `${op}: unknown errno \`${errno}\` on ${platform} with message \`${message}\``,
  TCP_DIAL_UNKNOWN_ERRNO: (errno: number, message: string) =>
    `dial: unknown errno ${errno} error with msg \`${message}\``,
  TCP_DIAL_TIMEOUT: 'dial: i/o timeout',
  TCP_DIAL_REFUSED: 'dial: connection refused',
  DNS_NO_SUCH_HOST: 'lookup: no such host',
  BLOCKED_IP: 'ip is blocked',
  BLOCKED_HOSTNAME: 'hostname is blocked',
  HTTP2_GOAWAY: (name: string) => `http2: received GoAway with http2 ErrCode ${name}`,
  HTTP2_STREAM: (name: string) => `http2: stream error with http2 ErrCode ${name}`,
  HTTP2_CONNECTION: (name: string) => `http2: connection error with http2 ErrCode ${name}`,
  X509_HOSTNAME: "x509: certificate doesn't match hostname",
  X509_UNKNOWN_AUTHORITY: 'x509: unknown authority',
  REQUEST_TIMEOUT: 'request timeout',
  INVALID_URL: 'invalid URL'
} as const;

/**
 * Synthetic code for a completed response with a failing status.
 * Only meaningful when the round trip itself succeeded.
 */
export function errorCodeForStatus(status: number): ErrorCode | undefined {
  return status >= 400 ? HTTP_STATUS_CODE_BASE + status : undefined;
}
