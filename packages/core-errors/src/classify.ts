/**
 * @loadwire/core-errors/classify
 *
 * Maps any thrown value onto a stable numeric code and a short message.
 *
 * Rules are tried in order and the first match wins. Rules for wrapper kinds
 * delegate to the same rule list for their cause, so the most specific
 * failure underneath a stack of wrappers decides the code.
 */

import { ERROR_CODES, ERROR_MESSAGES, type ErrorCode } from './codes.js';
import {
  BlockedHostnameError,
  BlockedIpError,
  ClassifiedError,
  Http2ConnectionError,
  Http2GoAwayError,
  Http2StreamError,
  NetworkOperationError,
  RequestUrlError,
  renderError,
  systemErrorFields,
  unwrapError,
  type NetworkKind,
  type NetworkOperation,
  type SystemErrorFields
} from './errors.js';
import { http2ErrorName, http2SubcodeOffset, parseNghttp2Name, parseNumericSubcode } from './http2.js';

export type ErrorClassification = {
  code: ErrorCode;
  message: string;
};

export interface ClassifyOptions {
  /** Platform named in errno messages; defaults to the running one. */
  platform?: NodeJS.Platform;
}

export type FailureKind =
  | 'classified'
  | 'dns'
  | 'blocked-ip'
  | 'blocked-hostname'
  | 'http2-goaway'
  | 'http2-stream'
  | 'http2-connection'
  | 'network-operation'
  | 'certificate'
  | 'request-url'
  | 'invalid-url'
  | 'other';

type Recurse = (inner: unknown) => ErrorClassification;

interface ClassificationRule {
  readonly kind: FailureKind;
  apply(error: unknown, recurse: Recurse, options: Required<ClassifyOptions>): ErrorClassification | undefined;
}

function rule<T>(
  kind: FailureKind,
  matches: (error: unknown) => error is T,
  extract: (error: T, recurse: Recurse, options: Required<ClassifyOptions>) => ErrorClassification
): ClassificationRule {
  return {
    kind,
    apply: (error, recurse, options) => (matches(error) ? extract(error, recurse, options) : undefined)
  };
}

const MAX_UNWRAP_DEPTH = 16;

// ─────────────────────────────────────────────────────────────────────────────
// RECOGNIZERS
// ─────────────────────────────────────────────────────────────────────────────

const DNS_SYSCALLS = new Set(['getaddrinfo', 'getnameinfo']);

const SOCKET_SYSCALLS: Record<string, NetworkOperation> = {
  connect: 'dial',
  read: 'read',
  recv: 'read',
  write: 'write',
  writev: 'write',
  send: 'write',
  shutdown: 'close',
  close: 'close'
};

const UNKNOWN_AUTHORITY_CODES = new Set([
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'DEPTH_ZERO_SELF_SIGNED_CERT'
]);

const HOSTNAME_MISMATCH_CODE = 'ERR_TLS_CERT_ALTNAME_INVALID';

const RECORD_HEADER_CODES = new Set([
  'ERR_SSL_WRONG_VERSION_NUMBER',
  'ERR_SSL_HTTP_REQUEST',
  'ERR_SSL_PACKET_LENGTH_TOO_LONG'
]);

const RECORD_HEADER_PATTERN = /wrong version number|packet length too long|http request/i;

const WINDOWS_WSAECONNREFUSED = 10061;
const WINDOWS_WSAECONNRESET = 10054;

function isDnsFailure(error: unknown): error is Error {
  const fields = systemErrorFields(error);
  if (!fields?.syscall) return false;
  return DNS_SYSCALLS.has(fields.syscall) || fields.syscall.startsWith('query');
}

function isRecordHeaderFailure(fields: SystemErrorFields, message: string): boolean {
  if (fields.code && RECORD_HEADER_CODES.has(fields.code)) return true;
  return fields.code === 'EPROTO' && RECORD_HEADER_PATTERN.test(message);
}

function isCertificateFailure(error: unknown): error is Error {
  const fields = systemErrorFields(error);
  if (!fields || !(error instanceof Error)) return false;
  if (fields.code === HOSTNAME_MISMATCH_CODE) return true;
  if (fields.code && UNKNOWN_AUTHORITY_CODES.has(fields.code)) return true;
  return isRecordHeaderFailure(fields, error.message);
}

/**
 * A socket failure seen either through our own wrapper or as the raw error
 * Node emits, which carries the syscall and errno on one object.
 */
type NetworkOperationView = {
  op: NetworkOperation;
  network: NetworkKind;
  message: string;
  syscall?: { code?: string; errno?: number; message: string };
  inner: unknown;
};

function socketSyscallView(error: unknown): NetworkOperationView['syscall'] {
  const fields = systemErrorFields(error);
  if (!fields?.syscall || !Object.hasOwn(SOCKET_SYSCALLS, fields.syscall) || !(error instanceof Error)) return undefined;
  if (isRecordHeaderFailure(fields, error.message)) return undefined;
  return {
    code: fields.code,
    errno: fields.errno === undefined ? undefined : Math.abs(fields.errno),
    message: error.message
  };
}

function networkKindFor(fields: SystemErrorFields): NetworkKind {
  const address = fields.address ?? '';
  return address.startsWith('/') || address.startsWith('\\\\') ? 'unix' : 'tcp';
}

function toNetworkOperationView(error: unknown): NetworkOperationView | undefined {
  if (error instanceof NetworkOperationError) {
    return {
      op: error.op,
      network: error.network,
      message: error.message,
      syscall: socketSyscallView(error.cause),
      inner: error.cause
    };
  }

  const syscall = socketSyscallView(error);
  const fields = systemErrorFields(error);
  if (!syscall || !fields?.syscall || !(error instanceof Error)) return undefined;

  return {
    op: SOCKET_SYSCALLS[fields.syscall] ?? 'read',
    network: networkKindFor(fields),
    message: error.message,
    syscall,
    inner: unwrapError(error)
  };
}

function isNetworkOperationFailure(error: unknown): error is NetworkOperationError | Error {
  return toNetworkOperationView(error) !== undefined;
}

function nodeHttp2Code(error: unknown): string | undefined {
  const code = systemErrorFields(error)?.code;
  return code?.startsWith('ERR_HTTP2_') ? code : undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// EXTRACTORS
// ─────────────────────────────────────────────────────────────────────────────

function http2Classification(
  base: ErrorCode,
  format: (name: string) => string,
  subcode: number | undefined
): ErrorClassification {
  if (subcode === undefined) {
    return { code: base, message: format('unknown error code') };
  }
  return { code: base + http2SubcodeOffset(subcode), message: format(http2ErrorName(subcode)) };
}

function classifyNetworkOperation(
  view: NetworkOperationView,
  recurse: Recurse,
  platform: NodeJS.Platform
): ErrorClassification {
  if (view.network !== 'tcp' && view.network !== 'tcp4' && view.network !== 'tcp6') {
    return { code: ERROR_CODES.NET_NON_TCP, message: view.message };
  }

  const syscall = view.syscall;
  const onWindows = platform === 'win32';

  if (syscall) {
    if (syscall.code === 'ECONNRESET' || (onWindows && syscall.errno === WINDOWS_WSAECONNRESET)) {
      return { code: ERROR_CODES.TCP_RESET_BY_PEER, message: ERROR_MESSAGES.TCP_RESET_BY_PEER(view.op) };
    }
    if (syscall.code === 'EPIPE') {
      return { code: ERROR_CODES.TCP_BROKEN_PIPE, message: ERROR_MESSAGES.TCP_BROKEN_PIPE(view.op) };
    }
  }

  if (view.op !== 'dial') {
    if (syscall?.errno !== undefined) {
      return {
        code: ERROR_CODES.NET_UNKNOWN_ERRNO,
        message: ERROR_MESSAGES.NET_UNKNOWN_ERRNO(view.op, syscall.errno, platform, syscall.message)
      };
    }
    return { code: ERROR_CODES.TCP_DEFAULT, message: view.message };
  }

  if (syscall?.errno !== undefined) {
    if (syscall.code === 'ECONNREFUSED' || (onWindows && syscall.errno === WINDOWS_WSAECONNREFUSED)) {
      return { code: ERROR_CODES.TCP_DIAL_REFUSED, message: ERROR_MESSAGES.TCP_DIAL_REFUSED };
    }
    return {
      code: ERROR_CODES.TCP_DIAL_UNKNOWN_ERRNO,
      message: ERROR_MESSAGES.TCP_DIAL_UNKNOWN_ERRNO(syscall.errno, syscall.message)
    };
  }

  // a dial can also fail on something recognizable underneath, e.g. DNS
  if (view.inner !== undefined) {
    const wrapped = recurse(view.inner);
    if (wrapped.code !== ERROR_CODES.DEFAULT) {
      return wrapped;
    }
  }

  return { code: ERROR_CODES.TCP_DIAL, message: view.message };
}

function classifyCertificate(error: Error): ErrorClassification {
  const fields = systemErrorFields(error) ?? {};
  if (fields.code === HOSTNAME_MISMATCH_CODE) {
    return { code: ERROR_CODES.X509_HOSTNAME, message: ERROR_MESSAGES.X509_HOSTNAME };
  }
  if (fields.code && UNKNOWN_AUTHORITY_CODES.has(fields.code)) {
    return { code: ERROR_CODES.X509_UNKNOWN_AUTHORITY, message: ERROR_MESSAGES.X509_UNKNOWN_AUTHORITY };
  }
  return { code: ERROR_CODES.TLS_HEADER, message: error.message };
}

// ─────────────────────────────────────────────────────────────────────────────
// RULES (ORDER MATTERS)
// ─────────────────────────────────────────────────────────────────────────────

const RULES: readonly ClassificationRule[] = [
  rule(
    'classified',
    (error): error is ClassifiedError => error instanceof ClassifiedError,
    (error) => ({ code: error.errorCode, message: error.message })
  ),
  rule('dns', isDnsFailure, (error) =>
    systemErrorFields(error)?.code === 'ENOTFOUND'
      ? { code: ERROR_CODES.DNS_NO_SUCH_HOST, message: ERROR_MESSAGES.DNS_NO_SUCH_HOST }
      : { code: ERROR_CODES.DNS_DEFAULT, message: error.message }
  ),
  rule(
    'blocked-ip',
    (error): error is BlockedIpError => error instanceof BlockedIpError,
    () => ({ code: ERROR_CODES.BLOCKED_IP, message: ERROR_MESSAGES.BLOCKED_IP })
  ),
  rule(
    'blocked-hostname',
    (error): error is BlockedHostnameError => error instanceof BlockedHostnameError,
    () => ({ code: ERROR_CODES.BLOCKED_HOSTNAME, message: ERROR_MESSAGES.BLOCKED_HOSTNAME })
  ),
  rule(
    'http2-goaway',
    (error): error is Http2GoAwayError | Error =>
      error instanceof Http2GoAwayError || nodeHttp2Code(error) === 'ERR_HTTP2_GOAWAY_SESSION',
    (error) =>
      http2Classification(
        ERROR_CODES.HTTP2_GOAWAY_UNKNOWN,
        ERROR_MESSAGES.HTTP2_GOAWAY,
        error instanceof Http2GoAwayError ? error.errCode : undefined
      )
  ),
  rule(
    'http2-stream',
    (error): error is Http2StreamError | Error =>
      error instanceof Http2StreamError || nodeHttp2Code(error) === 'ERR_HTTP2_STREAM_ERROR',
    (error) =>
      http2Classification(
        ERROR_CODES.HTTP2_STREAM_UNKNOWN,
        ERROR_MESSAGES.HTTP2_STREAM,
        error instanceof Http2StreamError ? error.errCode : parseNghttp2Name(error.message)
      )
  ),
  rule(
    'http2-connection',
    (error): error is Http2ConnectionError | Error =>
      error instanceof Http2ConnectionError || nodeHttp2Code(error) === 'ERR_HTTP2_SESSION_ERROR',
    (error) =>
      http2Classification(
        ERROR_CODES.HTTP2_CONNECTION_UNKNOWN,
        ERROR_MESSAGES.HTTP2_CONNECTION,
        error instanceof Http2ConnectionError ? error.errCode : parseNumericSubcode(error.message)
      )
  ),
  rule('network-operation', isNetworkOperationFailure, (error, recurse, options) => {
    const view = toNetworkOperationView(error);
    return view
      ? classifyNetworkOperation(view, recurse, options.platform)
      : { code: ERROR_CODES.TCP_DEFAULT, message: error.message };
  }),
  rule('certificate', isCertificateFailure, classifyCertificate),
  rule(
    'request-url',
    (error): error is RequestUrlError => error instanceof RequestUrlError,
    (error, recurse) => recurse(error.cause)
  ),
  rule(
    'invalid-url',
    (error): error is Error => systemErrorFields(error)?.code === 'ERR_INVALID_URL',
    () => ({ code: ERROR_CODES.INVALID_URL, message: ERROR_MESSAGES.INVALID_URL })
  )
];

function classifyAtDepth(error: unknown, depth: number, options: Required<ClassifyOptions>): ErrorClassification {
  if (depth > MAX_UNWRAP_DEPTH) {
    return { code: ERROR_CODES.DEFAULT, message: renderError(error) };
  }

  const recurse: Recurse = (inner) => classifyAtDepth(inner, depth + 1, options);

  for (const candidate of RULES) {
    const result = candidate.apply(error, recurse, options);
    if (result) return result;
  }

  const inner = unwrapError(error);
  if (inner !== undefined) {
    return recurse(inner);
  }

  return { code: ERROR_CODES.DEFAULT, message: renderError(error) };
}

/**
 * Classify a failure. Never throws: anything unrecognized maps to the
 * generic code with the error's own text.
 */
export function classifyError(error: unknown, options: ClassifyOptions = {}): ErrorClassification {
  const resolved: Required<ClassifyOptions> = { platform: options.platform ?? process.platform };
  try {
    return classifyAtDepth(error, 0, resolved);
  } catch (failure) {
    return { code: ERROR_CODES.DEFAULT, message: `unclassifiable error: ${renderError(failure)}` };
  }
}

/**
 * Name of the first rule that recognizes `error`, without recursing.
 */
export function failureKind(error: unknown): FailureKind {
  const probe = { platform: process.platform };
  const noRecurse: Recurse = () => ({ code: ERROR_CODES.DEFAULT, message: '' });
  const matched = RULES.find((candidate) => candidate.apply(error, noRecurse, probe) !== undefined);
  return matched?.kind ?? 'other';
}
