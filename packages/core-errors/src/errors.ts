import { http2ErrorName } from './http2.js';
import type { ErrorCode } from './codes.js';

/**
 * Fields Node attaches to the errors it raises from sockets, DNS and TLS.
 * None of them is guaranteed, so each read checks the runtime type.
 */
export type SystemErrorFields = {
  code?: string;
  errno?: number;
  syscall?: string;
  address?: string;
  port?: number;
  hostname?: string;
};

export function systemErrorFields(error: unknown): SystemErrorFields | undefined {
  if (!(error instanceof Error)) return undefined;

  const text = (key: string): string | undefined => {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'string' ? value : undefined;
  };
  const num = (key: string): number | undefined => {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'number' ? value : undefined;
  };

  const fields: SystemErrorFields = {
    code: text('code'),
    errno: num('errno'),
    syscall: text('syscall'),
    address: text('address'),
    port: num('port'),
    hostname: text('hostname')
  };
  return fields.code === undefined && fields.syscall === undefined ? undefined : fields;
}

// ─────────────────────────────────────────────────────────────────────────────
// PRE-CLASSIFIED
// ─────────────────────────────────────────────────────────────────────────────

/**
 * An error that already knows its code. The classifier returns it verbatim,
 * so domain failures can skip re-derivation from a generic transport error.
 */
export class ClassifiedError extends Error {
  readonly errorCode: ErrorCode;

  constructor(errorCode: ErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ClassifiedError';
    this.errorCode = errorCode;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// NETWORK POLICY
// ─────────────────────────────────────────────────────────────────────────────

export class BlockedIpError extends Error {
  readonly ip: string;

  constructor(ip: string) {
    super(`IP (${ip}) is in a blocked network`);
    this.name = 'BlockedIpError';
    this.ip = ip;
  }
}

export class BlockedHostnameError extends Error {
  readonly hostname: string;
  readonly pattern: string;

  constructor(hostname: string, pattern: string) {
    super(`hostname (${hostname}) is in a blocked pattern (${pattern})`);
    this.name = 'BlockedHostnameError';
    this.hostname = hostname;
    this.pattern = pattern;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// HTTP/2
// ─────────────────────────────────────────────────────────────────────────────

export class Http2GoAwayError extends Error {
  readonly errCode: number;
  readonly lastStreamId?: number;

  constructor(errCode: number, lastStreamId?: number) {
    super(`http2: server sent GOAWAY and closed the connection; ErrCode=${http2ErrorName(errCode)}`);
    this.name = 'Http2GoAwayError';
    this.errCode = errCode;
    this.lastStreamId = lastStreamId;
  }
}

export class Http2StreamError extends Error {
  readonly streamId: number;
  readonly errCode: number;

  constructor(streamId: number, errCode: number) {
    super(`stream error: stream ID ${streamId}; ${http2ErrorName(errCode)}`);
    this.name = 'Http2StreamError';
    this.streamId = streamId;
    this.errCode = errCode;
  }
}

export class Http2ConnectionError extends Error {
  readonly errCode: number;

  constructor(errCode: number) {
    super(`connection error: ${http2ErrorName(errCode)}`);
    this.name = 'Http2ConnectionError';
    this.errCode = errCode;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// WRAPPERS
// ─────────────────────────────────────────────────────────────────────────────

export type NetworkOperation = 'dial' | 'read' | 'write' | 'close';
export type NetworkKind = 'tcp' | 'tcp4' | 'tcp6' | 'udp' | 'unix';

/**
 * A socket-level failure annotated with the phase it happened in.
 */
export class NetworkOperationError extends Error {
  readonly op: NetworkOperation;
  readonly network: NetworkKind;
  readonly address?: string;

  constructor(op: NetworkOperation, network: NetworkKind, cause: Error, address?: string) {
    super(address ? `${op} ${network} ${address}: ${cause.message}` : `${op} ${network}: ${cause.message}`, { cause });
    this.name = 'NetworkOperationError';
    this.op = op;
    this.network = network;
    this.address = address;
  }
}

/**
 * Outermost wrapper raised by transports: which request failed, and why.
 * Never classified itself; the classifier looks through it.
 */
export class RequestUrlError extends Error {
  readonly method: string;
  readonly url: string;

  constructor(method: string, url: string, cause: unknown) {
    super(`${method} "${url}": ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'RequestUrlError';
    this.method = method;
    this.url = url;
  }
}

/**
 * Next error in a wrap chain: `cause` when it is an error, otherwise the first
 * member of an AggregateError (Node raises those when every address of a
 * dual-stack host refuses the connection).
 */
export function unwrapError(error: unknown): unknown {
  if (!(error instanceof Error)) return undefined;
  if (error.cause !== undefined && error.cause !== null) return error.cause;
  if (error instanceof AggregateError) {
    const errors: unknown[] = error.errors;
    return errors[0];
  }
  return undefined;
}

export function renderError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
