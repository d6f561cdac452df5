/**
 * @loadwire/core-client/transport
 *
 * Default HTTP/1.1 transport on node:http and node:https keep-alive agents.
 *
 * Failures reject with RequestUrlError wrapping what Node raised, so the
 * classifier sees the socket error underneath. Policy and timeout failures are
 * raised pre-classified:
 * - blocked hostnames and addresses, checked before dialing and after lookup
 * - dial timeout, raised while the socket is still connecting
 * - read timeout, raised after the socket sat idle for `readTimeout` seconds
 */

import { readFileSync } from 'node:fs';
import http, { type IncomingHttpHeaders, type IncomingMessage } from 'node:http';
import https from 'node:https';
import { lookup as dnsLookup } from 'node:dns';
import { BlockList, isIP, type LookupFunction, type Socket } from 'node:net';
import type { Readable } from 'node:stream';

import {
  BlockedHostnameError,
  BlockedIpError,
  ClassifiedError,
  ERROR_CODES,
  ERROR_MESSAGES,
  NetworkOperationError,
  RequestUrlError,
  renderError
} from '@loadwire/core-errors';
import type { RemoteAddress } from '@loadwire/core-metrics';

import type { PooledBody } from './pool.js';
import type { ClientConfig } from './schemas.js';

// ─────────────────────────────────────────────────────────────────────────────
// CONTRACT
// ─────────────────────────────────────────────────────────────────────────────

export type TransportRequest = {
  method: string;
  uri: string;
  host?: string;
  headers: Record<string, string>;
  keepAlive: boolean;
  body: PooledBody;
};

export type TransportResponse = {
  status: number;
  statusText: string;
  /** e.g. "HTTP/1.1" */
  proto: string;
  headers: Record<string, string>;
  /** Must be consumed or discarded so the connection can be reused. */
  body: Readable;
  remoteAddress?: RemoteAddress;
  /** ms spent connecting; 0 on a reused connection. */
  connDuration: number;
};

export interface HttpTransport {
  roundTrip(request: TransportRequest, options?: { signal?: AbortSignal }): Promise<TransportResponse>;
  close(): void;
}

// ─────────────────────────────────────────────────────────────────────────────
// NETWORK POLICY
// ─────────────────────────────────────────────────────────────────────────────

export type NetworkPolicy = {
  blockedHostname(hostname: string): string | undefined;
  blockedIp(ip: string): boolean;
};

export function createNetworkPolicy(blockedIps: readonly string[], blockedHostnames: readonly string[]): NetworkPolicy {
  const blockList = new BlockList();
  for (const entry of blockedIps) {
    const [address = '', prefix] = entry.split('/');
    const family = isIP(address) === 6 ? 'ipv6' : 'ipv4';
    if (prefix === undefined) {
      blockList.addAddress(address, family);
    } else {
      blockList.addSubnet(address, Number(prefix), family);
    }
  }

  const patterns = blockedHostnames.map((pattern) => pattern.toLowerCase());

  return {
    blockedHostname: (hostname) => {
      const host = hostname.toLowerCase();
      return patterns.find((pattern) =>
        pattern.startsWith('*.') ? host.endsWith(pattern.slice(1)) : host === pattern
      );
    },
    blockedIp: (ip) => {
      const family = isIP(ip);
      if (family === 0) return false;
      return blockList.check(ip, family === 6 ? 'ipv6' : 'ipv4');
    }
  };
}

function createBlockingLookup(policy: NetworkPolicy): LookupFunction {
  return (hostname, options, callback) => {
    dnsLookup(hostname, options, (error, address, family) => {
      if (error) {
        callback(error, address, family);
        return;
      }

      const resolved = Array.isArray(address) ? address.map((entry) => entry.address) : [address];
      const blocked = resolved.find((ip) => policy.blockedIp(ip));
      if (blocked !== undefined) {
        callback(new BlockedIpError(blocked), address, family);
        return;
      }
      callback(null, address, family);
    });
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    result[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

function remoteAddressOf(socket: Socket): RemoteAddress | undefined {
  if (!socket.remoteAddress || socket.remotePort === undefined) return undefined;
  const family = socket.remoteFamily === 'IPv6' ? 'IPv6' : socket.remoteFamily === 'IPv4' ? 'IPv4' : undefined;
  return { address: socket.remoteAddress, port: socket.remotePort, family };
}

function stripBrackets(hostname: string): string {
  return hostname.startsWith('[') && hostname.endsWith(']') ? hostname.slice(1, -1) : hostname;
}

function loadClientCertificate(config: ClientConfig): { cert?: Buffer; key?: Buffer } {
  const { certificate, privateKey } = config.tlsConfig;
  if (!certificate || !privateKey) return {};
  try {
    return { cert: readFileSync(certificate), key: readFileSync(privateKey) };
  } catch (error) {
    throw new Error(`failed to load key/cert; ${renderError(error)}`, { cause: error });
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// NODE TRANSPORT
// ─────────────────────────────────────────────────────────────────────────────

export function createNodeTransport(config: ClientConfig): HttpTransport {
  const policy = createNetworkPolicy(config.blockedIps, config.blockedHostnames);
  const lookup = createBlockingLookup(policy);
  const dialTimeoutMs = config.dialTimeout * 1000;
  const readTimeoutMs = config.readTimeout * 1000;
  const writeTimeoutMs = config.writeTimeout * 1000;
  const maxConnDurationMs = config.maxConnDuration * 1000;

  const httpAgent = new http.Agent({ keepAlive: true, maxSockets: config.maxConnsPerHost });
  const httpsAgent = new https.Agent({
    keepAlive: true,
    maxSockets: config.maxConnsPerHost,
    rejectUnauthorized: !config.tlsConfig.insecureSkipVerify,
    ...loadClientCertificate(config)
  });

  // connection age, for retiring keep-alive sockets
  const openedAt = new WeakMap<Socket, number>();

  if (maxConnDurationMs > 0) {
    for (const agent of [httpAgent, httpsAgent]) {
      agent.on('free', (socket: Socket) => {
        const opened = openedAt.get(socket);
        if (opened === undefined || Date.now() - opened < maxConnDurationMs) return;
        // only retire it if the agent parked it rather than handing it on
        const parked = Object.values(agent.freeSockets).some((sockets) => sockets?.includes(socket));
        if (parked) socket.destroy();
      });
    }
  }

  const roundTrip = (request: TransportRequest, options: { signal?: AbortSignal } = {}) =>
    new Promise<TransportResponse>((resolve, reject) => {
      const fail = (error: unknown) => reject(new RequestUrlError(request.method, request.uri, error));

      let url: URL;
      try {
        url = new URL(request.uri);
      } catch (error) {
        fail(error);
        return;
      }

      const hostname = stripBrackets(url.hostname);
      const blockedPattern = policy.blockedHostname(hostname);
      if (blockedPattern !== undefined) {
        fail(new BlockedHostnameError(hostname, blockedPattern));
        return;
      }
      if (policy.blockedIp(hostname)) {
        fail(new BlockedIpError(hostname));
        return;
      }

      const secure = url.protocol === 'https:';
      if (!secure && url.protocol !== 'http:') {
        fail(new Error(`unsupported protocol scheme "${url.protocol.replace(/:$/, '')}"`));
        return;
      }

      const headers: Record<string, string> = { ...request.headers };
      if (config.userAgent !== undefined && !Object.keys(headers).some((name) => name.toLowerCase() === 'user-agent')) {
        headers['User-Agent'] = config.userAgent;
      }
      if (request.host !== undefined) {
        headers.Host = request.host;
      }
      if (!request.keepAlive) {
        headers.Connection = 'close';
      }

      const requestOptions: https.RequestOptions = {
        method: request.method,
        headers,
        agent: secure ? httpsAgent : httpAgent,
        lookup,
        signal: options.signal
      };
      const req = secure ? https.request(url, requestOptions) : http.request(url, requestOptions);

      let response: IncomingMessage | undefined;
      let connDuration = 0;
      let dialTimer: NodeJS.Timeout | undefined;
      let writeTimer: NodeJS.Timeout | undefined;

      const clearTimers = () => {
        clearTimeout(dialTimer);
        clearTimeout(writeTimer);
      };

      req.on('socket', (socket: Socket) => {
        if (!socket.connecting) return;

        const dialStartedAt = performance.now();
        openedAt.set(socket, Date.now());
        dialTimer = setTimeout(() => {
          req.destroy(new ClassifiedError(ERROR_CODES.TCP_DIAL_TIMEOUT, ERROR_MESSAGES.TCP_DIAL_TIMEOUT));
        }, dialTimeoutMs);

        socket.once(secure ? 'secureConnect' : 'connect', () => {
          clearTimeout(dialTimer);
          connDuration = performance.now() - dialStartedAt;
        });
      });

      if (readTimeoutMs > 0) {
        // idle socket; once the head is in, the body reader sees the error
        req.setTimeout(readTimeoutMs, () => {
          const timeout = new ClassifiedError(ERROR_CODES.REQUEST_TIMEOUT, ERROR_MESSAGES.REQUEST_TIMEOUT);
          if (response) {
            response.destroy(timeout);
          } else {
            req.destroy(timeout);
          }
        });
      }

      if (writeTimeoutMs > 0) {
        writeTimer = setTimeout(() => {
          req.destroy(new NetworkOperationError('write', 'tcp', new Error('i/o timeout')));
        }, writeTimeoutMs);
        req.once('finish', () => clearTimeout(writeTimer));
      }

      // late errors after the head arrived land on the body stream instead
      req.on('error', (error) => {
        clearTimers();
        fail(error);
      });

      req.once('response', (res: IncomingMessage) => {
        clearTimers();
        response = res;
        resolve({
          status: res.statusCode ?? 0,
          statusText: res.statusMessage ?? '',
          proto: `HTTP/${res.httpVersion}`,
          headers: flattenHeaders(res.headers),
          body: res,
          remoteAddress: remoteAddressOf(res.socket),
          connDuration
        });
      });

      const body = request.body;
      if (body.kind === 'stream') {
        body.reader.on('error', (error) => req.destroy(error));
        body.reader.pipe(req);
      } else if (body.kind === 'bytes') {
        req.end(body.payload);
      } else {
        req.end();
      }
    });

  return {
    roundTrip,
    close: () => {
      httpAgent.destroy();
      httpsAgent.destroy();
    }
  };
}
