import { isIP } from 'node:net';

import { z } from 'zod';

import { FileStream } from './body.js';

export const DEFAULT_DIAL_TIMEOUT_SECONDS = 5;
export const DEFAULT_MAX_CONNS_PER_HOST = 1;

export function isIpOrCidr(value: string): boolean {
  const [address, prefix, ...rest] = value.split('/');
  if (rest.length > 0 || !address) return false;

  const family = isIP(address);
  if (family === 0) return false;
  if (prefix === undefined) return true;
  if (!/^\d{1,3}$/.test(prefix)) return false;
  return Number(prefix) <= (family === 4 ? 32 : 128);
}

const HOSTNAME_PATTERN = /^(\*\.)?[a-z0-9-]+(\.[a-z0-9-]+)*$/i;

// zero keeps the default, like an unset field
const positiveOrDefault = (fallback: number) =>
  z
    .number()
    .int()
    .nonnegative()
    .default(0)
    .transform((value) => (value > 0 ? value : fallback));

const TlsConfigSchema = z
  .object({
    insecureSkipVerify: z.boolean().default(false),
    /** Path to a PEM private key. */
    privateKey: z.string().default(''),
    /** Path to a PEM certificate. */
    certificate: z.string().default('')
  })
  .superRefine((value, ctx) => {
    if (value.privateKey && !value.certificate) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'blank certificate' });
    }
    if (!value.privateKey && value.certificate) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'blank private key' });
    }
  });

export const ClientConfigSchema = z.object({
  /** Seconds; 0 means the default of 5. */
  dialTimeout: positiveOrDefault(DEFAULT_DIAL_TIMEOUT_SECONDS),
  /** Seconds of socket inactivity before the response is abandoned; 0 disables. */
  readTimeout: z.number().int().nonnegative().default(0),
  /** Seconds allowed for sending the request; 0 disables. */
  writeTimeout: z.number().int().nonnegative().default(0),
  /** Seconds after which an idle keep-alive connection is retired; 0 disables. */
  maxConnDuration: z.number().int().nonnegative().default(0),
  userAgent: z.string().optional(),
  maxConnsPerHost: positiveOrDefault(DEFAULT_MAX_CONNS_PER_HOST),
  tlsConfig: TlsConfigSchema.default({}),
  blockedIps: z
    .array(z.string().refine(isIpOrCidr, (value) => ({ message: `invalid IP or CIDR "${value}"` })))
    .default([]),
  blockedHostnames: z
    .array(
      z.string().regex(HOSTNAME_PATTERN, { message: 'hostname pattern must be a hostname or start with "*."' })
    )
    .default([]),
  decompress: z.boolean().default(true)
});

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type ClientConfig = z.output<typeof ClientConfigSchema>;

const RequestBodySchema = z.union([z.string(), z.instanceof(Uint8Array), z.instanceof(FileStream)]);

export const RESPONSE_TYPES = ['text', 'binary', 'none'] as const;

export const RequestOptionsSchema = z.object({
  /** Reject on transport failure instead of returning a result carrying the error. */
  throw: z.boolean().default(false),
  disableKeepAlive: z.boolean().default(false),
  /** Host header override; the connection still goes to the URL's host. */
  host: z.string().min(1).optional(),
  headers: z.record(z.string()).default({}),
  body: RequestBodySchema.optional(),
  responseType: z.enum(RESPONSE_TYPES, { errorMap: () => ({ message: 'Invalid response type' }) }).default('text')
});

export type RequestOptionsInput = z.input<typeof RequestOptionsSchema>;
export type RequestOptions = z.output<typeof RequestOptionsSchema>;
export type RequestBodyInput = z.output<typeof RequestBodySchema>;
export type ResponseType = (typeof RESPONSE_TYPES)[number];
