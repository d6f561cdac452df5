import type { Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';
import { finished } from 'node:stream/promises';
import { promisify } from 'node:util';
import { brotliDecompress, gunzip, inflate } from 'node:zlib';

import { ClassifiedError, ERROR_CODES, renderError } from '@loadwire/core-errors';

import type { ResponseType } from './schemas.js';
import type { TransportResponse } from './transport.js';

export type ResponseBody = string | Uint8Array | undefined;

const DECODERS: Record<string, (input: Buffer) => Promise<Buffer>> = {
  gzip: promisify(gunzip),
  'x-gzip': promisify(gunzip),
  deflate: promisify(inflate),
  br: promisify(brotliDecompress)
};

/** 1xx, 204 and 304 never carry content. */
export function isNoContentStatus(status: number): boolean {
  return (status >= 100 && status <= 199) || status === 204 || status === 304;
}

async function discard(body: Readable): Promise<void> {
  body.resume();
  await finished(body);
}

async function decode(payload: Buffer, contentEncoding: string | undefined): Promise<Buffer> {
  if (!contentEncoding) return payload;

  // encodings apply in listed order, so undo them last to first
  const encodings = contentEncoding
    .split(',')
    .map((encoding) => encoding.trim().toLowerCase())
    .filter((encoding) => encoding !== '' && encoding !== 'identity')
    .reverse();

  let decoded = payload;
  for (const encoding of encodings) {
    const decoder = DECODERS[encoding];
    if (!decoder) {
      throw new ClassifiedError(ERROR_CODES.RESPONSE_DECOMPRESSION, `unsupported content encoding "${encoding}"`);
    }
    try {
      decoded = await decoder(decoded);
    } catch (error) {
      throw new ClassifiedError(ERROR_CODES.RESPONSE_DECOMPRESSION, renderError(error), { cause: error });
    }
  }
  return decoded;
}

/**
 * Reads the body as `responseType` asks. The stream is always consumed to its
 * end so the connection can go back to the agent.
 */
export async function readResponseBody(
  responseType: ResponseType,
  response: TransportResponse,
  options: { decompress: boolean }
): Promise<ResponseBody> {
  if (responseType === 'none' || isNoContentStatus(response.status)) {
    await discard(response.body);
    return undefined;
  }

  const raw = await buffer(response.body);
  const payload = options.decompress ? await decode(raw, response.headers['content-encoding']) : raw;

  switch (responseType) {
    case 'text':
      return payload.toString('utf8');
    case 'binary':
      return new Uint8Array(payload.buffer, payload.byteOffset, payload.byteLength);
  }
}
