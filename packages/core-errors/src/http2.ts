/**
 * HTTP/2 error codes as defined in RFC 9113 section 7, in wire order.
 */
export const HTTP2_ERROR_NAMES = [
  'NO_ERROR',
  'PROTOCOL_ERROR',
  'INTERNAL_ERROR',
  'FLOW_CONTROL_ERROR',
  'SETTINGS_TIMEOUT',
  'STREAM_CLOSED',
  'FRAME_SIZE_ERROR',
  'REFUSED_STREAM',
  'CANCEL',
  'COMPRESSION_ERROR',
  'CONNECT_ERROR',
  'ENHANCE_YOUR_CALM',
  'INADEQUATE_SECURITY',
  'HTTP_1_1_REQUIRED'
] as const;

export type Http2ErrorName = (typeof HTTP2_ERROR_NAMES)[number];

const HIGHEST_KNOWN_SUBCODE = HTTP2_ERROR_NAMES.length - 1;

function isKnownSubcode(subcode: number): boolean {
  return Number.isInteger(subcode) && subcode >= 0 && subcode <= HIGHEST_KNOWN_SUBCODE;
}

export function http2ErrorName(subcode: number): string {
  if (isKnownSubcode(subcode)) {
    return HTTP2_ERROR_NAMES[subcode] ?? `unknown error code 0x${subcode.toString(16)}`;
  }
  return `unknown error code 0x${Math.max(0, Math.trunc(subcode)).toString(16)}`;
}

/**
 * Position of `subcode` inside an HTTP/2 partition. Offset 0 is the
 * partition's "unknown" slot; known subcodes start at 1.
 */
export function http2SubcodeOffset(subcode: number): number {
  return isKnownSubcode(subcode) ? subcode + 1 : 0;
}

/**
 * Node reports stream resets as "Stream closed with error code NGHTTP2_REFUSED_STREAM".
 */
export function parseNghttp2Name(message: string): number | undefined {
  const match = /NGHTTP2_([A-Z0-9_]+)/.exec(message);
  if (!match) return undefined;
  const index = HTTP2_ERROR_NAMES.findIndex((name) => name === match[1]);
  return index === -1 ? undefined : index;
}

/**
 * Node reports session failures as "Session closed with error code 2".
 */
export function parseNumericSubcode(message: string): number | undefined {
  const match = /error code (\d+)/.exec(message);
  return match?.[1] === undefined ? undefined : Number(match[1]);
}
