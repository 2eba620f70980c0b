/**
 * Request ID Utilities
 */

import { randomBytes } from 'node:crypto';

const BASE32_ALPHABET = 'abcdefghijklmnopqrstuvwxyz234567';
const REQUEST_ID_PATTERN = /^req_[a-z2-7]{8,32}$/;
const INCOMING_ID_PATTERN = /^[\x21-\x7e]{1,128}$/;

function toBase32(bytes: Buffer): string {
  let result = '';
  let bits = 0;
  let value = 0;

  for (const byte of bytes) {
    value = ((value << 8) | byte) & 0xfff;
    bits += 8;

    while (bits >= 5) {
      bits -= 5;
      result += BASE32_ALPHABET[(value >> bits) & 0x1f];
    }
  }

  if (bits > 0) {
    result += BASE32_ALPHABET[(value << (5 - bits)) & 0x1f];
  }

  return result;
}

/**
 * Generate a request ID: `req_` + 16 base32 chars (80 random bits)
 */
export function generateRequestId(): string {
  return 'req_' + toBase32(randomBytes(10));
}

export function isValidRequestId(id: string): boolean {
  return REQUEST_ID_PATTERN.test(id);
}

/**
 * Use the incoming header value when trusted and printable (max 128 chars),
 * otherwise generate a fresh ID
 */
export function resolveRequestId(
  headerValue: string | string[] | undefined,
  trustIncoming: boolean
): string {
  const value = Array.isArray(headerValue) ? headerValue[0] : headerValue;
  if (trustIncoming && value !== undefined && INCOMING_ID_PATTERN.test(value)) {
    return value;
  }
  return generateRequestId();
}
