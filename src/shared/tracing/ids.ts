/**
 * Span Identifiers
 *
 * 16-byte, time-ordered identifiers laid out like a version-8 UUID:
 *
 *   bytes 0-5   Unix time in milliseconds (big endian)
 *   bytes 6-7   version nibble 0x8, then the top 12 bits of the
 *               sub-millisecond nanoseconds
 *   byte  8     variant bits 0b10, then the next 6 bits of nanoseconds
 *   byte  9     last 2 bits of nanoseconds, then 6 random bits
 *   bytes 10-15 random
 *
 * Byte order equals creation order within a process. Across processes the
 * order follows each process's clock.
 */

import { randomBytes } from 'node:crypto';
import { ValidationError } from '../validation/errors.js';
import { validateSpanIdString } from '../validation/validators.js';

/**
 * Raw span identifier
 */
export type SpanId = Buffer;

export const SPAN_ID_BYTES = 16;

const NS_PER_MS = 1_000_000n;

/** Offset between the monotonic clock and Unix time, fixed at load */
const clockOffsetNs = BigInt(Date.now()) * NS_PER_MS - process.hrtime.bigint();

let lastNs = 0n;

function nextTimestampNs(): bigint {
  let now = clockOffsetNs + process.hrtime.bigint();
  if (now <= lastNs) {
    now = lastNs + 1n;
  }
  lastNs = now;
  return now;
}

/**
 * Generate a new span id, strictly greater than every id this process
 * generated before
 */
export function newSpanId(): SpanId {
  const ns = nextTimestampNs();
  const ms = Number(ns / NS_PER_MS);
  const subMs = Number(ns % NS_PER_MS); // < 2^20

  const id = randomBytes(SPAN_ID_BYTES);
  id.writeUIntBE(ms, 0, 6);
  id[6] = 0x80 | ((subMs >>> 16) & 0x0f);
  id[7] = (subMs >>> 8) & 0xff;
  id[8] = 0x80 | ((subMs >>> 2) & 0x3f);
  id[9] = ((subMs & 0x03) << 6) | (id[9] & 0x3f);
  return id;
}

/**
 * Millisecond timestamp embedded in a span id
 */
export function spanIdTimestamp(id: SpanId): number {
  return id.readUIntBE(0, 6);
}

/**
 * Encode a span id as unpadded base64url (22 characters)
 */
export function spanIdToString(id: SpanId): string {
  return id.toString('base64url');
}

/**
 * Decode the display form produced by `spanIdToString`
 *
 * @throws ValidationError for anything that is not a 22-character base64url id
 */
export function spanIdFromString(text: string): SpanId {
  const result = validateSpanIdString(text);
  if (!result.valid) {
    throw ValidationError.fromErrors('span id', result.errors);
  }
  return Buffer.from(result.value, 'base64url');
}

/**
 * Check for a buffer of span id length
 */
export function isSpanId(value: unknown): value is SpanId {
  return Buffer.isBuffer(value) && value.length === SPAN_ID_BYTES;
}

/**
 * Byte-wise ordering of span ids, which is creation order
 */
export function compareSpanIds(a: SpanId, b: SpanId): number {
  return Buffer.compare(a, b);
}

/**
 * Equality of two span ids
 */
export function spanIdEquals(a: SpanId, b: SpanId): boolean {
  return a.equals(b);
}
