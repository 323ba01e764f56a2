/**
 * Wire encoding helpers shared by the payload client.
 */

import { PARTICIPANT_SEPARATOR } from '@/constants.js';
import { DecodingError } from '@/transport/RelayError.js';

/**
 * A participant's public key: raw bytes, or text already in base64.
 */
export type ParticipantKey = Uint8Array | string;

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Standard (padded) base64 of raw bytes.
 */
export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Strict standard base64 decoding. Line breaks are ignored; anything else
 * outside the alphabet, or missing padding, is a DecodingError.
 *
 * `Buffer.from(text, 'base64')` silently skips bad characters, so the text is
 * checked first.
 */
export function decodeBase64(text: string, subject: string): Buffer {
  const compact = text.replace(/[\r\n]/g, '');
  if (!BASE64_PATTERN.test(compact)) {
    const preview = compact.length > 32 ? `${compact.slice(0, 32)}...` : compact;
    throw new DecodingError(subject, `invalid base64 ${JSON.stringify(preview)}`);
  }
  return Buffer.from(compact, 'base64');
}

/**
 * Base64 text for a participant key. Strings are assumed to be base64 already
 * and pass through unchanged.
 */
export function participantToBase64(key: ParticipantKey): string {
  return typeof key === 'string' ? key : encodeBase64(key);
}

/**
 * True for `undefined`, `''` and zero-length byte arrays.
 */
export function isEmptyParticipant(key: ParticipantKey | undefined): boolean {
  if (key === undefined) return true;
  return typeof key === 'string' ? key.length === 0 : key.byteLength === 0;
}

/**
 * Value of the `c11n-to` header.
 *
 * @example
 * ```typescript
 * joinRecipients(['QUJD', new Uint8Array([1, 2, 3])]) // → 'QUJD,AQID'
 * ```
 */
export function joinRecipients(keys: readonly ParticipantKey[]): string {
  return keys.map(participantToBase64).join(PARTICIPANT_SEPARATOR);
}

/**
 * Split a participants response body.
 *
 * An empty body yields `['']`, not `[]`; this mirrors the node's own
 * behaviour and is left for callers to handle.
 */
export function splitParticipants(body: string): string[] {
  return body.split(PARTICIPANT_SEPARATOR);
}

/**
 * Escape a value for use as a single URL path segment.
 * Base64's `+`, `/` and `=` are percent-escaped.
 */
export function escapePathSegment(segment: string): string {
  return encodeURIComponent(segment);
}

/**
 * JSON request body: the encoded value followed by a newline.
 */
export function toJSONBody(value: unknown): string {
  return JSON.stringify(value) + '\n';
}
