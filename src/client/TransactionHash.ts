import { TRANSACTION_HASH_BYTES } from '@/constants.js';
import { DecodingError } from '@/transport/RelayError.js';

import { decodeBase64, encodeBase64 } from './encoding.js';

/**
 * Content identifier of an encrypted payload the node has stored.
 *
 * Always {@link TRANSACTION_HASH_BYTES} bytes; its canonical text form is
 * standard base64.
 */
export class TransactionHash {
  private readonly bytes: Buffer;

  private constructor(bytes: Buffer) {
    this.bytes = bytes;
  }

  static fromBytes(bytes: Uint8Array): TransactionHash {
    if (bytes.byteLength !== TRANSACTION_HASH_BYTES) {
      throw new DecodingError(
        'transaction hash',
        `expected ${TRANSACTION_HASH_BYTES} bytes, got ${bytes.byteLength}`
      );
    }
    return new TransactionHash(Buffer.from(bytes));
  }

  static fromBase64(text: string): TransactionHash {
    return TransactionHash.fromBytes(decodeBase64(text.trim(), 'transaction hash'));
  }

  toBase64(): string {
    return encodeBase64(this.bytes);
  }

  toBytes(): Buffer {
    return Buffer.from(this.bytes);
  }

  equals(other: TransactionHash): boolean {
    return this.bytes.equals(other.bytes);
  }

  toString(): string {
    return this.toBase64();
  }
}
