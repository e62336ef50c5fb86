/**
 * Canonical binary encoding
 *
 * Fixed layout, all integers little-endian. Sizes and counts are u64 so the
 * encoding does not depend on the platform that produced it.
 */

import { KeySetSerializationError } from '../keyset/errors';
import { concatBytes, u64ToLEBytes } from '../utils/bytes';

export class CanonicalWriter {
  private parts: Uint8Array[] = [];

  writeU8(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new RangeError(`writeU8: ${value} out of range`);
    }
    this.parts.push(new Uint8Array([value]));
    return this;
  }

  writeU64(value: number): this {
    this.parts.push(u64ToLEBytes(value));
    return this;
  }

  /**
   * Length-prefixed byte string
   */
  writeBytes(bytes: Uint8Array): this {
    this.writeU64(bytes.length);
    this.parts.push(bytes);
    return this;
  }

  finish(): Uint8Array {
    return concatBytes(...this.parts);
  }
}

export class CanonicalReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readU8(): number {
    this.require(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  readU64(): number {
    this.require(8);
    const value = this.view.getBigUint64(this.offset, true);
    this.offset += 8;
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new KeySetSerializationError(`u64 value ${value} exceeds the safe integer range`);
    }
    return Number(value);
  }

  readBytes(): Uint8Array {
    const length = this.readU64();
    this.require(length);
    const value = this.bytes.slice(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  /**
   * Fail unless every byte has been consumed
   */
  finish(): void {
    if (this.remaining !== 0) {
      throw new KeySetSerializationError(`${this.remaining} trailing bytes after decoding`);
    }
  }

  private require(length: number): void {
    if (this.remaining < length) {
      throw new KeySetSerializationError(
        `Unexpected end of input: need ${length} bytes at offset ${this.offset}, have ${this.remaining}`
      );
    }
  }
}
