import { ImagePartsError } from './errors.js';
import { bytesToString, readUInt32BE } from './utils.js';

/**
 * Bounds-checked cursor over an immutable byte view.
 *
 * Every read throws `ImagePartsError('Truncated')` when fewer bytes are left
 * than the field needs, so parsers built on it cannot read past the input.
 * `take` and `rest` return views sharing the underlying buffer.
 */
export class ByteReader {
  private readonly data: Uint8Array;
  private offset = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  isEmpty(): boolean {
    return this.remaining === 0;
  }

  private ensure(size: number): void {
    if (size > this.remaining) {
      throw new ImagePartsError(
        'Truncated',
        `needed ${size} bytes at offset ${this.offset}, only ${this.remaining} left`
      );
    }
  }

  readUInt8(): number {
    this.ensure(1);
    return this.data[this.offset++];
  }

  readUInt16BE(): number {
    this.ensure(2);
    const value = (this.data[this.offset] << 8) | this.data[this.offset + 1];
    this.offset += 2;
    return value;
  }

  readUInt32BE(): number {
    this.ensure(4);
    const value = readUInt32BE(this.data, this.offset);
    this.offset += 4;
    return value;
  }

  readUInt32LE(): number {
    this.ensure(4);
    const value = (
      this.data[this.offset] |
      (this.data[this.offset + 1] << 8) |
      (this.data[this.offset + 2] << 16) |
      (this.data[this.offset + 3] << 24)
    ) >>> 0;
    this.offset += 4;
    return value;
  }

  /**
   * Read a four-character code (PNG chunk type, RIFF chunk id)
   */
  readFourCC(): string {
    this.ensure(4);
    const code = bytesToString(this.data, this.offset, 4);
    this.offset += 4;
    return code;
  }

  /**
   * Split off the next `length` bytes without copying
   */
  take(length: number): Uint8Array {
    this.ensure(length);
    const view = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return view;
  }

  /**
   * Split off everything that is left without copying
   */
  rest(): Uint8Array {
    return this.take(this.remaining);
  }
}
