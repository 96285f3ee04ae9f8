import { ByteReader } from '../byte-reader.js';
import { ImageEncoder, exhausted, fragment, type EncodeAt, type FragmentResult } from '../encoder.js';
import { ImagePartsError } from '../errors.js';
import { crc32, fourCCToBytes, writeUInt32BE } from '../utils.js';

/**
 * A chunk making up a `Png`: length, type, data and the CRC over type + data
 */
export class PngChunk implements EncodeAt {
  readonly type: string;
  readonly data: Uint8Array;
  readonly crc: number;

  /**
   * Create a chunk; the CRC is computed unless a known one is passed
   */
  constructor(type: string, data: Uint8Array, crc: number = computeCrc(type, data)) {
    fourCCToBytes(type);
    this.type = type;
    this.data = data;
    this.crc = crc;
  }

  /**
   * Read the next chunk from `reader`, verifying its CRC
   *
   * @throws ImagePartsError 'Truncated' or 'BadCRC'
   */
  static read(reader: ByteReader): PngChunk {
    const length = reader.readUInt32BE();
    const type = reader.readFourCC();
    const data = reader.take(length);
    const crc = reader.readUInt32BE();

    if (crc !== computeCrc(type, data)) {
      throw new ImagePartsError('BadCRC', `CRC mismatch for chunk ${type}`);
    }

    return new PngChunk(type, data, crc);
  }

  /**
   * Size once encoded: length (4 bytes), type (4 bytes), data, CRC (4 bytes)
   */
  get byteLength(): number {
    return 12 + this.data.length;
  }

  encodeAt(index: number): FragmentResult {
    // header, data (skipped when empty), crc
    const count = this.data.length > 0 ? 3 : 2;
    if (index >= count) {
      return exhausted(count);
    }

    if (index === 0) {
      const header = new Uint8Array(8);
      writeUInt32BE(header, this.data.length, 0);
      header.set(fourCCToBytes(this.type), 4);
      return fragment(header);
    }
    if (index === 1 && count === 3) {
      return fragment(this.data);
    }

    const crc = new Uint8Array(4);
    writeUInt32BE(crc, this.crc, 0);
    return fragment(crc);
  }

  encoder(): ImageEncoder {
    return new ImageEncoder(this);
  }
}

function computeCrc(type: string, data: Uint8Array): number {
  return crc32(data, crc32(fourCCToBytes(type)));
}
