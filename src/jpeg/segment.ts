import { ByteReader } from '../byte-reader.js';
import { ImageEncoder, exhausted, fragment, type EncodeAt, type FragmentResult } from '../encoder.js';
import { ImagePartsError } from '../errors.js';
import { EMPTY_BYTES, EXIF_DATA_PREFIX, concatBytes, startsWith, stringToBytes, writeUInt16BE } from '../utils.js';
import * as markers from './markers.js';

export const ICC_DATA_PREFIX = stringToBytes('ICC_PROFILE\0');

// prefix + sequence number + number of sequences
export const ICC_HEADER_SIZE = ICC_DATA_PREFIX.length + 2;

/**
 * One part of an ICC profile split across APP2 segments
 */
export interface IccPart {
  /** Position of this part, between 1 and `count` */
  seqno: number;
  /** How many parts the profile was split into */
  count: number;
  data: Uint8Array;
}

/**
 * A marker segment making up a `Jpeg`.
 *
 * `contents` excludes the marker and the length field. `entropy` is only set
 * on the scan segment: the raw, still byte-stuffed scan data that follows the
 * SOS header, up to and including the EOI marker.
 */
export class JpegSegment implements EncodeAt {
  readonly marker: number;
  readonly contents: Uint8Array;
  readonly entropy: Uint8Array;

  constructor(marker: number, contents: Uint8Array = EMPTY_BYTES, entropy: Uint8Array = EMPTY_BYTES) {
    this.marker = marker;
    this.contents = contents;
    this.entropy = entropy;
  }

  /**
   * Build the APP2 segment carrying part `seqno` of `count` of an ICC profile
   */
  static icc(seqno: number, count: number, data: Uint8Array): JpegSegment {
    const header = new Uint8Array(ICC_HEADER_SIZE);
    header.set(ICC_DATA_PREFIX, 0);
    header[ICC_DATA_PREFIX.length] = seqno;
    header[ICC_DATA_PREFIX.length + 1] = count;
    return new JpegSegment(markers.APP2, concatBytes([header, data]));
  }

  static exif(data: Uint8Array): JpegSegment {
    return new JpegSegment(markers.APP1, concatBytes([EXIF_DATA_PREFIX, data]));
  }

  /**
   * Read the length field and contents of a segment whose marker was just read.
   *
   * For SOS everything left in `reader` becomes the entropy data.
   */
  static read(marker: number, reader: ByteReader): JpegSegment {
    const length = reader.readUInt16BE();
    if (length < 2) {
      throw new ImagePartsError('Truncated', `segment 0x${marker.toString(16)} declares length ${length}`);
    }
    const contents = reader.take(length - 2);

    if (!markers.hasEntropy(marker)) {
      return new JpegSegment(marker, contents);
    }
    return new JpegSegment(marker, contents, reader.rest());
  }

  get hasLength(): boolean {
    return markers.hasLength(this.marker);
  }

  hasEntropy(): boolean {
    return this.entropy.length > 0;
  }

  /**
   * Size once encoded, entropy excluded: marker (2 bytes), length field
   * (2 bytes) if the marker has one, and the contents.
   */
  get byteLength(): number {
    return (this.hasLength ? 4 : 2) + this.contents.length;
  }

  get byteLengthWithEntropy(): number {
    return this.byteLength + this.entropy.length;
  }

  /**
   * The ICC part carried by this segment, if it is an ICC APP2 segment
   */
  iccPart(): IccPart | undefined {
    if (
      this.marker !== markers.APP2 ||
      this.contents.length < ICC_HEADER_SIZE ||
      !startsWith(this.contents, ICC_DATA_PREFIX)
    ) {
      return undefined;
    }

    return {
      seqno: this.contents[ICC_DATA_PREFIX.length],
      count: this.contents[ICC_DATA_PREFIX.length + 1],
      data: this.contents.subarray(ICC_HEADER_SIZE)
    };
  }

  /**
   * The EXIF payload (prefix stripped), if this is an EXIF APP1 segment
   */
  exifData(): Uint8Array | undefined {
    if (this.marker === markers.APP1 && startsWith(this.contents, EXIF_DATA_PREFIX)) {
      return this.contents.subarray(EXIF_DATA_PREFIX.length);
    }
    return undefined;
  }

  encodeAt(index: number): FragmentResult {
    if (index === 0) {
      return fragment(this.framing());
    }

    // empty contents and entropy produce no fragment
    const tail = [this.contents, this.entropy].filter((part) => part.length > 0);
    if (index <= tail.length) {
      return fragment(tail[index - 1]);
    }
    return exhausted(1 + tail.length);
  }

  encoder(): ImageEncoder {
    return new ImageEncoder(this);
  }

  private framing(): Uint8Array {
    if (!this.hasLength) {
      return new Uint8Array([markers.P, this.marker]);
    }
    const framing = new Uint8Array(4);
    framing[0] = markers.P;
    framing[1] = this.marker;
    writeUInt16BE(framing, this.contents.length + 2, 2);
    return framing;
  }
}
