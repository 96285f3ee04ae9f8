import { ByteReader } from '../byte-reader.js';
import { ImageEncoder, encodeChildrenAt, exhausted, fragment, type EncodeAt, type FragmentResult } from '../encoder.js';
import { ImagePartsError } from '../errors.js';
import { resolveOptions, type ImagePartsOptions, type ResolvedOptions } from '../options.js';
import type { ImageContainer } from '../types.js';
import { concatBytes } from '../utils.js';
import * as markers from './markers.js';
import { ICC_HEADER_SIZE, JpegSegment, type IccPart } from './segment.js';

// max data per ICC segment: u16 max - length field (2 bytes) - ICC header (14 bytes)
export const ICC_SEGMENT_MAX_SIZE = 65535 - 2 - ICC_HEADER_SIZE;

// largest contents a length-bearing segment can hold
const SEGMENT_MAX_CONTENTS = 65535 - 2;

// new metadata segments go after the leading segments (APP0/APP1 and friends)
const METADATA_INSERT_POSITION = 3;

const SOI_BYTES = new Uint8Array([markers.P, markers.SOI]);
const EOI_BYTES = new Uint8Array([markers.P, markers.EOI]);

/**
 * A JPEG image as the ordered list of its marker segments.
 *
 * The SOI marker is implicit and always written first. The scan segment keeps
 * everything after its header as entropy data, EOI included; when there is no
 * scan segment the encoder writes the EOI marker itself.
 */
export class Jpeg implements ImageContainer, EncodeAt {
  segments: JpegSegment[];
  private readonly options: ResolvedOptions;

  constructor(segments: JpegSegment[] = [], options?: ImagePartsOptions) {
    this.segments = segments;
    this.options = resolveOptions(options);
  }

  /**
   * Parse a JPEG image.
   *
   * @throws ImagePartsError 'WrongSignature' if the first two bytes aren't the
   * SOI marker, 'Truncated' if the input ends before EOI or the scan segment
   */
  static fromBytes(data: Uint8Array, options?: ImagePartsOptions): Jpeg {
    const jpeg = new Jpeg([], options);
    const reader = new ByteReader(data);

    if (reader.readUInt8() !== markers.P || reader.readUInt8() !== markers.SOI) {
      throw new ImagePartsError('WrongSignature', 'first two bytes are not the SOI marker');
    }

    while (true) {
      let skipped = 0;
      let marker: number;
      do {
        while (reader.readUInt8() !== markers.P) {
          skipped++;
        }
        // any number of 0xFF fill bytes may precede the marker
        marker = reader.readUInt8();
        while (marker === markers.P) {
          marker = reader.readUInt8();
        }
        if (marker === markers.Z) {
          skipped += 2;
        }
      } while (marker === markers.Z);

      if (skipped > 0) {
        jpeg.options.logger(`JPEG: skipped ${skipped} stray bytes before offset ${reader.position - 2}`);
      }

      if (marker === markers.EOI) {
        break;
      }

      if (!markers.hasLength(marker)) {
        jpeg.segments.push(new JpegSegment(marker));
        continue;
      }

      const segment = JpegSegment.read(marker, reader);
      jpeg.segments.push(segment);

      if (markers.hasEntropy(marker)) {
        break;
      }
    }

    return jpeg;
  }

  segmentByMarker(marker: number): JpegSegment | undefined {
    return this.segments.find((segment) => segment.marker === marker);
  }

  segmentsByMarker(marker: number): JpegSegment[] {
    return this.segments.filter((segment) => segment.marker === marker);
  }

  removeSegmentsByMarker(marker: number): void {
    this.segments = this.segments.filter((segment) => segment.marker !== marker);
  }

  /**
   * Size once encoded: SOI (2 bytes), every segment with its entropy data,
   * and EOI (2 bytes) when there is no scan segment.
   */
  get byteLength(): number {
    let length = SOI_BYTES.length;
    for (const segment of this.segments) {
      length += segment.byteLengthWithEntropy;
    }
    if (!this.hasScanData()) {
      length += EOI_BYTES.length;
    }
    return length;
  }

  encodeAt(index: number): FragmentResult {
    if (index === 0) {
      return fragment(SOI_BYTES);
    }

    const result = encodeChildrenAt(this.segments, index - 1);
    if (!result.done) {
      return result;
    }

    // SOI + every segment fragment
    let consumed = result.consumed + 1;
    if (!this.hasScanData()) {
      if (index === consumed) {
        return fragment(EOI_BYTES);
      }
      consumed++;
    }
    return exhausted(consumed);
  }

  encoder(): ImageEncoder {
    return new ImageEncoder(this);
  }

  /**
   * The ICC profile, reassembled from its APP2 segments in sequence order.
   *
   * Returns undefined when there is none or when the segments don't form a
   * complete sequence (seqno outside 1..count, counts disagreeing, parts
   * missing or repeated).
   */
  iccProfile(): Uint8Array | undefined {
    const parts: IccPart[] = [];
    for (const segment of this.segments) {
      const part = segment.iccPart();
      if (part) {
        parts.push(part);
      }
    }
    if (parts.length === 0) {
      return undefined;
    }

    const count = parts[0].count;
    const seen = new Set<number>();
    for (const part of parts) {
      if (part.seqno === 0 || part.seqno > count || part.count !== count || seen.has(part.seqno)) {
        this.options.logger(
          `JPEG: invalid ICC segment ${part.seqno}/${part.count}, ignoring the embedded profile`
        );
        return undefined;
      }
      seen.add(part.seqno);
    }
    if (parts.length !== count) {
      this.options.logger(`JPEG: found ${parts.length} of ${count} ICC segments, ignoring the embedded profile`);
      return undefined;
    }

    if (parts.length === 1) {
      return parts[0].data;
    }

    parts.sort((a, b) => a.seqno - b.seqno);
    return concatBytes(parts.map((part) => part.data));
  }

  /**
   * Remove every ICC segment, then embed `profile` (if given) as a run of
   * APP2 segments at a fixed early position.
   *
   * @throws RangeError if the profile needs more than 255 segments
   */
  setIccProfile(profile: Uint8Array | undefined): void {
    this.segments = this.segments.filter((segment) => segment.iccPart() === undefined);
    if (!profile) {
      return;
    }

    const count = Math.max(1, Math.ceil(profile.length / ICC_SEGMENT_MAX_SIZE));
    if (count > 255) {
      throw new RangeError(`ICC profile of ${profile.length} bytes doesn't fit in 255 APP2 segments`);
    }

    const iccSegments: JpegSegment[] = [];
    for (let i = 0; i < count; i++) {
      const start = i * ICC_SEGMENT_MAX_SIZE;
      const data = profile.subarray(start, Math.min(profile.length, start + ICC_SEGMENT_MAX_SIZE));
      iccSegments.push(JpegSegment.icc(i + 1, count, data));
    }

    this.segments.splice(this.insertPosition(), 0, ...iccSegments);
  }

  exif(): Uint8Array | undefined {
    for (const segment of this.segments) {
      const exif = segment.exifData();
      if (exif) {
        return exif;
      }
    }
    return undefined;
  }

  /**
   * @throws RangeError if `exif` doesn't fit in a single APP1 segment
   */
  setExif(exif: Uint8Array | undefined): void {
    this.segments = this.segments.filter((segment) => segment.exifData() === undefined);
    if (!exif) {
      return;
    }

    const segment = JpegSegment.exif(exif);
    if (segment.contents.length > SEGMENT_MAX_CONTENTS) {
      throw new RangeError(`EXIF data of ${exif.length} bytes doesn't fit in an APP1 segment`);
    }
    this.segments.splice(this.insertPosition(), 0, segment);
  }

  // the scan segment owns the EOI marker, even when the input stopped right
  // after its header
  private hasScanData(): boolean {
    return this.segments.some((segment) => markers.hasEntropy(segment.marker));
  }

  private insertPosition(): number {
    return Math.min(METADATA_INSERT_POSITION, this.segments.length);
  }
}
