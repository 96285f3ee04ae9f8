import pako from 'pako';
import { ByteReader } from '../byte-reader.js';
import { ImageEncoder, encodeChildrenAt, exhausted, fragment, type EncodeAt, type FragmentResult } from '../encoder.js';
import { ImagePartsError } from '../errors.js';
import { resolveOptions, type ImagePartsOptions, type ResolvedOptions } from '../options.js';
import type { ImageContainer } from '../types.js';
import { PNG_SIGNATURE, concatBytes, isPngSignature, stringToBytes } from '../utils.js';
import { PngChunk } from './chunk.js';

export const CHUNK_IHDR = 'IHDR';
export const CHUNK_IEND = 'IEND';
// http://www.libpng.org/pub/png/spec/1.2/PNG-Chunks.html#C.iCCP
export const CHUNK_ICCP = 'iCCP';
// https://ftp-osl.osuosl.org/pub/libpng/documents/pngext-1.5.0.html#C.eXIf
export const CHUNK_EXIF = 'eXIf';

const ICC_PROFILE_NAME = stringToBytes('icc');
const COMPRESSION_METHOD_DEFLATE = 0;

/**
 * A PNG image as the ordered list of its chunks.
 *
 * The 8-byte signature is implicit and always written first.
 */
export class Png implements ImageContainer, EncodeAt {
  chunks: PngChunk[];
  private readonly options: ResolvedOptions;

  constructor(chunks: PngChunk[] = [], options?: ImagePartsOptions) {
    this.chunks = chunks;
    this.options = resolveOptions(options);
  }

  /**
   * Parse a PNG image, reading chunks until the input is exhausted.
   *
   * @throws ImagePartsError 'WrongSignature', 'Truncated' or 'BadCRC'
   */
  static fromBytes(data: Uint8Array, options?: ImagePartsOptions): Png {
    const reader = new ByteReader(data);
    const signature = reader.take(PNG_SIGNATURE.length);
    if (!isPngSignature(signature)) {
      throw new ImagePartsError('WrongSignature', 'Invalid PNG signature');
    }

    const png = new Png([], options);
    while (!reader.isEmpty()) {
      png.chunks.push(PngChunk.read(reader));
    }
    return png;
  }

  chunkByType(type: string): PngChunk | undefined {
    return this.chunks.find((chunk) => chunk.type === type);
  }

  chunksByType(type: string): PngChunk[] {
    return this.chunks.filter((chunk) => chunk.type === type);
  }

  removeChunksByType(type: string): void {
    this.chunks = this.chunks.filter((chunk) => chunk.type !== type);
  }

  /**
   * Size once encoded: signature (8 bytes) plus every chunk
   */
  get byteLength(): number {
    return this.chunks.reduce((sum, chunk) => sum + chunk.byteLength, PNG_SIGNATURE.length);
  }

  encodeAt(index: number): FragmentResult {
    if (index === 0) {
      return fragment(PNG_SIGNATURE);
    }
    const result = encodeChildrenAt(this.chunks, index - 1);
    return result.done ? exhausted(result.consumed + 1) : result;
  }

  encoder(): ImageEncoder {
    return new ImageEncoder(this);
  }

  /**
   * The profile inflated from the iCCP chunk.
   *
   * A chunk with an unknown compression method or data that doesn't inflate
   * is reported to the logger and treated as no profile.
   */
  iccProfile(): Uint8Array | undefined {
    const chunk = this.chunkByType(CHUNK_ICCP);
    if (!chunk) {
      return undefined;
    }

    // profile name, null separator, compression method
    const separator = chunk.data.indexOf(0);
    if (separator === -1 || separator + 1 >= chunk.data.length) {
      this.options.logger('PNG: iCCP chunk has no profile name terminator or compression method');
      return undefined;
    }

    const method = chunk.data[separator + 1];
    if (method !== COMPRESSION_METHOD_DEFLATE) {
      this.options.logger(`PNG: iCCP chunk uses unknown compression method ${method}`);
      return undefined;
    }

    try {
      const profile: Uint8Array | undefined = pako.inflate(chunk.data.subarray(separator + 2));
      if (!profile) {
        this.options.logger('PNG: iCCP profile ends before the end of its deflate stream');
      }
      return profile;
    } catch (err) {
      this.options.logger(`PNG: iCCP profile failed to inflate: ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    }
  }

  /**
   * Replace the iCCP chunk with one holding `profile`, deflated at the
   * configured level, right after IHDR.
   */
  setIccProfile(profile: Uint8Array | undefined): void {
    this.removeChunksByType(CHUNK_ICCP);
    if (!profile) {
      return;
    }

    const compressed = pako.deflate(profile, { level: this.options.iccCompressionLevel });
    const data = concatBytes([
      ICC_PROFILE_NAME,
      new Uint8Array([0, COMPRESSION_METHOD_DEFLATE]),
      compressed
    ]);

    this.chunks.splice(Math.min(1, this.chunks.length), 0, new PngChunk(CHUNK_ICCP, data));
  }

  exif(): Uint8Array | undefined {
    return this.chunkByType(CHUNK_EXIF)?.data;
  }

  /**
   * Replace the eXIf chunk with one holding `exif`, just before the last
   * chunk (IEND)
   */
  setExif(exif: Uint8Array | undefined): void {
    this.removeChunksByType(CHUNK_EXIF);
    if (!exif) {
      return;
    }

    this.chunks.splice(Math.max(0, this.chunks.length - 1), 0, new PngChunk(CHUNK_EXIF, exif));
  }
}
