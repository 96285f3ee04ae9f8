import { ImageEncoder, type EncodeAt, type FragmentResult } from '../encoder.js';
import { ImagePartsError } from '../errors.js';
import { resolveOptions, type ImagePartsOptions, type ResolvedOptions } from '../options.js';
import { RiffChunk, dataOf, listOf, riffData, type RiffList } from '../riff/chunk.js';
import type { ImageContainer } from '../types.js';
import { EXIF_DATA_PREFIX, concatBytes, startsWith } from '../utils.js';
import {
  FLAG_EXIF,
  FLAG_ICC,
  VP8X_SIZE,
  canvasFromVp8x,
  encodeVp8x,
  withFlag
} from './flags.js';
import { sizeFromVp8Header, sizeFromVp8lHeader, type Dimensions, type WebPKind } from './vp8.js';

export const CHUNK_ALPH = 'ALPH';
export const CHUNK_ANIM = 'ANIM';
export const CHUNK_ANMF = 'ANMF';
export const CHUNK_EXIF = 'EXIF';
export const CHUNK_ICCP = 'ICCP';
export const CHUNK_VP8 = 'VP8 ';
export const CHUNK_VP8L = 'VP8L';
export const CHUNK_VP8X = 'VP8X';
export const CHUNK_XMP = 'XMP ';

const WEBP_KIND = 'WEBP';

// chunks that only an extended (VP8X) file may hold
const EXTENDED_CHUNKS = [CHUNK_ICCP, CHUNK_EXIF, CHUNK_XMP, CHUNK_ANIM, CHUNK_ALPH];

function webpList(riff: RiffChunk): RiffList {
  const list = listOf(riff.content);
  if (riff.id !== 'RIFF' || !list || list.kind !== WEBP_KIND) {
    throw new ImagePartsError('WrongSignature', `expected a RIFF chunk of kind ${WEBP_KIND}`);
  }
  return list;
}

/**
 * A WebP image: a `RIFF` chunk of kind `WEBP` and its subchunks.
 *
 * Adding an ICC profile or EXIF data to a simple (`VP8`/`VP8L`) image turns
 * it into an extended one by inserting a `VP8X` chunk; removing the last
 * extended feature removes it again.
 */
export class WebP implements ImageContainer, EncodeAt {
  readonly riff: RiffChunk;
  private readonly options: ResolvedOptions;

  /**
   * @throws ImagePartsError 'WrongSignature' unless `riff` is a `RIFF` chunk
   * of kind `WEBP`
   */
  constructor(riff: RiffChunk, options?: ImagePartsOptions) {
    webpList(riff);
    this.riff = riff;
    this.options = resolveOptions(options);
  }

  /**
   * @throws ImagePartsError 'WrongSignature' or 'Truncated'
   */
  static fromBytes(data: Uint8Array, options?: ImagePartsOptions): WebP {
    return new WebP(RiffChunk.fromBytes(data), options);
  }

  /**
   * @throws ImagePartsError 'WrongSignature' if `riff.content` was replaced
   * by something other than a `WEBP` list
   */
  get chunks(): RiffChunk[] {
    return this.list().subchunks;
  }

  hasChunk(id: string): boolean {
    return this.chunkById(id) !== undefined;
  }

  chunkById(id: string): RiffChunk | undefined {
    return this.chunks.find((chunk) => chunk.id === id);
  }

  chunksById(id: string): RiffChunk[] {
    return this.chunks.filter((chunk) => chunk.id === id);
  }

  removeChunksById(id: string): void {
    const list = this.list();
    list.subchunks = list.subchunks.filter((chunk) => chunk.id !== id);
  }

  kind(): WebPKind {
    if (this.hasChunk(CHUNK_VP8X)) {
      return 'VP8X';
    }
    if (this.hasChunk(CHUNK_VP8L)) {
      return 'VP8L';
    }
    return 'VP8';
  }

  /**
   * Canvas size from the VP8X chunk if there is one, else the frame size from
   * the VP8L or VP8 bitstream header.
   */
  dimensions(): Dimensions | undefined {
    const vp8x = this.chunkData(CHUNK_VP8X);
    if (vp8x) {
      return canvasFromVp8x(vp8x);
    }

    const vp8l = this.chunkData(CHUNK_VP8L);
    if (vp8l) {
      return sizeFromVp8lHeader(vp8l);
    }

    const vp8 = this.chunkData(CHUNK_VP8);
    return vp8 ? sizeFromVp8Header(vp8) : undefined;
  }

  get byteLength(): number {
    return this.riff.byteLength;
  }

  encodeAt(index: number): FragmentResult {
    return this.riff.encodeAt(index);
  }

  encoder(): ImageEncoder {
    return new ImageEncoder(this);
  }

  iccProfile(): Uint8Array | undefined {
    return this.chunkData(CHUNK_ICCP);
  }

  /**
   * Replace the ICCP chunk, placed right after VP8X.
   *
   * @throws ImagePartsError 'WrongSignature' when the image has to become
   * extended but its canvas size can't be read from the bitstream header
   */
  setIccProfile(profile: Uint8Array | undefined): void {
    this.replaceMetadata(CHUNK_ICCP, profile, () => {
      const vp8x = this.chunks.findIndex((chunk) => chunk.id === CHUNK_VP8X);
      return vp8x + 1;
    });
  }

  /**
   * The EXIF data with its "Exif\0\0" prefix stripped. Data written without
   * the prefix is returned as is.
   */
  exif(): Uint8Array | undefined {
    const data = this.chunkData(CHUNK_EXIF);
    if (!data) {
      return undefined;
    }
    if (!startsWith(data, EXIF_DATA_PREFIX)) {
      this.options.logger('WebP: EXIF chunk has no "Exif\\0\\0" prefix, returning it unchanged');
      return data;
    }
    return data.subarray(EXIF_DATA_PREFIX.length);
  }

  /**
   * Replace the EXIF chunk, appended after the image data.
   *
   * @throws ImagePartsError 'WrongSignature' when the image has to become
   * extended but its canvas size can't be read from the bitstream header
   */
  setExif(exif: Uint8Array | undefined): void {
    this.replaceMetadata(
      CHUNK_EXIF,
      exif && concatBytes([EXIF_DATA_PREFIX, exif]),
      () => this.chunks.length
    );
  }

  private list(): RiffList {
    return webpList(this.riff);
  }

  private chunkData(id: string): Uint8Array | undefined {
    const chunk = this.chunkById(id);
    return chunk ? dataOf(chunk.content) : undefined;
  }

  private replaceMetadata(id: string, data: Uint8Array | undefined, position: () => number): void {
    let canvas: Dimensions | undefined;
    if (data && !this.hasChunk(CHUNK_VP8X)) {
      canvas = this.dimensions();
      if (!canvas) {
        throw new ImagePartsError(
          'WrongSignature',
          `WebP: can't add ${id.trim()} chunk, the ${this.kind()} bitstream header has no readable size`
        );
      }
    }

    this.removeChunksById(id);
    if (canvas) {
      // flags are filled in by syncVp8x once the new chunk is in place
      this.chunks.unshift(new RiffChunk(CHUNK_VP8X, riffData(encodeVp8x(0, canvas))));
    }
    if (data) {
      this.chunks.splice(position(), 0, new RiffChunk(id, riffData(data)));
    }

    this.syncVp8x();
  }

  /**
   * Bring the VP8X chunk in line with the metadata chunks present: drop it
   * when no extended feature is left, otherwise set its ICC and EXIF bits.
   */
  private syncVp8x(): void {
    const vp8x = this.chunkById(CHUNK_VP8X);
    if (!vp8x) {
      return;
    }

    if (!EXTENDED_CHUNKS.some((id) => this.hasChunk(id))) {
      this.removeChunksById(CHUNK_VP8X);
      return;
    }

    const data = dataOf(vp8x.content);
    if (!data || data.length < VP8X_SIZE) {
      this.options.logger(`WebP: VP8X chunk is ${data?.length ?? 0} bytes, leaving its flags untouched`);
      return;
    }

    let flags = data[0];
    flags = withFlag(flags, FLAG_ICC, this.hasChunk(CHUNK_ICCP));
    flags = withFlag(flags, FLAG_EXIF, this.hasChunk(CHUNK_EXIF));
    if (flags !== data[0]) {
      const updated = data.slice();
      updated[0] = flags;
      vp8x.content = riffData(updated);
    }
  }
}
