/**
 * Format-aware editor for image containers (JPEG, PNG and WebP).
 *
 * Splits a file into its segments or chunks without copying, reads and
 * replaces the embedded ICC profile and EXIF metadata, and writes the file
 * back unchanged byte for byte wherever nothing was edited.
 *
 * @example
 * import { readFile } from 'node:fs/promises';
 * import { createWriteStream } from 'node:fs';
 * import { DynImage } from 'image-parts';
 *
 * const image = DynImage.fromBytes(await readFile('photo.jpg'));
 * if (image) {
 *   image.setIccProfile(await readFile('display-p3.icc'));
 *   await image.encoder().pipeTo(createWriteStream('photo-p3.jpg'));
 * }
 */

// Dispatcher
export { DynImage } from './dyn-image.js';
export type { DynImageVariant } from './dyn-image.js';
export { detectImageFormat, isSupportedFormat } from './format-detection.js';

// Containers
export { Jpeg, ICC_SEGMENT_MAX_SIZE } from './jpeg/jpeg.js';
export { JpegSegment, ICC_DATA_PREFIX } from './jpeg/segment.js';
export type { IccPart } from './jpeg/segment.js';
export * as markers from './jpeg/markers.js';
export { Png, CHUNK_IHDR, CHUNK_IEND, CHUNK_ICCP, CHUNK_EXIF } from './png/png.js';
export { PngChunk } from './png/chunk.js';
export { RiffChunk, riffList, riffData, listOf, dataOf, contentByteLength, MAX_NESTING_DEPTH } from './riff/chunk.js';
export type { RiffContent, RiffList, RiffData } from './riff/chunk.js';
export {
  WebP,
  CHUNK_ALPH,
  CHUNK_ANIM,
  CHUNK_ANMF,
  CHUNK_EXIF as WEBP_CHUNK_EXIF,
  CHUNK_ICCP as WEBP_CHUNK_ICCP,
  CHUNK_VP8,
  CHUNK_VP8L,
  CHUNK_VP8X,
  CHUNK_XMP
} from './webp/webp.js';
export { kindToChunkId, kindFromChunkId, sizeFromVp8Header, sizeFromVp8lHeader } from './webp/vp8.js';
export type { WebPKind, Dimensions } from './webp/vp8.js';
export {
  FLAG_ANIMATION,
  FLAG_XMP,
  FLAG_EXIF,
  FLAG_ALPHA,
  FLAG_ICC,
  encodeVp8x,
  canvasFromVp8x
} from './webp/flags.js';

// Encoding
export { ImageEncoder, encodeChildrenAt, fragment, exhausted } from './encoder.js';
export type { EncodeAt, FragmentResult, FragmentSink } from './encoder.js';

// Errors, options, shared contracts
export { ImagePartsError, isImagePartsError } from './errors.js';
export type { ImagePartsErrorCode } from './errors.js';
export type { ImagePartsOptions, Logger } from './options.js';
export type { ImageFormat, ImageICC, ImageEXIF, ImageContainer } from './types.js';
export { ByteReader } from './byte-reader.js';
export { crc32 } from './utils.js';
