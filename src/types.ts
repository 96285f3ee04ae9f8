import type { EncodeAt, ImageEncoder } from './encoder.js';

/**
 * Container formats the dispatcher recognizes
 */
export type ImageFormat = 'jpeg' | 'png' | 'webp' | 'unknown';

/**
 * Read and replace the raw ICC profile of an image
 */
export interface ImageICC {
  /** The raw ICC profile, or undefined if the image has none */
  iccProfile(): Uint8Array | undefined;

  /**
   * Remove any embedded ICC profile, then embed `profile` if it is given
   */
  setIccProfile(profile: Uint8Array | undefined): void;
}

/**
 * Read and replace the raw EXIF metadata of an image
 */
export interface ImageEXIF {
  /** The raw EXIF metadata, or undefined if the image has none */
  exif(): Uint8Array | undefined;

  /**
   * Remove any embedded EXIF metadata, then embed `exif` if it is given
   */
  setExif(exif: Uint8Array | undefined): void;
}

/**
 * Operations every parsed container offers regardless of its format
 */
export interface ImageContainer extends ImageICC, ImageEXIF, EncodeAt {
  encoder(): ImageEncoder;
}
