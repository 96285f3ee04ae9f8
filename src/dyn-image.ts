import type { ImageEncoder } from './encoder.js';
import { detectImageFormat } from './format-detection.js';
import { Jpeg } from './jpeg/jpeg.js';
import type { ImagePartsOptions } from './options.js';
import { Png } from './png/png.js';
import type { ImageContainer, ImageEXIF, ImageICC } from './types.js';
import { WebP } from './webp/webp.js';

export type DynImageVariant =
  | { format: 'jpeg'; image: Jpeg }
  | { format: 'png'; image: Png }
  | { format: 'webp'; image: WebP };

function assertNever(value: never): never {
  throw new Error(`Unexpected image variant: ${JSON.stringify(value)}`);
}

/**
 * An image of whichever supported format its bytes turned out to be.
 *
 * @example
 * const image = DynImage.fromBytes(input);
 * if (image) {
 *   image.setExif(undefined);
 *   const output = image.encoder().bytes();
 * }
 */
export class DynImage implements ImageICC, ImageEXIF {
  readonly variant: DynImageVariant;

  constructor(variant: DynImageVariant) {
    this.variant = variant;
  }

  /**
   * Sniff the signature of `data` and parse it with the matching container.
   *
   * @returns undefined if the signature matches no supported format
   * @throws ImagePartsError when the format is recognized but parsing fails
   */
  static fromBytes(data: Uint8Array, options?: ImagePartsOptions): DynImage | undefined {
    const format = detectImageFormat(data);
    switch (format) {
      case 'jpeg':
        return new DynImage({ format, image: Jpeg.fromBytes(data, options) });
      case 'png':
        return new DynImage({ format, image: Png.fromBytes(data, options) });
      case 'webp':
        return new DynImage({ format, image: WebP.fromBytes(data, options) });
      case 'unknown':
        return undefined;
      default:
        return assertNever(format);
    }
  }

  get format(): DynImageVariant['format'] {
    return this.variant.format;
  }

  get image(): ImageContainer {
    return this.variant.image;
  }

  get byteLength(): number {
    return this.image.byteLength;
  }

  encoder(): ImageEncoder {
    return this.image.encoder();
  }

  iccProfile(): Uint8Array | undefined {
    return this.image.iccProfile();
  }

  setIccProfile(profile: Uint8Array | undefined): void {
    this.image.setIccProfile(profile);
  }

  exif(): Uint8Array | undefined {
    return this.image.exif();
  }

  setExif(exif: Uint8Array | undefined): void {
    this.image.setExif(exif);
  }
}
