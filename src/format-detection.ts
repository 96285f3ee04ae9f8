import type { ImageFormat } from './types.js';
import { isPngSignature } from './utils.js';

/**
 * Detect the container format from its signature (magic bytes).
 *
 * Checks JPEG, then PNG, then WebP. Only the first 12 bytes are looked at.
 */
export function detectImageFormat(bytes: Uint8Array): ImageFormat {
  // JPEG: FF D8 (Start of Image marker)
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xd8) {
    return 'jpeg';
  }

  // PNG: 89 50 4E 47 0D 0A 1A 0A
  if (isPngSignature(bytes)) {
    return 'png';
  }

  // WebP: "RIFF" [4 bytes size] "WEBP"
  if (
    bytes.length >= 12 &&
    bytes[0] === 0x52 && // 'R'
    bytes[1] === 0x49 && // 'I'
    bytes[2] === 0x46 && // 'F'
    bytes[3] === 0x46 && // 'F'
    bytes[8] === 0x57 && // 'W'
    bytes[9] === 0x45 && // 'E'
    bytes[10] === 0x42 && // 'B'
    bytes[11] === 0x50 // 'P'
  ) {
    return 'webp';
  }

  return 'unknown';
}

export function isSupportedFormat(format: ImageFormat): format is Exclude<ImageFormat, 'unknown'> {
  return format !== 'unknown';
}
