import { readUInt24LE, writeUInt24LE } from '../utils.js';
import type { Dimensions } from './vp8.js';

// Bits of the first byte of a VP8X chunk
export const FLAG_ANIMATION = 0b0000_0010;
export const FLAG_XMP = 0b0000_0100;
export const FLAG_EXIF = 0b0000_1000;
export const FLAG_ALPHA = 0b0001_0000;
export const FLAG_ICC = 0b0010_0000;

// canvas sides are stored minus one in 24 bits
export const MAX_CANVAS_SIDE = 1 << 24;

// flags (1 byte) + reserved (3 bytes) + canvas width - 1 (3 bytes) + canvas height - 1 (3 bytes)
export const VP8X_SIZE = 10;
const CANVAS_OFFSET = 4;

/**
 * Build VP8X chunk data from a flags byte and the canvas size
 *
 * @throws RangeError if a side is outside 1..2^24
 */
export function encodeVp8x(flags: number, canvas: Dimensions): Uint8Array {
  for (const side of [canvas.width, canvas.height]) {
    if (!Number.isInteger(side) || side < 1 || side > MAX_CANVAS_SIDE) {
      throw new RangeError(`VP8X canvas side ${side} is outside 1..${MAX_CANVAS_SIDE}`);
    }
  }
  const data = new Uint8Array(VP8X_SIZE);
  data[0] = flags;
  writeUInt24LE(data, canvas.width - 1, CANVAS_OFFSET);
  writeUInt24LE(data, canvas.height - 1, CANVAS_OFFSET + 3);
  return data;
}

/**
 * Canvas size stored in VP8X chunk data
 */
export function canvasFromVp8x(data: Uint8Array): Dimensions | undefined {
  if (data.length < VP8X_SIZE) {
    return undefined;
  }
  return {
    width: readUInt24LE(data, CANVAS_OFFSET) + 1,
    height: readUInt24LE(data, CANVAS_OFFSET + 3) + 1
  };
}

/**
 * Set or clear `flag` in `flags`
 */
export function withFlag(flags: number, flag: number, enabled: boolean): number {
  return enabled ? flags | flag : flags & ~flag & 0xff;
}
