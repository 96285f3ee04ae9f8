/**
 * Test Fixtures
 *
 * Builds small image files in memory: real JPEG and PNG files through the
 * jpeg-js and pngjs codecs, and hand-assembled WebP containers.
 */

import * as jpegjs from 'jpeg-js';
import { PNG } from 'pngjs';
import { concatBytes, stringToBytes, writeUInt32LE } from '../../src/utils.js';

// RGBA gradient so the encoded data isn't trivially uniform
export function createTestPixels(width: number, height: number): Uint8Array {
  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      data[i] = (x * 16) & 0xff;
      data[i + 1] = (y * 16) & 0xff;
      data[i + 2] = ((x + y) * 8) & 0xff;
      data[i + 3] = 255;
    }
  }
  return data;
}

export function encodeTestJpeg(width = 16, height = 16): Uint8Array {
  const encoded = jpegjs.encode({ data: createTestPixels(width, height), width, height }, 90);
  return new Uint8Array(encoded.data);
}

export function encodeTestPng(width = 8, height = 8): Uint8Array {
  const png = new PNG({ width, height });
  png.data.set(createTestPixels(width, height));
  return new Uint8Array(PNG.sync.write(png));
}

/**
 * Deterministic stand-in for an ICC profile or EXIF blob
 */
export function createTestPayload(length: number, seed = 0): Uint8Array {
  const data = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    data[i] = (i * 7 + seed) & 0xff;
  }
  return data;
}

/**
 * Start of a VP8 keyframe: frame tag, start code, 14-bit width and height,
 * then a few bytes standing in for the compressed frame (15 bytes in all)
 */
export function vp8Bitstream(width: number, height: number): Uint8Array {
  return new Uint8Array([
    0x50, 0x01, 0x00,
    0x9d, 0x01, 0x2a,
    width & 0xff, width >> 8,
    height & 0xff, height >> 8,
    0x11, 0x22, 0x33, 0x44, 0x55
  ]);
}

/**
 * Start of a VP8L bitstream: signature then (width - 1) and (height - 1)
 * packed in 14 bits each (8 bytes in all)
 */
export function vp8lBitstream(width: number, height: number): Uint8Array {
  const bits = ((width - 1) | ((height - 1) << 14)) >>> 0;
  return new Uint8Array([
    0x2f,
    bits & 0xff,
    (bits >>> 8) & 0xff,
    (bits >>> 16) & 0xff,
    (bits >>> 24) & 0xff,
    0x00, 0x00, 0x00
  ]);
}

/**
 * Assemble a RIFF file of `kind` from `[id, data]` pairs, padding odd-sized
 * data with a zero byte
 */
export function buildRiff(kind: string, chunks: Array<[string, Uint8Array]>): Uint8Array {
  const parts: Uint8Array[] = [stringToBytes(kind)];
  for (const [id, data] of chunks) {
    const header = new Uint8Array(8);
    header.set(stringToBytes(id), 0);
    writeUInt32LE(header, data.length, 4);
    parts.push(header, data);
    if (data.length % 2 === 1) {
      parts.push(new Uint8Array([0]));
    }
  }
  const content = concatBytes(parts);

  const header = new Uint8Array(8);
  header.set(stringToBytes('RIFF'), 0);
  writeUInt32LE(header, content.length, 4);
  return concatBytes([header, content]);
}

export function buildWebP(chunks: Array<[string, Uint8Array]>): Uint8Array {
  return buildRiff('WEBP', chunks);
}

/**
 * Logger that records messages instead of printing them
 */
export function createRecordingLogger(): { messages: string[]; logger: (message: string) => void } {
  const messages: string[] = [];
  return { messages, logger: (message: string) => messages.push(message) };
}
