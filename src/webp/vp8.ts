/**
 * The three WebP bitstream kinds: simple lossy, simple lossless, extended
 */
export type WebPKind = 'VP8' | 'VP8L' | 'VP8X';

export interface Dimensions {
  width: number;
  height: number;
}

const KIND_IDS: Record<WebPKind, string> = {
  VP8: 'VP8 ',
  VP8L: 'VP8L',
  VP8X: 'VP8X'
};

export function kindToChunkId(kind: WebPKind): string {
  return KIND_IDS[kind];
}

export function kindFromChunkId(id: string): WebPKind | undefined {
  switch (id) {
    case 'VP8 ':
      return 'VP8';
    case 'VP8L':
      return 'VP8L';
    case 'VP8X':
      return 'VP8X';
    default:
      return undefined;
  }
}

const VP8_START_CODE = [0x9d, 0x01, 0x2a];
const VP8L_SIGNATURE = 0x2f;

/**
 * Frame size from the first 10 bytes of a VP8 (lossy) bitstream.
 *
 * Returns undefined unless the bitstream starts with a keyframe header of a
 * non-empty frame.
 */
export function sizeFromVp8Header(data: Uint8Array): Dimensions | undefined {
  if (data.length < 10) {
    return undefined;
  }

  // 3-byte frame tag, bit 0 clear on keyframes
  if ((data[0] & 1) !== 0) {
    return undefined;
  }
  if (data[3] !== VP8_START_CODE[0] || data[4] !== VP8_START_CODE[1] || data[5] !== VP8_START_CODE[2]) {
    return undefined;
  }

  // the top 2 bits of each field are the scaling mode
  const width = (data[6] | (data[7] << 8)) & 0x3fff;
  const height = (data[8] | (data[9] << 8)) & 0x3fff;
  if (width === 0 || height === 0) {
    return undefined;
  }
  return { width, height };
}

/**
 * Image size from the first 5 bytes of a VP8L (lossless) bitstream:
 * a signature byte then two 14-bit fields holding width - 1 and height - 1.
 */
export function sizeFromVp8lHeader(data: Uint8Array): Dimensions | undefined {
  if (data.length < 5 || data[0] !== VP8L_SIGNATURE) {
    return undefined;
  }

  const bits = (data[1] | (data[2] << 8) | (data[3] << 16) | (data[4] << 24)) >>> 0;
  return {
    width: (bits & 0x3fff) + 1,
    height: ((bits >>> 14) & 0x3fff) + 1
  };
}
