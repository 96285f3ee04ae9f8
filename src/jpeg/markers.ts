// Byte stuffing
export const Z = 0x00;
// First marker byte
export const P = 0xff;

// Start of Frame
export const SOF0 = 0xc0;
export const SOF1 = 0xc1;
export const SOF2 = 0xc2;
export const SOF3 = 0xc3;
export const DHT = 0xc4; // Define Huffman Table
export const SOF5 = 0xc5;
export const SOF6 = 0xc6;
export const SOF7 = 0xc7;
export const JPG = 0xc8; // JPEG Extensions
export const SOF9 = 0xc9;
export const SOF10 = 0xca;
export const SOF11 = 0xcb;
export const DAC = 0xcc; // Define Arithmetic Coding
export const SOF13 = 0xcd;
export const SOF14 = 0xce;
export const SOF15 = 0xcf;

// Restart Markers
export const RST0 = 0xd0;
export const RST1 = 0xd1;
export const RST2 = 0xd2;
export const RST3 = 0xd3;
export const RST4 = 0xd4;
export const RST5 = 0xd5;
export const RST6 = 0xd6;
export const RST7 = 0xd7;

// {Start,End} of Image
export const SOI = 0xd8;
export const EOI = 0xd9;

export const SOS = 0xda; // Start of Scan
export const DQT = 0xdb; // Define Quantization Table
export const DNL = 0xdc; // Define Number of Lines
export const DRI = 0xdd; // Define Restart Interval
export const DHP = 0xde; // Define Hierarchical Progression
export const EXP = 0xdf; // Expand Reference Component

// Application Segments
export const APP0 = 0xe0;
export const APP1 = 0xe1;
export const APP2 = 0xe2;
export const APP3 = 0xe3;
export const APP4 = 0xe4;
export const APP5 = 0xe5;
export const APP6 = 0xe6;
export const APP7 = 0xe7;
export const APP8 = 0xe8;
export const APP9 = 0xe9;
export const APP10 = 0xea;
export const APP11 = 0xeb;
export const APP12 = 0xec;
export const APP13 = 0xed;
export const APP14 = 0xee;
export const APP15 = 0xef;

// JPEG Extensions
export const JPG0 = 0xf0;
export const JPG13 = 0xfd;

export const COM = 0xfe; // Comment

/**
 * Whether a segment with this marker is followed by a 2-byte length field.
 *
 * Only SOI, EOI, the restart markers and TEM (0x01) stand alone.
 */
export function hasLength(marker: number): boolean {
  return (
    (marker >= SOF0 && marker <= SOF15) ||
    (marker >= SOS && marker <= EXP) ||
    (marker >= APP0 && marker <= APP15) ||
    (marker >= JPG0 && marker <= JPG13) ||
    marker === COM
  );
}

/**
 * Whether entropy-coded data follows the segment
 */
export function hasEntropy(marker: number): boolean {
  return marker === SOS;
}
