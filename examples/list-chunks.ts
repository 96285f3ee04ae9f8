/**
 * Print the segments or chunks an image is made of
 *
 * Usage: npx tsx examples/list-chunks.ts photo.jpg
 */

import { readFile } from 'node:fs/promises';
import { DynImage, dataOf, type RiffChunk } from '../src/index.js';

function describeRiff(chunk: RiffChunk, depth: number): void {
  const data = dataOf(chunk.content);
  const size = data ? `${data.length} bytes` : 'list';
  console.log(`${'  '.repeat(depth)}${chunk.id} (${size})`);
  if (chunk.content.type === 'list') {
    for (const subchunk of chunk.content.subchunks) {
      describeRiff(subchunk, depth + 1);
    }
  }
}

async function main() {
  const path = process.argv[2];
  if (!path) {
    console.error('Usage: list-chunks <image>');
    process.exit(1);
  }

  const image = DynImage.fromBytes(await readFile(path));
  if (!image) {
    console.error(`${path}: not a JPEG, PNG or WebP file`);
    process.exit(1);
  }

  const { variant } = image;
  console.log(`${path}: ${variant.format}, ${image.byteLength} bytes`);
  switch (variant.format) {
    case 'jpeg':
      for (const segment of variant.image.segments) {
        const entropy = segment.hasEntropy() ? ` + ${segment.entropy.length} bytes of scan data` : '';
        console.log(`  0xFF${segment.marker.toString(16).toUpperCase()} (${segment.contents.length} bytes${entropy})`);
      }
      break;
    case 'png':
      for (const chunk of variant.image.chunks) {
        console.log(`  ${chunk.type} (${chunk.data.length} bytes, crc ${chunk.crc.toString(16).padStart(8, '0')})`);
      }
      break;
    case 'webp':
      console.log(`  kind ${variant.image.kind()}`);
      describeRiff(variant.image.riff, 1);
      break;
  }

  console.log(`  ICC profile: ${image.iccProfile()?.length ?? 'none'}`);
  console.log(`  EXIF: ${image.exif()?.length ?? 'none'}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
