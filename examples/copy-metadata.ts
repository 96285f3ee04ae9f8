/**
 * Copy the ICC profile and EXIF data of one image into another
 *
 * The two images may be of different formats. The target is streamed to the
 * output file without its pixel data ever being decoded.
 *
 * Usage: npx tsx examples/copy-metadata.ts source.jpg target.webp output.webp
 */

import { createWriteStream } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { DynImage } from '../src/index.js';

async function load(path: string): Promise<DynImage> {
  const image = DynImage.fromBytes(await readFile(path));
  if (!image) {
    throw new Error(`${path}: not a JPEG, PNG or WebP file`);
  }
  return image;
}

async function main() {
  const [sourcePath, targetPath, outputPath] = process.argv.slice(2);
  if (!sourcePath || !targetPath || !outputPath) {
    console.error('Usage: copy-metadata <source> <target> <output>');
    process.exit(1);
  }

  const source = await load(sourcePath);
  const target = await load(targetPath);

  target.setIccProfile(source.iccProfile());
  target.setExif(source.exif());

  const written = await target.encoder().pipeTo(createWriteStream(outputPath));
  console.log(`Wrote ${written} bytes to ${outputPath}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
