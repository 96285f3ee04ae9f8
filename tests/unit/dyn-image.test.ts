import { describe, test } from 'node:test';
import assert from 'node:assert';
import { DynImage } from '../../src/dyn-image.js';
import { isImagePartsError } from '../../src/errors.js';
import { detectImageFormat, isSupportedFormat } from '../../src/format-detection.js';
import { Jpeg } from '../../src/jpeg/jpeg.js';
import { WebP } from '../../src/webp/webp.js';
import { PNG_SIGNATURE, stringToBytes } from '../../src/utils.js';
import {
  buildRiff,
  buildWebP,
  createTestPayload,
  encodeTestJpeg,
  encodeTestPng,
  vp8Bitstream
} from '../utils/fixtures.js';

describe('detectImageFormat', () => {
  test('recognizes each supported signature', () => {
    assert.strictEqual(detectImageFormat(new Uint8Array([0xff, 0xd8])), 'jpeg');
    assert.strictEqual(detectImageFormat(PNG_SIGNATURE), 'png');
    assert.strictEqual(detectImageFormat(buildWebP([])), 'webp');
  });

  test('returns unknown for anything else', () => {
    assert.strictEqual(detectImageFormat(new Uint8Array(0)), 'unknown');
    assert.strictEqual(detectImageFormat(new Uint8Array([0xff])), 'unknown');
    assert.strictEqual(detectImageFormat(PNG_SIGNATURE.subarray(0, 7)), 'unknown');
    assert.strictEqual(detectImageFormat(buildRiff('WAVE', [])), 'unknown');
    assert.strictEqual(detectImageFormat(stringToBytes('GIF89a')), 'unknown');
  });

  test('isSupportedFormat excludes unknown', () => {
    assert.strictEqual(isSupportedFormat('webp'), true);
    assert.strictEqual(isSupportedFormat('unknown'), false);
  });
});

describe('DynImage', () => {
  test('fromBytes picks the matching container', () => {
    const jpeg = DynImage.fromBytes(encodeTestJpeg());
    const png = DynImage.fromBytes(encodeTestPng());
    const webp = DynImage.fromBytes(buildWebP([['VP8 ', vp8Bitstream(16, 16)]]));

    assert.strictEqual(jpeg?.format, 'jpeg');
    assert.strictEqual(png?.format, 'png');
    assert.strictEqual(webp?.format, 'webp');
    assert.strictEqual(jpeg?.variant.image instanceof Jpeg, true);
    assert.strictEqual(webp?.variant.image instanceof WebP, true);
  });

  test('fromBytes returns undefined for an unknown signature', () => {
    assert.strictEqual(DynImage.fromBytes(stringToBytes('GIF89a')), undefined);
  });

  test('fromBytes still throws when a recognized file is broken', () => {
    const input = encodeTestPng();
    input[16] ^= 0x01;
    assert.throws(() => DynImage.fromBytes(input), (err: unknown) => isImagePartsError(err, 'BadCRC'));
  });

  test('the variant narrows to the concrete container', () => {
    const image = DynImage.fromBytes(buildWebP([['VP8 ', vp8Bitstream(16, 16)]]));
    assert.ok(image);
    const { variant } = image;
    assert.strictEqual(variant.format, 'webp');
    if (variant.format === 'webp') {
      assert.strictEqual(variant.image.kind(), 'VP8');
    }
  });

  for (const [name, encode] of [
    ['jpeg', encodeTestJpeg],
    ['png', encodeTestPng],
    ['webp', () => buildWebP([['VP8 ', vp8Bitstream(16, 16)]])]
  ] as const) {
    test(`forwards metadata and encoding for ${name}`, () => {
      const input = encode();
      const image = DynImage.fromBytes(input, { logger: () => {} });
      assert.ok(image);
      assert.strictEqual(image.byteLength, input.length);
      assert.deepStrictEqual(image.encoder().bytes(), input);

      const profile = createTestPayload(64);
      const exif = createTestPayload(12, 9);
      image.setIccProfile(profile);
      image.setExif(exif);

      const reparsed = DynImage.fromBytes(image.encoder().bytes());
      assert.strictEqual(reparsed?.format, name);
      assert.deepStrictEqual(reparsed?.iccProfile(), profile);
      assert.deepStrictEqual(reparsed?.exif(), exif);
    });
  }
});
