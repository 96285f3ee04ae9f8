import { describe, test } from 'node:test';
import assert from 'node:assert';
import { ByteReader } from '../../src/byte-reader.js';
import { isImagePartsError } from '../../src/errors.js';
import { MAX_NESTING_DEPTH, RiffChunk, contentByteLength, dataOf, listOf, riffData, riffList } from '../../src/riff/chunk.js';
import { concatBytes, stringToBytes, writeUInt32LE } from '../../src/utils.js';
import { buildRiff } from '../utils/fixtures.js';

function wave(): Uint8Array {
  return buildRiff('WAVE', [
    ['fmt ', new Uint8Array([1, 2, 3])],
    ['data', new Uint8Array([4, 5])]
  ]);
}

/**
 * Content of a LIST chunk holding `levels` LIST chunks in all, each one the
 * only subchunk of its parent and the innermost one empty
 */
function nestedLists(levels: number): Uint8Array {
  const kind = stringToBytes('abcd');
  const data = new Uint8Array(4 + 12 * (levels - 1));
  data.set(kind, 0);
  let offset = 4;
  for (let level = levels - 1; level >= 1; level--) {
    data.set(stringToBytes('LIST'), offset);
    // kind, then the 12 bytes of every list below
    writeUInt32LE(data, 12 * level - 8, offset + 4);
    data.set(kind, offset + 8);
    offset += 12;
  }
  return data;
}

function listDepth(chunk: RiffChunk): number {
  let depth = 0;
  let list = listOf(chunk.content);
  while (list && list.subchunks.length > 0) {
    depth++;
    list = listOf(list.subchunks[0].content);
  }
  return depth;
}

describe('RiffChunk.fromBytes', () => {
  test('parses data chunks and skips their padding', () => {
    const riff = RiffChunk.fromBytes(wave());
    const list = listOf(riff.content);

    assert.strictEqual(list?.kind, 'WAVE');
    assert.deepStrictEqual(list?.subchunks.map((chunk) => chunk.id), ['fmt ', 'data']);
    assert.deepStrictEqual(list?.subchunks.map((chunk) => dataOf(chunk.content)), [
      new Uint8Array([1, 2, 3]),
      new Uint8Array([4, 5])
    ]);
  });

  test('round-trips with the padding byte restored', () => {
    const input = wave();
    const riff = RiffChunk.fromBytes(input);

    // RIFF header (8) + kind (4) + fmt (8 + 3 + 1 padding) + data (8 + 2)
    assert.strictEqual(riff.byteLength, 34);
    assert.strictEqual(input.length, 34);
    assert.deepStrictEqual(riff.encoder().bytes(), input);
  });

  test('parses nested LIST chunks', () => {
    const hdrl = concatBytes([
      stringToBytes('hdrl'),
      stringToBytes('avih'), new Uint8Array([1, 0, 0, 0, 7, 0])
    ]);
    const input = buildRiff('AVI ', [['LIST', hdrl]]);
    const riff = RiffChunk.fromBytes(input);

    const list = listOf(riff.content);
    const nested = list ? listOf(list.subchunks[0].content) : undefined;
    assert.strictEqual(nested?.kind, 'hdrl');
    assert.strictEqual(nested?.subchunks[0].id, 'avih');
    assert.deepStrictEqual(nested ? dataOf(nested.subchunks[0].content) : undefined, new Uint8Array([7]));
    assert.deepStrictEqual(riff.encoder().bytes(), input);
  });

  test('rejects another signature', () => {
    const input = wave();
    input.set(stringToBytes('RIFX'), 0);
    assert.throws(
      () => RiffChunk.fromBytes(input),
      (err: unknown) => isImagePartsError(err, 'WrongSignature') && err.message === 'expected RIFF signature, found "RIFX"'
    );
  });

  test('parses lists nested up to the depth limit', () => {
    const input = buildRiff('WEBP', [['LIST', nestedLists(MAX_NESTING_DEPTH - 1)]]);
    const riff = RiffChunk.fromBytes(input);

    assert.strictEqual(listDepth(riff), MAX_NESTING_DEPTH - 1);
    assert.deepStrictEqual(riff.encoder().bytes(), input);
  });

  test('rejects lists nested deeper than the limit', () => {
    assert.throws(
      () => RiffChunk.fromBytes(buildRiff('WEBP', [['LIST', nestedLists(MAX_NESTING_DEPTH)]])),
      (err: unknown) => isImagePartsError(err, 'Truncated') && err.message === 'LIST chunk nested more than 64 levels deep'
    );
  });

  test('rejects thousands of nested lists without exhausting the stack', () => {
    assert.throws(
      () => RiffChunk.fromBytes(buildRiff('WEBP', [['LIST', nestedLists(20000)]])),
      (err: unknown) => isImagePartsError(err, 'Truncated')
    );
  });

  test('rejects a chunk running past its parent', () => {
    const input = wave();
    assert.throws(
      () => RiffChunk.fromBytes(input.subarray(0, input.length - 1)),
      (err: unknown) => isImagePartsError(err, 'Truncated')
    );
  });
});

describe('RiffChunk', () => {
  test('seqt chunks hold subchunks without a kind', () => {
    const seqt = new RiffChunk('seqt', riffList(undefined, [new RiffChunk('abcd', riffData(new Uint8Array([1, 2])))]));
    const bytes = seqt.encoder().bytes();

    assert.deepStrictEqual(
      Array.from(bytes),
      [0x73, 0x65, 0x71, 0x74, 10, 0, 0, 0, 0x61, 0x62, 0x63, 0x64, 2, 0, 0, 0, 1, 2]
    );

    const reread = RiffChunk.read(new ByteReader(bytes));
    const list = listOf(reread.content);
    assert.strictEqual(list?.kind, undefined);
    assert.strictEqual(list?.subchunks.length, 1);
  });

  test('odd-sized data encodes as header, data and padding', () => {
    const chunk = new RiffChunk('ICCP', riffData(new Uint8Array([9, 9, 9])));
    const fragments = Array.from(chunk.encoder(), (piece) => Array.from(piece));

    assert.deepStrictEqual(fragments, [[0x49, 0x43, 0x43, 0x50, 3, 0, 0, 0], [9, 9, 9], [0]]);
    assert.strictEqual(chunk.byteLength, 12);
    assert.strictEqual(contentByteLength(chunk.content), 3);
  });

  test('contentEncoder writes the content alone', () => {
    const chunk = new RiffChunk('ICCP', riffData(new Uint8Array([9, 9, 9])));
    const encoder = chunk.contentEncoder();

    assert.strictEqual(encoder.byteLength, 4);
    assert.deepStrictEqual(Array.from(encoder.bytes()), [9, 9, 9, 0]);
  });

  test('empty data encodes as the header alone', () => {
    const chunk = new RiffChunk('XMP ', riffData(new Uint8Array(0)));
    assert.deepStrictEqual(Array.from(chunk.encoder(), (piece) => piece.length), [8]);
  });

  test('listOf and dataOf narrow the content', () => {
    const data = riffData(new Uint8Array([1]));
    const list = riffList('WEBP', []);

    assert.strictEqual(listOf(data), undefined);
    assert.strictEqual(dataOf(list), undefined);
    assert.strictEqual(listOf(list), list);
    assert.deepStrictEqual(dataOf(data), new Uint8Array([1]));
  });

  test('ids must be four bytes', () => {
    assert.throws(() => new RiffChunk('VP8', riffData(new Uint8Array(0))), RangeError);
    assert.throws(() => riffList('WEB', []), RangeError);
  });
});
