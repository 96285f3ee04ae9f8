import { ByteReader } from '../byte-reader.js';
import { ImageEncoder, encodeChildrenAt, exhausted, fragment, type EncodeAt, type FragmentResult } from '../encoder.js';
import { ImagePartsError } from '../errors.js';
import { fourCCToBytes, writeUInt32LE } from '../utils.js';

// the 4 bytes signature
const SIGNATURE = 'RIFF';

const PADDING = new Uint8Array([0x00]);

// deepest list nesting accepted when parsing
export const MAX_NESTING_DEPTH = 64;

/**
 * A list of nested chunks, optionally tagged with a four-byte kind
 */
export interface RiffList {
  type: 'list';
  kind: string | undefined;
  subchunks: RiffChunk[];
}

/**
 * Opaque chunk payload. Odd-sized data is followed by a padding byte on the
 * wire that isn't part of `data`.
 */
export interface RiffData {
  type: 'data';
  data: Uint8Array;
}

export type RiffContent = RiffList | RiffData;

export function riffList(kind: string | undefined, subchunks: RiffChunk[]): RiffList {
  if (kind !== undefined) {
    fourCCToBytes(kind);
  }
  return { type: 'list', kind, subchunks };
}

export function riffData(data: Uint8Array): RiffData {
  return { type: 'data', data };
}

export function listOf(content: RiffContent): RiffList | undefined {
  return content.type === 'list' ? content : undefined;
}

export function dataOf(content: RiffContent): Uint8Array | undefined {
  return content.type === 'data' ? content.data : undefined;
}

function hasSubchunks(id: string): boolean {
  return id === 'RIFF' || id === 'LIST' || id === 'seqt';
}

function hasKind(id: string): boolean {
  return id === 'RIFF' || id === 'LIST';
}

/**
 * Size of the content once encoded, as written in the chunk's length field.
 *
 * A list counts its kind (4 bytes) and every subchunk including padding;
 * data counts only its own bytes.
 */
export function contentByteLength(content: RiffContent): number {
  switch (content.type) {
    case 'list':
      return content.subchunks.reduce(
        (sum, subchunk) => sum + subchunk.byteLength,
        content.kind !== undefined ? 4 : 0
      );
    case 'data':
      return content.data.length;
  }
}

export function encodeContentAt(content: RiffContent, index: number): FragmentResult {
  switch (content.type) {
    case 'list': {
      let offset = 0;
      if (content.kind !== undefined) {
        if (index === 0) {
          return fragment(fourCCToBytes(content.kind));
        }
        offset = 1;
      }
      const result = encodeChildrenAt(content.subchunks, index - offset);
      return result.done ? exhausted(result.consumed + offset) : result;
    }
    case 'data': {
      // data (skipped when empty), padding when the size is odd
      const parts = content.data.length > 0 ? [content.data] : [];
      if (content.data.length % 2 === 1) {
        parts.push(PADDING);
      }
      return index < parts.length ? fragment(parts[index]) : exhausted(parts.length);
    }
  }
}

function readContent(reader: ByteReader, id: string, depth: number): RiffContent {
  const length = reader.readUInt32LE();
  const content = reader.take(length);

  if (!hasSubchunks(id)) {
    // RIFF chunks with an uneven number of bytes have an extra 0x00 padding byte
    if (length % 2 !== 0) {
      reader.readUInt8();
    }
    return riffData(content);
  }

  if (depth >= MAX_NESTING_DEPTH) {
    throw new ImagePartsError('Truncated', `${id} chunk nested more than ${MAX_NESTING_DEPTH} levels deep`);
  }

  const contentReader = new ByteReader(content);
  const kind = hasKind(id) ? contentReader.readFourCC() : undefined;
  const subchunks: RiffChunk[] = [];
  while (!contentReader.isEmpty()) {
    subchunks.push(RiffChunk.read(contentReader, depth + 1));
  }
  return riffList(kind, subchunks);
}

/**
 * A chunk of a RIFF container (WebP, WAV, AVI, ...).
 *
 * `RIFF`, `LIST` and `seqt` chunks hold nested chunks; everything else holds
 * opaque data.
 */
export class RiffChunk implements EncodeAt {
  readonly id: string;
  content: RiffContent;

  constructor(id: string, content: RiffContent) {
    fourCCToBytes(id);
    this.id = id;
    this.content = content;
  }

  /**
   * Parse a whole RIFF file
   *
   * @throws ImagePartsError 'WrongSignature' if it doesn't start with "RIFF",
   * 'Truncated' if any chunk runs past the end of its parent or lists are
   * nested more than `MAX_NESTING_DEPTH` levels deep
   */
  static fromBytes(data: Uint8Array): RiffChunk {
    const reader = new ByteReader(data);
    const id = reader.readFourCC();
    if (id !== SIGNATURE) {
      throw new ImagePartsError('WrongSignature', `expected RIFF signature, found "${id}"`);
    }
    return new RiffChunk(id, readContent(reader, id, 0));
  }

  /**
   * Read the next chunk (of any id) from `reader`, `depth` lists below the
   * top-level chunk
   */
  static read(reader: ByteReader, depth = 0): RiffChunk {
    const id = reader.readFourCC();
    return new RiffChunk(id, readContent(reader, id, depth));
  }

  /**
   * Size once encoded: id (4 bytes), length field (4 bytes) and content,
   * rounded up to an even number of bytes.
   */
  get byteLength(): number {
    const length = 8 + contentByteLength(this.content);
    return length + (length % 2);
  }

  encodeAt(index: number): FragmentResult {
    if (index === 0) {
      const header = new Uint8Array(8);
      header.set(fourCCToBytes(this.id), 0);
      writeUInt32LE(header, contentByteLength(this.content), 4);
      return fragment(header);
    }
    const result = encodeContentAt(this.content, index - 1);
    return result.done ? exhausted(result.consumed + 1) : result;
  }

  encoder(): ImageEncoder {
    return new ImageEncoder(this);
  }

  /**
   * Encoder for the content alone, without the id and length field
   */
  contentEncoder(): ImageEncoder {
    const content = this.content;
    return new ImageEncoder({
      get byteLength() {
        const length = contentByteLength(content);
        return length + (content.type === 'data' ? length % 2 : 0);
      },
      encodeAt: (index) => encodeContentAt(content, index)
    });
  }
}
