import { Readable, type Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { ImagePartsError } from './errors.js';

/**
 * Outcome of asking a node for one of its fragments.
 *
 * When `index` is past the node's last fragment the result is `done` and
 * `consumed` holds how many fragments the node owns, so the caller can rebase
 * the index before asking the next sibling.
 */
export type FragmentResult =
  | { done: false; value: Uint8Array }
  | { done: true; consumed: number };

/**
 * Anything that can produce its binary representation one fragment at a time
 */
export interface EncodeAt {
  /** Produce fragment number `index` (0-based) */
  encodeAt(index: number): FragmentResult;
  /** Number of bytes all fragments add up to */
  readonly byteLength: number;
}

export function fragment(value: Uint8Array): FragmentResult {
  return { done: false, value };
}

export function exhausted(consumed: number): FragmentResult {
  return { done: true, consumed };
}

/**
 * Walk `children` in order with a single index, subtracting the fragments of
 * each exhausted child before asking the next one.
 */
export function encodeChildrenAt(children: readonly EncodeAt[], index: number): FragmentResult {
  let consumed = 0;
  for (const child of children) {
    const result = child.encodeAt(index - consumed);
    if (!result.done) {
      return result;
    }
    consumed += result.consumed;
  }
  return exhausted(consumed);
}

/**
 * Anything encoded fragments can be handed to
 */
export interface FragmentSink {
  write(fragment: Uint8Array): unknown;
}

/**
 * Lazy sequence over the fragments of an encodable image or image part.
 *
 * Image data is held in many separate buffers (framing headers, chunk
 * payloads, entropy data). Iterating yields them one by one without copying;
 * `bytes()` is there for callers that need one contiguous buffer.
 *
 * @example
 * import { createWriteStream } from 'node:fs';
 *
 * const png = Png.fromBytes(input);
 * png.setIccProfile(profile);
 * await png.encoder().pipeTo(createWriteStream('output.png'));
 */
export class ImageEncoder implements Iterable<Uint8Array> {
  private readonly inner: EncodeAt;

  constructor(inner: EncodeAt) {
    this.inner = inner;
  }

  get byteLength(): number {
    return this.inner.byteLength;
  }

  *[Symbol.iterator](): Iterator<Uint8Array> {
    for (let index = 0; ; index++) {
      const result = this.inner.encodeAt(index);
      if (result.done) {
        return;
      }
      yield result.value;
    }
  }

  /**
   * Copy every fragment into a single newly allocated buffer.
   *
   * Prefer `writeTo`/`pipeTo` when the output goes to a file or socket.
   */
  bytes(): Uint8Array {
    const result = new Uint8Array(this.inner.byteLength);
    let offset = 0;
    for (const piece of this) {
      result.set(piece, offset);
      offset += piece.length;
    }
    return result;
  }

  /**
   * Write every fragment to `sink` in order.
   *
   * @returns Number of bytes written
   * @throws ImagePartsError with code 'Io' if the sink throws
   */
  writeTo(sink: FragmentSink): number {
    let written = 0;
    for (const piece of this) {
      try {
        sink.write(piece);
      } catch (err) {
        throw new ImagePartsError('Io', `failed writing fragment at byte ${written}`, { cause: err });
      }
      written += piece.length;
    }
    return written;
  }

  /**
   * Node.js Readable stream over the fragments, produced on demand
   */
  toReadable(): Readable {
    return Readable.from(this, { objectMode: false });
  }

  /**
   * Stream the fragments into a Node.js Writable and wait for it to finish.
   *
   * @returns Number of bytes written
   * @throws ImagePartsError with code 'Io' if the destination fails
   */
  async pipeTo(destination: Writable): Promise<number> {
    try {
      await pipeline(this.toReadable(), destination);
    } catch (err) {
      throw new ImagePartsError('Io', 'failed streaming encoded image', { cause: err });
    }
    return this.inner.byteLength;
  }
}
