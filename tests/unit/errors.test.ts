import { test } from 'node:test';
import assert from 'node:assert';
import { ImagePartsError, isImagePartsError } from '../../src/errors.js';

test('ImagePartsError carries its code and a default message', () => {
  const err = new ImagePartsError('BadCRC');
  assert.strictEqual(err.name, 'ImagePartsError');
  assert.strictEqual(err.code, 'BadCRC');
  assert.strictEqual(err.message, "the chunk CRC didn't match the expected calculated CRC");
  assert.ok(err instanceof Error);
});

test('ImagePartsError keeps an explicit message and cause', () => {
  const cause = new Error('EPIPE');
  const err = new ImagePartsError('Io', 'socket closed', { cause });
  assert.strictEqual(err.message, 'socket closed');
  assert.strictEqual(err.cause, cause);
});

test('isImagePartsError checks the class and optionally the code', () => {
  const err = new ImagePartsError('Truncated');
  assert.strictEqual(isImagePartsError(err), true);
  assert.strictEqual(isImagePartsError(err, 'Truncated'), true);
  assert.strictEqual(isImagePartsError(err, 'Io'), false);
  assert.strictEqual(isImagePartsError(new Error('Truncated')), false);
  assert.strictEqual(isImagePartsError(undefined), false);
});
