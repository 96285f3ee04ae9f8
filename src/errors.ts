/**
 * Kinds of failure shared by every container parser and encoder
 */
export type ImagePartsErrorCode =
  /** The file signature or container kind didn't match the expected one */
  | 'WrongSignature'
  /** A PNG chunk CRC didn't match the CRC computed over its type and data */
  | 'BadCRC'
  /** Fewer bytes were left than the field being read needs */
  | 'Truncated'
  /** Writing an encoded image to a sink failed */
  | 'Io';

const DEFAULT_MESSAGES: Record<ImagePartsErrorCode, string> = {
  WrongSignature: "the file signature didn't match the expected signature",
  BadCRC: "the chunk CRC didn't match the expected calculated CRC",
  Truncated: 'a truncated chunk was read',
  Io: 'writing the encoded image failed'
};

export class ImagePartsError extends Error {
  readonly code: ImagePartsErrorCode;

  constructor(code: ImagePartsErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? DEFAULT_MESSAGES[code], options);
    this.name = 'ImagePartsError';
    this.code = code;
  }
}

export function isImagePartsError(value: unknown, code?: ImagePartsErrorCode): value is ImagePartsError {
  return value instanceof ImagePartsError && (code === undefined || value.code === code);
}
