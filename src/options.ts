/**
 * Receives warnings about input the library tolerated instead of rejecting
 */
export type Logger = (message: string) => void;

export interface ImagePartsOptions {
  /**
   * Where tolerated oddities are reported (skipped bytes, unreadable ICC data).
   * Default: console.warn
   */
  logger?: Logger;

  /**
   * Deflate level (0-9) used when a PNG iCCP chunk is written.
   * Default: 9
   */
  iccCompressionLevel?: 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;
}

export type ResolvedOptions = Required<ImagePartsOptions>;

export function resolveOptions(options: ImagePartsOptions = {}): ResolvedOptions {
  return {
    logger: options.logger ?? console.warn,
    iccCompressionLevel: options.iccCompressionLevel ?? 9
  };
}
