// ======================================
//	ZipCompress.ts - Compression Module
// ======================================
//
// LOGGING INSTRUCTIONS:
// ---------------------
// To enable/disable logging, set loggingEnabled to true/false in the class:
//   private static loggingEnabled: boolean = true;  // Enable logging
//   private static loggingEnabled: boolean = false; // Disable logging
//
// Logging respects the global Logger level (debug, info, warn, error, silent).
//

import * as pako from 'pako';
import { Logger } from './components/Logger';
import Errors from './constants/Errors';
import { CMP_METHOD, CompressionMethod } from './constants/Headers';
import { CompressionLevel, Compressor, DeflateIntensity } from '../types';

// Deflate intensity per level; `stored` never reaches the compressor
export const DEFLATE_INTENSITY: Record<Exclude<CompressionLevel, 'stored'>, DeflateIntensity> = {
  fast: 1,
  default: 6,
  best: 9,
};

export const COMPRESSION_LEVELS: readonly CompressionLevel[] = ['stored', 'fast', 'default', 'best'];

export function isCompressionLevel(value: unknown): value is CompressionLevel {
  return typeof value === 'string' && (COMPRESSION_LEVELS as readonly string[]).includes(value);
}

/**
 * Raw deflate through pako
 */
export const pakoDeflate: Compressor = (data, intensity) => pako.deflateRaw(data, { level: intensity });

/**
 * Result of preparing an entry body
 */
export interface CompressedBody {
  method: CompressionMethod;
  data: Buffer;
}

/**
 * Dispatches a compression level to either pass-through (method 0) or the
 * deflate compressor (method 8)
 */
export class ZipCompress {
  private readonly compressor: Compressor;

  // Class-level logging control - set to true to enable logging
  private static loggingEnabled: boolean = false;

  /**
   * Internal logging method - only logs if class logging is enabled
   */
  private log(...args: unknown[]): void {
    if (ZipCompress.loggingEnabled) {
      Logger.debug(`[ZipCompress]`, ...args);
    }
  }

  /**
   * @param compressor - Raw deflate implementation (default: pako)
   */
  constructor(compressor: Compressor = pakoDeflate) {
    this.compressor = compressor;
  }

  /**
   * Compression method written to the headers for a level
   */
  static methodFor(level: CompressionLevel): CompressionMethod {
    return level === 'stored' ? CMP_METHOD.STORED : CMP_METHOD.DEFLATED;
  }

  /**
   * Produces the entry body for `data` at `level`. Stored bodies are the
   * input itself. Deflated bodies may be larger than the input.
   */
  compressData(data: Buffer, level: CompressionLevel): CompressedBody {
    if (level === 'stored') {
      this.log(`Using STORED method (no compression), ${data.length} bytes`);
      return { method: CMP_METHOD.STORED, data };
    }

    const intensity = DEFLATE_INTENSITY[level];
    let result: Uint8Array;
    try {
      result = this.compressor(data, intensity);
    } catch (e) {
      throw new Error(`${Errors.COMPRESS_FAILED}: ${e instanceof Error ? e.message : String(e)}`);
    }

    const ratio = data.length > 0 ? Math.round((result.length / data.length) * 100) : 0;
    this.log(`Deflate compression complete: ${result.length} bytes from ${data.length} bytes (level=${intensity}, ratio=${ratio}%)`);

    return {
      method: CMP_METHOD.DEFLATED,
      data: Buffer.from(result.buffer, result.byteOffset, result.byteLength),
    };
  }
}
