// ============================================================================
// Output
// ============================================================================

/**
 * Destination of the archive bytes. `write` must either accept the whole
 * buffer or throw; the writer never retries.
 */
export interface ZipSink {
  write(data: Buffer): void;
}

// ============================================================================
// Compression
// ============================================================================

/**
 * Compression level of a single entry. `stored` writes the payload verbatim
 * (method 0), the others deflate it (method 8) at increasing intensity.
 */
export type CompressionLevel = 'stored' | 'fast' | 'default' | 'best';

/**
 * Deflate intensity handed to the compressor
 */
export type DeflateIntensity = 1 | 6 | 9;

/**
 * Raw DEFLATE (no zlib wrapper) of `data` at the given intensity
 */
export type Compressor = (data: Uint8Array, intensity: DeflateIntensity) => Uint8Array;

// ============================================================================
// Writer
// ============================================================================

export type ZipWriterState = 'idle' | 'busy' | 'closed';

export interface ZipWriterOptions {
  clock?: () => number;       // Epoch seconds used to stamp entries (default: wall clock)
  compressor?: Compressor;    // Replaces the built-in pako deflate
  debug?: boolean;            // Logs this writer's records at info level
  startOffset?: number;       // Bytes already in the sink ahead of the archive (default: 0)
}

export interface AddEntryOptions {
  mtime?: Date | number;      // Modification time as a Date or epoch seconds
}

/**
 * Read-only view of an entry already written to the archive
 */
export interface ZipEntryInfo {
  filename: Buffer;
  cmpMethod: number;
  timeDateDOS: number;
  crc: number;
  compressedSize: number;
  uncompressedSize: number;
  localHdrOffset: number;
}
