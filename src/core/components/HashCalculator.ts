// ======================================
//  HashCalculator.ts - Incremental CRC-32 calculation
// ======================================

import { ChecksumState, crc32Finalize, crc32Init, crc32Update } from './Crc32';

/**
 * Incremental CRC-32 calculator for data that arrives in chunks.
 *
 * ```typescript
 * const calculator = new HashCalculator();
 * calculator.update(chunk1);
 * calculator.update(chunk2);
 * const crc = calculator.finalizeCRC32();
 * ```
 */
export class HashCalculator {
  private crc32State: ChecksumState = crc32Init();
  private bytesProcessed: number = 0;

  /**
   * Update hash state with a new chunk of data
   * @param chunk - Data chunk to process
   */
  update(chunk: Uint8Array): void {
    this.crc32State = crc32Update(this.crc32State, chunk);
    this.bytesProcessed += chunk.length;
  }

  /**
   * Get final CRC-32 value. Does not reset the state, so calling it twice
   * returns the same value.
   * @returns Final CRC-32 value as unsigned 32-bit integer
   */
  finalizeCRC32(): number {
    return crc32Finalize(this.crc32State);
  }

  /**
   * Number of bytes passed to update() since creation or the last reset()
   */
  get length(): number {
    return this.bytesProcessed;
  }

  reset(): void {
    this.crc32State = crc32Init();
    this.bytesProcessed = 0;
  }
}

export default HashCalculator;
