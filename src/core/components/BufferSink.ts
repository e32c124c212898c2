// ======================================
//	BufferSink.ts - In-memory output sink
// ======================================

import { ZipSink } from '../../types';

/**
 * Collects everything written to it in memory
 */
export class BufferSink implements ZipSink {
  private chunks: Buffer[] = [];
  private totalSize: number = 0;

  write(data: Buffer): void {
    // Copy: the writer may hand out views of caller-owned payloads
    this.chunks.push(Buffer.from(data));
    this.totalSize += data.length;
  }

  get size(): number {
    return this.totalSize;
  }

  /**
   * All bytes written so far as one buffer
   */
  toBuffer(): Buffer {
    if (this.chunks.length > 1) {
      this.chunks = [Buffer.concat(this.chunks, this.totalSize)];
    }
    return this.chunks.length === 1 ? this.chunks[0] : Buffer.alloc(0);
  }
}

export default BufferSink;
