// ======================================
//	FileSink.ts - Node.js file output for ZipWriter
// ======================================

import * as fs from 'fs';
import * as path from 'path';
import Errors from '../core/constants/Errors';
import { ZipSink } from '../types';

/**
 * Synchronous file sink. The file is created (or truncated) on construction
 * and stays open until close().
 *
 * @example
 * ```typescript
 * const sink = new FileSink('out/archive.zip');
 * try {
 *   withZipWriter(sink, zip => zip.addEntry('a.txt', data, 'default'));
 * } finally {
 *   sink.close();
 * }
 * ```
 */
export class FileSink implements ZipSink {
  readonly filePath: string;
  private outputFd: number | null;
  private position: number = 0;

  constructor(filePath: string) {
    this.filePath = filePath;

    // Ensure parent directory exists
    const parentDir = path.dirname(filePath);
    if (parentDir && parentDir !== '.' && !fs.existsSync(parentDir)) {
      fs.mkdirSync(parentDir, { recursive: true });
    }

    this.outputFd = fs.openSync(filePath, 'w');
  }

  get isOpen(): boolean {
    return this.outputFd !== null;
  }

  /**
   * Bytes written to the file
   */
  get bytesWritten(): number {
    return this.position;
  }

  write(data: Buffer): void {
    if (this.outputFd === null) {
      throw new Error(Errors.SINK_CLOSED);
    }

    let written = 0;
    while (written < data.length) {
      const bytesWritten = fs.writeSync(this.outputFd, data, written, data.length - written);
      if (bytesWritten <= 0) {
        throw new Error(`Short write to ${this.filePath}: expected ${data.length} bytes, wrote ${written}`);
      }
      written += bytesWritten;
      this.position += bytesWritten;
    }
  }

  /**
   * Closes the file. Safe to call more than once.
   */
  close(): void {
    if (this.outputFd !== null) {
      const fd = this.outputFd;
      this.outputFd = null;
      fs.closeSync(fd);
    }
  }
}

export default FileSink;
