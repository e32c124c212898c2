// ======================================
//	ZipArchive.ts - Sequential ZIP record writer
// ======================================
//
// LOGGING INSTRUCTIONS:
// ---------------------
// To enable/disable logging, set loggingEnabled to true/false in the class,
// or pass `debug: true` to a single writer.
//

import ZipEntry from './ZipEntry';
import Errors, { formatError } from './constants/Errors';
import { CENTRAL_END, MAX_UINT16, MAX_UINT32 } from './constants/Headers';
import { Logger } from './components/Logger';
import { HashCalculator } from './components/HashCalculator';
import { fromEpochSeconds, toDosTimestamp, toEpochSeconds } from './components/DateTime';
import { ZipCompress } from './ZipCompress';
import { ZipError } from './ZipError';
import { AddEntryOptions, CompressionLevel, ZipSink, ZipWriterState } from '../types';

/**
 * Writes local headers, entry data, the central directory and the end record
 * to a sink, one record at a time, keeping the running byte offset.
 *
 * State machine: `idle -> busy -> idle` for addEntry, `idle -> busy -> closed`
 * for finalize. Calls made while not idle throw `InvalidState` before writing.
 * A failed sink write leaves the archive `busy` for good.
 */
export class ZipArchive {
  private status: ZipWriterState = 'idle';
  private readonly zipEntries: ZipEntry[] = [];
  private offset: number;
  private readonly startOffset: number;

  private readonly debug: boolean;

  // Class-level logging control - set to true to enable logging
  private static loggingEnabled: boolean = false;

  private log(...args: unknown[]): void {
    if (this.debug) {
      // A single writer's trace goes out at info level
      Logger.info(`[ZipArchive]`, ...args);
    } else if (ZipArchive.loggingEnabled) {
      Logger.debug(`[ZipArchive]`, ...args);
    }
  }

  constructor(
    private readonly sink: ZipSink,
    private readonly zipCompress: ZipCompress,
    private readonly clock: () => number,
    debug: boolean = false,
    startOffset: number = 0,
  ) {
    if (!Number.isSafeInteger(startOffset) || startOffset < 0) {
      throw new Error(formatError(Errors.INVALID_START_OFFSET, startOffset));
    }
    this.debug = debug;
    this.startOffset = startOffset;
    this.offset = startOffset;
  }

  get state(): ZipWriterState {
    return this.status;
  }

  /**
   * Entries written so far, in archive order
   */
  get entries(): readonly ZipEntry[] {
    return this.zipEntries.slice();
  }

  /**
   * Archive bytes successfully handed to the sink, not counting `startOffset`
   */
  get bytesWritten(): number {
    return this.offset - this.startOffset;
  }

  /**
   * Compresses `payload` at `level`, then writes its local header and body.
   * @returns the entry recorded for the central directory
   */
  addEntry(name: string | Uint8Array, payload: Uint8Array, level: CompressionLevel, options?: AddEntryOptions): ZipEntry {
    this.enter('addEntry');

    let entry: ZipEntry;
    let body: Buffer;
    try {
      const filename = typeof name === 'string' ? Buffer.from(name, 'utf8') : Buffer.from(name);
      if (filename.length > MAX_UINT16) {
        throw new ZipError('SizeLimitExceeded', formatError(Errors.FILENAME_TOO_LONG, filename.length));
      }

      const data = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength);
      const hashCalculator = new HashCalculator();
      hashCalculator.update(data);

      const compressed = this.zipCompress.compressData(data, level);
      body = compressed.data;

      const label = filename.toString('utf8');
      if (data.length > MAX_UINT32 || body.length > MAX_UINT32) {
        throw new ZipError('SizeLimitExceeded', formatError(Errors.ENTRY_TOO_LARGE, label));
      }

      const mtime = options?.mtime !== undefined ? toEpochSeconds(options.mtime) : this.clock();
      entry = new ZipEntry(
        filename,
        compressed.method,
        toDosTimestamp(fromEpochSeconds(mtime)),
        hashCalculator.finalizeCRC32(),
        body.length,
        data.length,
        this.offset,
      );

      if (this.offset + entry.localRecordSize > MAX_UINT32) {
        throw new ZipError('SizeLimitExceeded', formatError(Errors.ARCHIVE_TOO_LARGE, label));
      }
    } catch (e) {
      // Nothing reached the sink, the archive is still consistent
      this.status = 'idle';
      throw e;
    }

    this.writeRecord(entry.createLocalHdr(), `local header of ${entry.name}`);
    this.writeRecord(body, `data of ${entry.name}`);
    this.zipEntries.push(entry);

    this.log(`Added ${entry.name}: method=${entry.cmpMethod}, ${entry.uncompressedSize} -> ${entry.compressedSize} bytes, ` +
      `CRC32=0x${entry.crc.toString(16).padStart(8, '0')}, offset=${entry.localHdrOffset}`);

    this.status = 'idle';
    return entry;
  }

  /**
   * Writes the central directory and the end of central directory record,
   * then closes the archive.
   */
  finalize(): void {
    this.enter('finalize');

    const centralDirOffset = this.offset;
    const centralDirSize = this.zipEntries.reduce((size, entry) => size + entry.centralRecordSize, 0);

    if (this.zipEntries.length > MAX_UINT16) {
      this.status = 'idle';
      throw new ZipError('SizeLimitExceeded', formatError(Errors.TOO_MANY_ENTRIES, this.zipEntries.length));
    }
    if (centralDirOffset + centralDirSize > MAX_UINT32) {
      this.status = 'idle';
      throw new ZipError('SizeLimitExceeded', formatError(Errors.ARCHIVE_TOO_LARGE, 'the central directory'));
    }

    for (const entry of this.zipEntries) {
      this.writeRecord(entry.centralDirEntry(), `central directory header of ${entry.name}`);
    }
    this.writeRecord(
      ZipArchive.createCentralEnd(this.zipEntries.length, this.offset - centralDirOffset, centralDirOffset),
      'end of central directory',
    );

    this.log(`Finalized: ${this.zipEntries.length} entries, central directory ${centralDirSize} bytes at ${centralDirOffset}, ` +
      `total ${this.bytesWritten} bytes`);

    this.status = 'closed';
  }

  /**
   * Builds the 22-byte end of central directory record for a single-disk archive
   */
  static createCentralEnd(entryCount: number, centralDirSize: number, centralDirOffset: number): Buffer {
    const data = Buffer.alloc(CENTRAL_END.SIZE);

    // "PK\005\006"
    data.writeUInt32LE(CENTRAL_END.SIGNATURE, 0);
    // Disk numbers stay zero
    data.writeUInt16LE(0, CENTRAL_END.VOL_NUM);
    data.writeUInt16LE(0, CENTRAL_END.VOLDIR_START);
    // Entries on this disk, then in total
    data.writeUInt16LE(entryCount, CENTRAL_END.VOL_ENTRIES);
    data.writeUInt16LE(entryCount, CENTRAL_END.TOTAL_ENTRIES);
    data.writeUInt32LE(centralDirSize, CENTRAL_END.CENTRAL_DIR_SIZE);
    data.writeUInt32LE(centralDirOffset, CENTRAL_END.CENTRAL_DIR_OFFSET);
    data.writeUInt16LE(0, CENTRAL_END.ZIP_COMMENT_LEN);

    return data;
  }

  private enter(operation: string): void {
    if (this.status !== 'idle') {
      this.log(`${operation}() rejected in state ${this.status}`);
      throw new ZipError('InvalidState', this.status === 'closed' ? Errors.ARCHIVE_CLOSED : Errors.ARCHIVE_BUSY);
    }
    this.status = 'busy';
  }

  private writeRecord(data: Buffer, what: string): void {
    try {
      this.sink.write(data);
    } catch (e) {
      Logger.error(`[ZipArchive] ${formatError(Errors.WRITE_FAILED, what)}:`, e instanceof Error ? e.message : e);
      throw new ZipError('IoError', formatError(Errors.WRITE_FAILED, what), e);
    }
    this.offset += data.length;
  }
}
