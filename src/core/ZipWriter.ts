// ======================================
//	ZipWriter.ts - Streaming ZIP writer
// ======================================

import ZipEntry from './ZipEntry';
import Errors from './constants/Errors';
import { Logger } from './components/Logger';
import { nowEpochSeconds } from './components/DateTime';
import { ZipArchive } from './ZipArchive';
import { ZipCompress } from './ZipCompress';
import { isZipError } from './ZipError';
import { AddEntryOptions, CompressionLevel, ZipSink, ZipWriterOptions, ZipWriterState } from '../types';

/**
 * Finalizes an archive whose writer was garbage collected, or was still
 * open at exit, while idle.
 * There is no caller left to report a failure to, so a failed finalize
 * aborts the process instead of leaving a truncated archive behind.
 */
export function finalizeDiscarded(archive: ZipArchive): void {
  if (archive.state !== 'idle') return;

  try {
    archive.finalize();
    Logger.warn(`[ZipWriter] Archive with ${archive.entries.length} entries was finalized on discard; call finalize() explicitly`);
  } catch (e) {
    Logger.error(`[ZipWriter] ${Errors.DISCARD_FINALIZE_FAILED}:`, e instanceof Error ? e.message : e);
    process.abort();
  }
}

// Archives whose writers may still be dropped without finalize()
const pendingArchives = new Set<ZipArchive>();

const discardRegistry = new FinalizationRegistry<ZipArchive>(archive => {
  pendingArchives.delete(archive);
  finalizeDiscarded(archive);
});

/**
 * Finalizes every archive whose writer is still idle. Installed as a
 * `process.once('exit')` handler: finalization callbacks do not run at exit,
 * and sink writes are synchronous, so they still complete there.
 */
export function finalizePendingOnExit(): void {
  for (const archive of Array.from(pendingArchives)) {
    pendingArchives.delete(archive);
    finalizeDiscarded(archive);
  }
}

process.once('exit', finalizePendingOnExit);

/**
 * Writes a ZIP archive entry by entry to a synchronous sink.
 *
 * Prefer {@link withZipWriter}, which finalizes on every exit path. A writer
 * that is dropped without finalize() is finalized when it is garbage
 * collected or when the process exits, but errors on that path cannot be
 * reported.
 *
 * @example
 * ```typescript
 * const sink = new BufferSink();
 * const zip = new ZipWriter(sink);
 * zip.addEntry('hello.txt', Buffer.from('Hello'), 'default')
 *    .addEntry('raw.bin', data, 'stored');
 * zip.finalize();
 * const archive = sink.toBuffer();
 * ```
 */
export class ZipWriter {
  private readonly archive: ZipArchive;

  constructor(sink: ZipSink, options: ZipWriterOptions = {}) {
    this.archive = new ZipArchive(
      sink,
      new ZipCompress(options.compressor),
      options.clock ?? nowEpochSeconds,
      options.debug ?? false,
      options.startOffset ?? 0,
    );
    // The registry holds the archive, never the writer, so the writer stays collectable
    discardRegistry.register(this, this.archive, this);
    pendingArchives.add(this.archive);
  }

  get state(): ZipWriterState {
    return this.archive.state;
  }

  get entries(): readonly ZipEntry[] {
    return this.archive.entries;
  }

  get entryCount(): number {
    return this.archive.entries.length;
  }

  get bytesWritten(): number {
    return this.archive.bytesWritten;
  }

  /**
   * Adds one entry. The checksum covers the uncompressed payload.
   * @throws ZipError `InvalidState`, `SizeLimitExceeded` or `IoError`
   */
  addEntry(name: string | Uint8Array, payload: Uint8Array, level: CompressionLevel = 'default', options?: AddEntryOptions): this {
    try {
      this.archive.addEntry(name, payload, level, options);
    } catch (e) {
      // A failed write leaves the archive busy, nothing can finalize it any more
      if (isZipError(e, 'IoError')) {
        this.release();
      }
      throw e;
    }
    return this;
  }

  /**
   * Writes the central directory and end record. Can succeed only once.
   * @throws ZipError `InvalidState`, `SizeLimitExceeded` or `IoError`
   */
  finalize(): void {
    try {
      this.archive.finalize();
    } catch (e) {
      // A rejected call leaves the writer as it was; any other outcome is reported here
      if (!isZipError(e, 'InvalidState')) {
        this.release();
      }
      throw e;
    }
    this.release();
  }

  private release(): void {
    discardRegistry.unregister(this);
    pendingArchives.delete(this.archive);
  }
}

/**
 * Runs `fn` with a new writer and finalizes the archive on every exit path
 * where the writer is still idle. An error thrown by `fn` takes precedence
 * over an error from that final finalize. `fn` must be synchronous.
 */
export function withZipWriter<T>(sink: ZipSink, fn: (writer: ZipWriter) => T, options?: ZipWriterOptions): T {
  const writer = new ZipWriter(sink, options);
  let result: T;
  try {
    result = fn(writer);
  } catch (e) {
    if (writer.state === 'idle') {
      try {
        writer.finalize();
      } catch (finalizeError) {
        Logger.warn('[ZipWriter] finalize() after failed callback also failed:',
          finalizeError instanceof Error ? finalizeError.message : finalizeError);
      }
    }
    throw e;
  }
  if (writer.state === 'idle') {
    writer.finalize();
  }
  return result;
}

export default ZipWriter;
