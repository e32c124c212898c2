/**
 * Node Module Exports
 * File output for the ZIP writer
 *
 * import { createZipFile } from 'zipsink/node';
 */

import { FileSink } from './FileSink';
import { ZipWriter, withZipWriter } from '../core/ZipWriter';
import { ZipWriterOptions } from '../types';

export * from '../core';
export { FileSink } from './FileSink';

/**
 * Writes a ZIP file at `filePath`. `fn` adds the entries; the archive is
 * finalized on every exit path and the file is closed afterwards.
 * A failed archive is left on disk as written so far.
 */
export function createZipFile<T>(filePath: string, fn: (writer: ZipWriter) => T, options?: ZipWriterOptions): T {
  const sink = new FileSink(filePath);
  try {
    return withZipWriter(sink, fn, options);
  } finally {
    sink.close();
  }
}
