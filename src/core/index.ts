/**
 * Core Module Exports
 * Platform-agnostic ZIP writing
 */

import ZipWriter from './ZipWriter';
export { ZipWriter, withZipWriter } from './ZipWriter';
export { ZipArchive } from './ZipArchive';
export { default as ZipEntry } from './ZipEntry';
export { ZipCompress, DEFLATE_INTENSITY, COMPRESSION_LEVELS, isCompressionLevel, pakoDeflate } from './ZipCompress';
export type { CompressedBody } from './ZipCompress';
export { ZipError, isZipError } from './ZipError';
export type { ZipErrorCode } from './ZipError';
export default ZipWriter;

// Shared components
export { HashCalculator } from './components/HashCalculator';
export { crc32, crc32Init, crc32Update, crc32Finalize, getCrcTable } from './components/Crc32';
export type { ChecksumState } from './components/Crc32';
export {
  fromEpochSeconds,
  toDosTimestamp,
  fromDosTimestamp,
  isLeapYear,
  nowEpochSeconds,
  toEpochSeconds,
} from './components/DateTime';
export type { CalendarDateTime } from './components/DateTime';
export { BufferSink } from './components/BufferSink';

// Types and constants
export * from '../types';
export * from './constants/Headers';
export { default as Errors, formatError } from './constants/Errors';

// Logger utility
export { Logger, configureLoggerFromEnvironment } from './components/Logger';
export type { LogLevel, LoggerConfig } from './components/Logger';
