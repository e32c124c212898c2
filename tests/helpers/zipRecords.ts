/**
 * Test helper: parses the records of an archive produced by ZipWriter.
 * Archives carry no comment, so the end record is always the last 22 bytes.
 */

import { CENTRAL_DIR, CENTRAL_END, LOCAL_HDR } from '../../src/core/constants/Headers';

export interface ParsedEnd {
  signature: number;
  diskNumber: number;
  centralDirDisk: number;
  centralDirRecords: number;
  totalRecords: number;
  centralDirSize: number;
  centralDirOffset: number;
  commentLength: number;
}

export interface ParsedCentralEntry {
  signature: number;
  versionMadeBy: number;
  versionNeeded: number;
  flags: number;
  compression: number;
  timeDateDOS: number;
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
  filenameLength: number;
  extraFieldLength: number;
  commentLength: number;
  diskNumber: number;
  internalAttrs: number;
  externalAttrs: number;
  localHeaderOffset: number;
  filename: Buffer;
}

export interface ParsedLocalHeader {
  signature: number;
  version: number;
  flags: number;
  compression: number;
  timeDateDOS: number;
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
  filenameLength: number;
  extraFieldLength: number;
  filename: Buffer;
  data: Buffer;
}

export function readEnd(zip: Buffer): ParsedEnd {
  const at = zip.length - CENTRAL_END.SIZE;
  return {
    signature: zip.readUInt32LE(at),
    diskNumber: zip.readUInt16LE(at + CENTRAL_END.VOL_NUM),
    centralDirDisk: zip.readUInt16LE(at + CENTRAL_END.VOLDIR_START),
    centralDirRecords: zip.readUInt16LE(at + CENTRAL_END.VOL_ENTRIES),
    totalRecords: zip.readUInt16LE(at + CENTRAL_END.TOTAL_ENTRIES),
    centralDirSize: zip.readUInt32LE(at + CENTRAL_END.CENTRAL_DIR_SIZE),
    centralDirOffset: zip.readUInt32LE(at + CENTRAL_END.CENTRAL_DIR_OFFSET),
    commentLength: zip.readUInt16LE(at + CENTRAL_END.ZIP_COMMENT_LEN),
  };
}

export function readCentralDirectory(zip: Buffer): ParsedCentralEntry[] {
  const end = readEnd(zip);
  const entries: ParsedCentralEntry[] = [];
  let at = end.centralDirOffset;
  for (let i = 0; i < end.totalRecords; i++) {
    const filenameLength = zip.readUInt16LE(at + CENTRAL_DIR.FNAME_LEN);
    entries.push({
      signature: zip.readUInt32LE(at),
      versionMadeBy: zip.readUInt16LE(at + CENTRAL_DIR.VER_MADE),
      versionNeeded: zip.readUInt16LE(at + CENTRAL_DIR.VER_EXT),
      flags: zip.readUInt16LE(at + CENTRAL_DIR.FLAGS),
      compression: zip.readUInt16LE(at + CENTRAL_DIR.CMP_METHOD),
      timeDateDOS: zip.readUInt32LE(at + CENTRAL_DIR.TIMEDATE_DOS),
      crc32: zip.readUInt32LE(at + CENTRAL_DIR.CRC),
      compressedSize: zip.readUInt32LE(at + CENTRAL_DIR.CMP_SIZE),
      uncompressedSize: zip.readUInt32LE(at + CENTRAL_DIR.UNCMP_SIZE),
      filenameLength,
      extraFieldLength: zip.readUInt16LE(at + CENTRAL_DIR.EXTRA_LEN),
      commentLength: zip.readUInt16LE(at + CENTRAL_DIR.COMMENT_LEN),
      diskNumber: zip.readUInt16LE(at + CENTRAL_DIR.DISK_NUM),
      internalAttrs: zip.readUInt16LE(at + CENTRAL_DIR.INT_FILE_ATTR),
      externalAttrs: zip.readUInt32LE(at + CENTRAL_DIR.EXT_FILE_ATTR),
      localHeaderOffset: zip.readUInt32LE(at + CENTRAL_DIR.LOCAL_HDR_OFFSET),
      filename: zip.subarray(at + CENTRAL_DIR.SIZE, at + CENTRAL_DIR.SIZE + filenameLength),
    });
    at += CENTRAL_DIR.SIZE + filenameLength;
  }
  return entries;
}

export function readLocalHeader(zip: Buffer, offset: number): ParsedLocalHeader {
  const filenameLength = zip.readUInt16LE(offset + LOCAL_HDR.FNAME_LEN);
  const compressedSize = zip.readUInt32LE(offset + LOCAL_HDR.CMP_SIZE);
  const dataStart = offset + LOCAL_HDR.SIZE + filenameLength;
  return {
    signature: zip.readUInt32LE(offset),
    version: zip.readUInt16LE(offset + LOCAL_HDR.VER_EXTRACT),
    flags: zip.readUInt16LE(offset + LOCAL_HDR.FLAGS),
    compression: zip.readUInt16LE(offset + LOCAL_HDR.COMPRESSION),
    timeDateDOS: zip.readUInt32LE(offset + LOCAL_HDR.TIMEDATE_DOS),
    crc32: zip.readUInt32LE(offset + LOCAL_HDR.CRC),
    compressedSize,
    uncompressedSize: zip.readUInt32LE(offset + LOCAL_HDR.UNCMP_SIZE),
    filenameLength,
    extraFieldLength: zip.readUInt16LE(offset + LOCAL_HDR.EXTRA_LEN),
    filename: zip.subarray(offset + LOCAL_HDR.SIZE, offset + LOCAL_HDR.SIZE + filenameLength),
    data: zip.subarray(dataStart, dataStart + compressedSize),
  };
}

/**
 * Sink that throws once `failAt` writes have succeeded
 */
export class FailingSink {
  readonly written: Buffer[] = [];

  constructor(private readonly failAt: number, private readonly message = 'disk full') {}

  write(data: Buffer): void {
    if (this.written.length >= this.failAt) {
      throw new Error(this.message);
    }
    this.written.push(Buffer.from(data));
  }

  get size(): number {
    return this.written.reduce((n, b) => n + b.length, 0);
  }
}

/**
 * Sink that only counts bytes
 */
export class CountingSink {
  bytes = 0;
  writes = 0;

  write(data: Buffer): void {
    this.bytes += data.length;
    this.writes++;
  }
}
