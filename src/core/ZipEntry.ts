// ======================================
//	ZipEntry.ts
// ======================================
// Zip Directory Item class

import {
  LOCAL_HDR,
  CENTRAL_DIR,
  CMP_METHOD,
  CompressionMethod,
  GP_FLAG,
  ZIP_VERSION,
} from './constants/Headers';
import { ZipEntryInfo } from '../types';
import { CalendarDateTime, fromDosTimestamp } from './components/DateTime';

/**
 * One entry already accepted by the writer. Instances are immutable: all
 * header fields are fixed when the payload is written.
 */
export default class ZipEntry implements ZipEntryInfo {
  readonly bitFlags: number = GP_FLAG.EFS;  // General purpose bit flag

  constructor(
    readonly filename: Buffer,              // File name bytes (UTF-8 for string names)
    readonly cmpMethod: CompressionMethod,  // Compression method
    readonly timeDateDOS: number,           // DOS File Time(2 bytes) & Date(2 bytes)
    readonly crc: number,                   // CRC-32 of the uncompressed data
    readonly compressedSize: number,        // Compressed size
    readonly uncompressedSize: number,      // Uncompressed size
    readonly localHdrOffset: number,        // Offset of the local header from the archive start
  ) {}

  get isDeflated(): boolean {
    return this.cmpMethod === CMP_METHOD.DEFLATED;
  }

  /**
   * File name decoded as UTF-8
   */
  get name(): string {
    return this.filename.toString('utf8');
  }

  /**
   * Size of the local header plus the entry data
   */
  get localRecordSize(): number {
    return LOCAL_HDR.SIZE + this.filename.length + this.compressedSize;
  }

  get centralRecordSize(): number {
    return CENTRAL_DIR.SIZE + this.filename.length;
  }

  /**
   * Creates a local header for this ZIP entry
   * @returns Buffer containing the local header data
   */
  createLocalHdr(): Buffer {
    const data = Buffer.alloc(LOCAL_HDR.SIZE + this.filename.length);

    // "PK\003\004"
    data.writeUInt32LE(LOCAL_HDR.SIGNATURE, 0);
    // version needed to extract
    data.writeUInt16LE(ZIP_VERSION, LOCAL_HDR.VER_EXTRACT);
    // general purpose bit flag
    data.writeUInt16LE(this.bitFlags, LOCAL_HDR.FLAGS);
    // compression method
    data.writeUInt16LE(this.cmpMethod, LOCAL_HDR.COMPRESSION);
    // modification time (2 bytes time, 2 bytes date)
    data.writeUInt32LE(this.timeDateDOS >>> 0, LOCAL_HDR.TIMEDATE_DOS);
    // uncompressed file crc-32 value
    data.writeUInt32LE(this.crc >>> 0, LOCAL_HDR.CRC);
    // compressed size
    data.writeUInt32LE(this.compressedSize, LOCAL_HDR.CMP_SIZE);
    // uncompressed size
    data.writeUInt32LE(this.uncompressedSize, LOCAL_HDR.UNCMP_SIZE);
    // filename length
    data.writeUInt16LE(this.filename.length, LOCAL_HDR.FNAME_LEN);
    // extra field length
    data.writeUInt16LE(0, LOCAL_HDR.EXTRA_LEN);

    this.filename.copy(data, LOCAL_HDR.SIZE);

    return data;
  }

  /**
   * Creates a central directory entry for this ZIP entry
   * @returns Buffer containing the central directory entry data
   */
  centralDirEntry(): Buffer {
    const data = Buffer.alloc(CENTRAL_DIR.SIZE + this.filename.length);

    // "PK\001\002"
    data.writeUInt32LE(CENTRAL_DIR.SIGNATURE, 0);
    // Version made by
    data.writeUInt16LE(ZIP_VERSION, CENTRAL_DIR.VER_MADE);
    // Version needed to extract
    data.writeUInt16LE(ZIP_VERSION, CENTRAL_DIR.VER_EXT);
    data.writeUInt16LE(this.bitFlags, CENTRAL_DIR.FLAGS);
    data.writeUInt16LE(this.cmpMethod, CENTRAL_DIR.CMP_METHOD);
    // Modification time (2 bytes time, 2 bytes date)
    data.writeUInt32LE(this.timeDateDOS >>> 0, CENTRAL_DIR.TIMEDATE_DOS);
    data.writeUInt32LE(this.crc >>> 0, CENTRAL_DIR.CRC);
    data.writeUInt32LE(this.compressedSize, CENTRAL_DIR.CMP_SIZE);
    data.writeUInt32LE(this.uncompressedSize, CENTRAL_DIR.UNCMP_SIZE);
    data.writeUInt16LE(this.filename.length, CENTRAL_DIR.FNAME_LEN);
    // Extra field, comment, disk number and attributes stay zero
    data.writeUInt32LE(this.localHdrOffset, CENTRAL_DIR.LOCAL_HDR_OFFSET);

    this.filename.copy(data, CENTRAL_DIR.SIZE);

    return data;
  }

  /**
   * Modification time unpacked from the DOS timestamp, or null when the
   * entry carries the zero sentinel (dates before 1980)
   */
  getDateTime(): CalendarDateTime | null {
    return fromDosTimestamp(this.timeDateDOS);
  }

  /**
   * Formats the entry's date and time
   * @returns String like "2020-12-25 14:05:22" or "---------- --:--:--" if no date/time
   */
  toFormattedDateString(): string {
    const dt = this.getDateTime();
    if (dt === null) return "---------- --:--:--";

    const pad = (n: number) => String(n).padStart(2, '0');
    return `${dt.year}-${pad(dt.month)}-${pad(dt.day)} ${pad(dt.hour)}:${pad(dt.minute)}:${pad(dt.second)}`;
  }
}
