// ======================================
//	Headers.ts
// ======================================
// Zip File Format Constants

// Version 2.0, host MS-DOS (upper byte 0)
export const ZIP_VERSION = 20;

// Local file header
export const LOCAL_HDR = {
  SIZE:       30,     // LOC header size in bytes
  SIGNATURE:  0x04034b50,  // "PK\003\004"
  VER_EXTRACT: 4,     // version needed to extract
  FLAGS:       6,     // general purpose bit flag
  COMPRESSION: 8,     // compression method
  TIMEDATE_DOS: 10,   // modification time (2 bytes time, 2 bytes date)
  CRC:        14,     // uncompressed file crc-32 value
  CMP_SIZE:   18,     // compressed size
  UNCMP_SIZE: 22,     // uncompressed size
  FNAME_LEN:  26,     // filename length
  EXTRA_LEN:  28      // extra field length
};

// The central directory file header
export const CENTRAL_DIR = {
  SIZE:       46,     // Central directory header size
  SIGNATURE:  0x02014b50,  // "PK\001\002"
  VER_MADE:   4,      // version made by
  VER_EXT:    6,      // version needed to extract
  FLAGS:      8,      // general purpose bit flag
  CMP_METHOD: 10,    // compression method
  TIMEDATE_DOS: 12,     // DOS modification time (2 bytes time, 2 bytes date)
  CRC:        16,     // uncompressed file crc-32 value
  CMP_SIZE:   20,     // compressed size
  UNCMP_SIZE: 24,     // uncompressed size
  FNAME_LEN:  28,     // filename length
  EXTRA_LEN:  30,     // extra field length
  COMMENT_LEN: 32,    // file comment length
  DISK_NUM:   34,     // volume number start
  INT_FILE_ATTR: 36,  // internal file attributes
  EXT_FILE_ATTR: 38,  // external file attributes (host system dependent)
  LOCAL_HDR_OFFSET: 42 // LOC header offset
};

// The Zip central directory Locator
export const CENTRAL_END = {
  SIZE:       22,         // END header size
  SIGNATURE:  0x06054b50, // "PK\005\006"
  VOL_NUM:        4,      // number of this disk
  VOLDIR_START:   6,      // number of the volume/disk with start of the Central Directory
  VOL_ENTRIES:    8,      // number of entries on this volume/disk
  TOTAL_ENTRIES:  10,     // total number of entries on this disk
  CENTRAL_DIR_SIZE: 12,   // central directory size in bytes
  CENTRAL_DIR_OFFSET: 16, // offset of first CEN header
  ZIP_COMMENT_LEN: 20     // zip file comment length
};

// Compression methods
export const CMP_METHOD = {
  STORED:           0,  // no compression
  DEFLATED:         8,  // deflated
} as const;

export type CompressionMethod = typeof CMP_METHOD[keyof typeof CMP_METHOD];

// General purpose bit flag
export const GP_FLAG = {
  EFS:            2048, // Bit 11: Language encoding flag (EFS), names are UTF-8
};

// Largest values the non-Zip64 fields can hold
export const MAX_UINT16 = 0xffff;
export const MAX_UINT32 = 0xffffffff;
