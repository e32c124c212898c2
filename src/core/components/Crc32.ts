// ======================================
//	Crc32.ts - CRC-32 checksum (reflected, polynomial 0xEDB88320)
// ======================================

/**
 * Running CRC-32 accumulator, an unsigned 32-bit value.
 */
export type ChecksumState = number;

const CRC32_POLYNOMIAL = 0xedb88320;
const CRC32_SEED = 0xffffffff;

let crcTable: Uint32Array | null = null;

/**
 * Returns the 256-entry lookup table, building it on first use.
 * The table is never modified once built.
 */
export function getCrcTable(): Uint32Array {
  if (crcTable === null) {
    const table = new Uint32Array(256);
    for (let n = 0; n < 256; n++) {
      let c = n;
      for (let k = 0; k < 8; k++) {
        c = c & 1 ? CRC32_POLYNOMIAL ^ (c >>> 1) : c >>> 1;
      }
      table[n] = c >>> 0;
    }
    crcTable = table;
  }
  return crcTable;
}

export function crc32Init(): ChecksumState {
  return CRC32_SEED;
}

/**
 * Folds `data` into `state`. Splitting the input into chunks and updating
 * chunk by chunk gives the same result as a single update.
 */
export function crc32Update(state: ChecksumState, data: Uint8Array): ChecksumState {
  const table = getCrcTable();
  let crc = state;
  for (let i = 0; i < data.length; i++) {
    crc = table[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return crc >>> 0;
}

export function crc32Finalize(state: ChecksumState): number {
  return ~state >>> 0;
}

/**
 * CRC-32 of a whole buffer or UTF-8 string
 */
export function crc32(data: Uint8Array | string): number {
  const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return crc32Finalize(crc32Update(crc32Init(), bytes));
}
