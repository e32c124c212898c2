// ======================================
//	Errors.ts
// ======================================
// Error messages

export default {
    /* Writer state error messages */
    ARCHIVE_BUSY: "Archive is busy: another operation is in progress or a previous write failed",
    ARCHIVE_CLOSED: "Archive has already been finalized",

    /* Output error messages */
    WRITE_FAILED: "Failed to write %s to the output sink",
    SINK_CLOSED: "Output sink is closed",

    /* Size limit error messages */
    FILENAME_TOO_LONG: "Filename is %s bytes long, the limit is 65535",
    ENTRY_TOO_LARGE: "Entry %s is too large for a non-Zip64 archive",
    ARCHIVE_TOO_LARGE: "Archive offset would exceed 4 GiB while writing %s",
    TOO_MANY_ENTRIES: "Archive holds %s entries, the limit is 65535",

    /* Discard safety net */
    DISCARD_FINALIZE_FAILED: "Archive was discarded without finalize() and the automatic finalize failed",

    COMPRESS_FAILED: 'Failed to compress data',
    INVALID_START_OFFSET: "Start offset must be a non-negative integer, got %s",
};

/**
 * Replaces each `%s` placeholder in order
 */
export function formatError(message: string, ...args: Array<string | number>): string {
    let i = 0;
    return message.replace(/%s/g, () => (i < args.length ? String(args[i++]) : '%s'));
}
