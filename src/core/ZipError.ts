// ======================================
//	ZipError.ts - Typed writer failures
// ======================================

export type ZipErrorCode = 'IoError' | 'SizeLimitExceeded' | 'InvalidState';

/**
 * Error raised by the archive writer.
 *
 * - `IoError`: the sink rejected a write. The archive is truncated and must be discarded.
 * - `SizeLimitExceeded`: a length or offset does not fit the format's fixed-width fields.
 * - `InvalidState`: the writer is busy or already closed. Nothing was written.
 */
export class ZipError extends Error {
  readonly code: ZipErrorCode;
  readonly cause?: unknown;

  constructor(code: ZipErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = 'ZipError';
    this.code = code;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export function isZipError(error: unknown, code?: ZipErrorCode): error is ZipError {
  return error instanceof ZipError && (code === undefined || error.code === code);
}
