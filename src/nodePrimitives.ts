/**
 * Errno-flavoured error raised by the Node.js filesystem APIs. Only the
 * properties the supervisor inspects are listed.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows an unknown thrown value to an {@link ErrnoException}. */
export function isErrnoException(error: unknown): error is ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}
