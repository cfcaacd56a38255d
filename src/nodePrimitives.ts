import process from "node:process";

/** Environment map accepted by the settings loader (defaults to {@link process.env}). */
export type ProcessEnv = typeof process.env;

/**
 * Errno-flavoured error raised by the filesystem helpers. Only the fields the
 * catalog loaders and the logger inspect are declared.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows an unknown rejection to an {@link ErrnoException} carrying `code`. */
export function isErrnoException(error: unknown): error is ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}
