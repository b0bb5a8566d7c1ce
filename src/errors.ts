/* ==================== ERRORS ==================== */

// A protocol failure that maps directly onto a response status.
export class HTTPError extends Error {
  override readonly name = "HTTPError";

  constructor(
    readonly code: number,
    message: string,
  ) {
    super(message);
  }
}

export type StoreErrorKind = "read" | "write" | "corrupt";

export class StoreError extends Error {
  override readonly name = "StoreError";

  constructor(
    readonly kind: StoreErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
