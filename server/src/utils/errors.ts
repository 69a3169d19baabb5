export type ShareErrorCode =
  | "unauthenticated"
  | "invalid_request"
  | "not_found"
  | "expired"
  | "limit_reached"
  | "too_large"
  | "internal";

const HTTP_STATUS: Record<ShareErrorCode, number> = {
  unauthenticated: 401,
  invalid_request: 400,
  not_found: 404,
  expired: 410,
  limit_reached: 410,
  too_large: 413,
  internal: 500,
};

/**
 * Error surfaced to clients with a stable code. Anything that is not a
 * ShareError is treated as an internal failure by the controllers.
 */
export class ShareError extends Error {
  readonly code: ShareErrorCode;

  constructor(code: ShareErrorCode, message: string) {
    super(message);
    this.name = "ShareError";
    this.code = code;
  }

  get status(): number {
    return HTTP_STATUS[this.code];
  }
}

export function isShareError(error: unknown): error is ShareError {
  return error instanceof ShareError;
}

/**
 * Short label for log lines: the system error code when there is one
 * (ENOENT, SQLITE_BUSY, ...), otherwise the error's class name.
 */
export function errorCategory(error: unknown): string {
  if (isShareError(error)) return error.code;
  if (error instanceof Error) {
    return "code" in error && typeof error.code === "string"
      ? error.code
      : error.name;
  }
  return typeof error;
}
