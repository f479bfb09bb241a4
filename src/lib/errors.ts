export type ApiErrorCode =
  | "E_INVALID_ARG"
  | "E_NOT_FOUND"
  | "E_UNRESOLVED"
  | "E_EXTERNAL"
  | "E_UPSTREAM_NOT_FOUND"
  | "E_INTERNAL";

const ERROR_CODE_REGEX = /^[A-Z_]+:/;

// Messages carry their code as a prefix, e.g. "E_NOT_FOUND:Pokemon 'mew' not found"
export class ApiError extends Error {
  readonly code: ApiErrorCode;

  constructor(code: ApiErrorCode, message: string, options?: { cause?: unknown }) {
    super(`${code}:${message}`, options);
    this.name = "ApiError";
    this.code = code;
  }
}

export function apiError(code: ApiErrorCode, message: string, cause?: unknown): ApiError {
  return new ApiError(code, message, cause === undefined ? undefined : { cause });
}

export function toApiError(err: unknown, fallback = "Unknown error"): ApiError {
  if (err instanceof ApiError) return err;
  const message = err instanceof Error ? err.message : fallback;
  return apiError("E_INTERNAL", message.replace(ERROR_CODE_REGEX, ""), err);
}

// Strip the code prefix for response bodies.
export function errorMessage(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return message.replace(ERROR_CODE_REGEX, "");
}

export function statusForCode(code: ApiErrorCode): number {
  switch (code) {
    case "E_INVALID_ARG":
    case "E_UNRESOLVED":
      return 400;
    case "E_NOT_FOUND":
      return 404;
    case "E_EXTERNAL":
    case "E_UPSTREAM_NOT_FOUND":
      return 502;
    default:
      return 500;
  }
}
