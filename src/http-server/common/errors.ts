/**
 * @file HTTP error helpers
 */
import { isError } from "../../util/is-error";

/** Failure kinds a request can end in, with the status each maps to. */
export const ERROR_STATUS = {
  BadRequest: 400,
  Forbidden: 403,
  NotFound: 404,
  InternalError: 500,
  NotImplemented: 501,
} as const;

export type HttpErrorKind = keyof typeof ERROR_STATUS;
export type HttpErrorStatus = (typeof ERROR_STATUS)[HttpErrorKind];

export type HttpError = Error & { kind: HttpErrorKind; status: HttpErrorStatus };

/** Status line text for the statuses this server produces. */
export const STATUS_TEXT: Readonly<Record<number, string>> = {
  200: "OK",
  301: "Moved Permanently",
  304: "Not Modified",
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  500: "Internal Server Error",
  501: "Not Implemented",
};

function isErrorKind(x: unknown): x is HttpErrorKind {
  return typeof x === "string" && Object.prototype.hasOwnProperty.call(ERROR_STATUS, x);
}

/**
 * Build an Error carrying an HTTP status. `onError` turns it into the response.
 * The message and `cause` are for the server log; the response body is the status text.
 */
export function httpError(kind: HttpErrorKind, message?: string, cause?: unknown): HttpError {
  const status = ERROR_STATUS[kind];
  const e = new Error(message ?? STATUS_TEXT[status], cause === undefined ? undefined : { cause });
  return Object.assign(e, { kind, status });
}

/** Narrow a thrown value to an error built by `httpError`. */
export function isHttpError(e: unknown): e is HttpError {
  if (!isError(e)) {
    return false;
  }
  const kind = "kind" in e ? e.kind : undefined;
  const status = "status" in e ? e.status : undefined;
  return isErrorKind(kind) && status === ERROR_STATUS[kind];
}
