/**
 * @file Error-like type guards
 */

/** Narrow unknown to a non-null object record. */
function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object") {
    return false;
  }
  return value !== null;
}

/** Narrow to real Error instances. */
export function isError(e: unknown): e is Error {
  return e instanceof Error;
}

/** Node errno code (ENOENT, EACCES, ...) carried by a thrown value, if any. */
export function errorCode(e: unknown): string | undefined {
  if (!isRecord(e)) {
    return undefined;
  }
  const code = e["code"];
  return typeof code === "string" ? code : undefined;
}

/** Human-readable message for any thrown value. */
export function errorMessage(e: unknown): string {
  if (isError(e)) {
    return e.message;
  }
  if (isRecord(e) && typeof e["message"] === "string") {
    return e["message"];
  }
  return String(e);
}
