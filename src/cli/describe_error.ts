/**
 * @file One-line startup failure messages
 */
import { ConfigError } from "../config";
import { errorCode, errorMessage } from "../util/is-error";

/** Turn a startup failure into the message printed before exiting non-zero. */
export function describeStartupError(e: unknown, port?: number): string {
  if (e instanceof ConfigError) {
    return e.message;
  }
  const where = port === undefined ? "the requested port" : `port ${port}`;
  switch (errorCode(e)) {
    case "EADDRINUSE":
      return `Cannot start server: ${where} is already in use.`;
    case "EACCES":
      return `Cannot start server: permission denied to bind ${where}.`;
    case "EADDRNOTAVAIL":
      return "Cannot start server: the requested address is not available on this machine.";
    default:
      return `Failed to start server: ${errorMessage(e)}`;
  }
}
