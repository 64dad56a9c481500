/**
 * @file OPTIONS handler
 * CORS preflight acknowledgement; the headers themselves come from the CORS middleware.
 */
import type { Context } from "hono";

/** Answer any OPTIONS request with an empty 200. */
export function preflight(c: Context): Response {
  return c.body(null, 200);
}
