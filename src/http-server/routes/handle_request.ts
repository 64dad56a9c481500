/**
 * @file Single request handler switching over the supported methods
 */
import type { Context } from "hono";
import type { RouteContext } from "./context";
import { httpError } from "../common/errors";
import { servePath } from "./static/serve_path";
import { preflight } from "./static/preflight";

export type RequestMethod = "GET" | "HEAD" | "OPTIONS" | "OTHER";

/** Collapse an HTTP method into the closed set this server distinguishes. */
export function classifyMethod(method: string): RequestMethod {
  switch (method.toUpperCase()) {
    case "GET":
      return "GET";
    case "HEAD":
      return "HEAD";
    case "OPTIONS":
      return "OPTIONS";
    default:
      return "OTHER";
  }
}

/**
 * Dispatch one request.
 * @param c - Hono context
 * @param ctx - Route context
 */
export async function handleRequest(c: Context, ctx: RouteContext): Promise<Response> {
  const method = classifyMethod(c.req.method);
  switch (method) {
    case "GET":
    case "HEAD":
      return servePath(c, ctx);
    case "OPTIONS":
      return preflight(c);
    case "OTHER":
      throw httpError("NotImplemented");
  }
}
