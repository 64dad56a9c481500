/**
 * @file CORS mounting
 */
import type { Hono } from "hono";
import { createMiddleware } from "hono/factory";

/** Headers stamped on every response, whatever its method or status. */
export const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
} as const;

/**
 * Runs after the rest of the chain so that error, redirect and
 * not-modified responses get the headers too.
 */
export const corsHeaders = createMiddleware(async (c, next) => {
  await next();
  for (const [name, value] of Object.entries(CORS_HEADERS)) {
    c.res.headers.set(name, value);
  }
});

/** Mount the permissive CORS headers on every route. */
export function applyCors(app: Hono) {
  app.use("*", corsHeaders);
}
