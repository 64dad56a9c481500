/**
 * @file Hono app assembly
 */
import { Hono } from "hono";
import { logger } from "hono/logger";
import type { ServerConfig } from "./types";
import { applyCors } from "./cors";
import { isHttpError, STATUS_TEXT } from "./common/errors";
import type { RouteContext } from "./routes/context";
import { handleRequest } from "./routes/handle_request";

/** Build the Hono app serving `cfg.root`. */
export function createApp(cfg: ServerConfig) {
  const app = new Hono();

  app.onError((err, c) => {
    if (!isHttpError(err)) {
      console.error(`Unexpected error while serving ${c.req.method} ${c.req.path}:`, err);
      return c.text(STATUS_TEXT[500], 500);
    }
    if (err.status >= 500) {
      console.error(`${err.message} (${c.req.method} ${c.req.path}):`, err.cause ?? err);
    }
    return c.text(STATUS_TEXT[err.status], err.status);
  });
  app.notFound((c) => c.text(STATUS_TEXT[404], 404));

  if (cfg.logRequests) {
    app.use("*", logger((line) => console.error(line)));
  }
  applyCors(app);

  const ctx: RouteContext = {
    root: cfg.root,
    listDirectories: cfg.listDirectories,
    indexFiles: cfg.indexFiles,
  };
  app.all("*", (c) => handleRequest(c, ctx));

  return app;
}
