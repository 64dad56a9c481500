/**
 * @file Server boot: bind the Hono app to a Node HTTP server
 */
import { createServer, type Server } from "node:http";
import type { Duplex } from "node:stream";
import { getRequestListener } from "@hono/node-server";
import { createApp } from "./app";
import { CORS_HEADERS } from "./cors";
import { STATUS_TEXT } from "./common/errors";
import type { ServerConfig, ServerInfo } from "./types";
import { errorCode, errorMessage } from "../util/is-error";

export type RunningServer = {
  readonly info: ServerInfo;
  readonly server: Server;
  /** Close the listener and open connections. Safe to call more than once. */
  readonly stop: () => Promise<void>;
};

const WILDCARD_HOSTS = new Set(["0.0.0.0", "::", ""]);

/** Describe where a server bound to `host:port` can be reached. */
export function toServerInfo(cfg: Pick<ServerConfig, "host" | "root">, port: number): ServerInfo {
  const browseHost = WILDCARD_HOSTS.has(cfg.host) ? "localhost" : cfg.host;
  const urlHost = browseHost.includes(":") ? `[${browseHost}]` : browseHost;
  return { host: cfg.host, port, root: cfg.root, url: `http://${urlHost}:${port}/` };
}

/** Startup banner lines. */
export function formatBanner(info: ServerInfo): string[] {
  return [
    `Static server running on port ${info.port}`,
    `Serving files from: ${info.root}`,
    `Open your browser at: ${info.url}`,
    "Press Ctrl+C to stop the server",
  ];
}

/**
 * Raw HTTP/1.1 response for requests the Node parser rejects before Hono sees them.
 * Carries the CORS headers like every other response.
 */
export function rawErrorResponse(status: number): string {
  const text = STATUS_TEXT[status] ?? "Error";
  const headers = Object.entries(CORS_HEADERS).map(([name, value]) => `${name}: ${value}`);
  return [
    `HTTP/1.1 ${status} ${text}`,
    ...headers,
    "Content-Type: text/plain; charset=utf-8",
    `Content-Length: ${Buffer.byteLength(text)}`,
    "Connection: close",
    "",
    text,
  ].join("\r\n");
}

/**
 * Answer for requests `@hono/node-server` cannot turn into a `Request`
 * (missing or unparsable `Host`), which never reach the Hono app.
 */
export function badRequestResponse(): Response {
  return new Response(STATUS_TEXT[400], {
    status: 400,
    headers: { ...CORS_HEADERS, "Content-Type": "text/plain; charset=utf-8" },
  });
}

function rejectMalformed(err: Error, socket: Duplex): void {
  if (errorCode(err) === "ECONNRESET" || !socket.writable) {
    socket.destroy();
    return;
  }
  socket.end(rawErrorResponse(400));
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("listening", onListening);
      reject(err);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
}

/** Start serving `cfg.root` on `cfg.host:cfg.port`. Rejects when the port cannot be bound. */
export async function startServer(cfg: ServerConfig): Promise<RunningServer> {
  const app = createApp(cfg);
  // Node's own Host check answers 400 without CORS headers; leave it to the listener.
  const server = createServer(
    { requireHostHeader: false },
    getRequestListener(app.fetch, { errorHandler: badRequestResponse }),
  );
  server.on("clientError", rejectMalformed);

  await listen(server, cfg.port, cfg.host);
  server.on("error", (e) => {
    console.error(`Server error: ${errorMessage(e)}`);
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : cfg.port;

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      if (!server.listening) {
        resolve();
        return;
      }
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
      server.closeAllConnections();
    });

  return { info: toServerInfo(cfg, port), server, stop };
}
