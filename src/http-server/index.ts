/**
 * @file Public HTTP server entry (barrel)
 */
export { createApp } from "./app";
export { startServer, formatBanner, toServerInfo, type RunningServer } from "./start";
export { CORS_HEADERS } from "./cors";
export { httpError, isHttpError, type HttpError, type HttpErrorKind } from "./common/errors";
export type { ServerConfig, ServerInfo } from "./types";
