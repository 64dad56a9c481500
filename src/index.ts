/**
 * @file Public API
 */
export {
  createApp,
  startServer,
  formatBanner,
  toServerInfo,
  CORS_HEADERS,
  httpError,
  isHttpError,
  type RunningServer,
  type HttpError,
  type HttpErrorKind,
  type ServerConfig,
  type ServerInfo,
} from "./http-server";
export {
  loadServerConfig,
  normalizeConfig,
  configFromEnv,
  ConfigError,
  DEFAULT_PORT,
  DEFAULT_HOST,
  type RawServerConfig,
} from "./config";
