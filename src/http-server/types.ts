/**
 * @file HTTP server config types
 */

/** Fully resolved settings a server instance runs with. Immutable once built. */
export type ServerConfig = {
  /** Absolute path of the directory being served; nothing outside it is readable. */
  readonly root: string;
  /** TCP port; 0 binds an ephemeral port. */
  readonly port: number;
  readonly host: string;
  /** Directory without an index file: HTML listing when true, 404 otherwise. */
  readonly listDirectories: boolean;
  /** Index file names tried in order when a directory is requested. */
  readonly indexFiles: readonly string[];
  /** Emit a per-request access log on stderr. */
  readonly logRequests: boolean;
};

/** Where a started server can be reached. */
export type ServerInfo = {
  readonly host: string;
  readonly port: number;
  readonly root: string;
  /** URL to open in a browser (loopback name when bound to all interfaces). */
  readonly url: string;
};
