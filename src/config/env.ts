/**
 * @file Settings read from environment variables
 */
import type { RawServerConfig } from "./normalize";

/** Environment variable names recognized by the server. */
export const ENV_KEYS = {
  port: "PORT",
  host: "HOST",
  root: "SERVE_ROOT",
} as const;

function nonEmpty(v: string | undefined): string | undefined {
  if (v === undefined || v.trim() === "") {
    return undefined;
  }
  return v;
}

/** Pick server settings out of an environment; blank values are ignored. */
export function configFromEnv(env: NodeJS.ProcessEnv): RawServerConfig {
  return withoutUndefined({
    port: nonEmpty(env[ENV_KEYS.port]),
    host: nonEmpty(env[ENV_KEYS.host]),
    root: nonEmpty(env[ENV_KEYS.root]),
  });
}

/** Drop keys whose value is undefined so that spreading layers does not clobber earlier ones. */
export function withoutUndefined(raw: RawServerConfig): RawServerConfig {
  const out: RawServerConfig = {};
  if (raw.root !== undefined) {
    out.root = raw.root;
  }
  if (raw.port !== undefined) {
    out.port = raw.port;
  }
  if (raw.host !== undefined) {
    out.host = raw.host;
  }
  if (raw.listDirectories !== undefined) {
    out.listDirectories = raw.listDirectories;
  }
  if (raw.indexFiles !== undefined) {
    out.indexFiles = raw.indexFiles;
  }
  if (raw.logRequests !== undefined) {
    out.logRequests = raw.logRequests;
  }
  return out;
}
