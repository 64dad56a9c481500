/**
 * @file Shared config API surface for CLI and server.
 */
import type { ServerConfig } from "../http-server/types";
import { configFromEnv, withoutUndefined } from "./env";
import { normalizeConfig, type RawServerConfig } from "./normalize";

export {
  normalizeConfig,
  validateRawConfig,
  parsePort,
  DEFAULT_PORT,
  DEFAULT_HOST,
  DEFAULT_INDEX_FILES,
  type RawServerConfig,
} from "./normalize";
export { configFromEnv, ENV_KEYS } from "./env";
export { ConfigError } from "./errors";

/**
 * Resolve the effective config: defaults, then environment, then explicit overrides (CLI flags).
 */
export async function loadServerConfig(
  overrides: RawServerConfig,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<ServerConfig> {
  return normalizeConfig({ ...configFromEnv(env), ...withoutUndefined(overrides) }, cwd);
}
