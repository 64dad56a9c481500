/**
 * @file Config normalization: raw settings -> validated ServerConfig
 */
import path from "node:path";
import { stat } from "node:fs/promises";
import type { ServerConfig } from "../http-server/types";
import { errorCode, errorMessage } from "../util/is-error";
import { ConfigError } from "./errors";

export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_INDEX_FILES: readonly string[] = ["index.html", "index.htm"];

/** Loosely typed settings as they arrive from env vars, flags or callers. */
export type RawServerConfig = {
  root?: string;
  port?: number | string;
  host?: string;
  listDirectories?: boolean;
  indexFiles?: readonly string[];
  logRequests?: boolean;
};

function digitsToNumber(s: string): number {
  return /^\d+$/.test(s) ? Number(s) : NaN;
}

/** Parse a TCP port; null when it is not an integer in 0..65535. */
export function parsePort(value: number | string): number | null {
  const n = typeof value === "number" ? value : digitsToNumber(value.trim());
  if (!Number.isInteger(n) || n < 0 || n > 65535) {
    return null;
  }
  return n;
}

/** Structural checks that need no I/O; returns every problem found. */
export function validateRawConfig(raw: RawServerConfig): string[] {
  const errors: string[] = [];
  if (raw.port !== undefined && parsePort(raw.port) === null) {
    errors.push(`port: must be an integer between 0 and 65535 (got ${JSON.stringify(raw.port)})`);
  }
  if (raw.host !== undefined && raw.host.trim() === "") {
    errors.push("host: must be a non-empty string");
  }
  if (raw.root !== undefined && raw.root.trim() === "") {
    errors.push("root: must be a non-empty path");
  }
  if (raw.indexFiles !== undefined && raw.indexFiles.some((f) => f === "" || f.includes("/"))) {
    errors.push("indexFiles: must be plain file names");
  }
  return errors;
}

async function checkDirectory(root: string): Promise<string | null> {
  try {
    const s = await stat(root);
    return s.isDirectory() ? null : `root: not a directory: ${root}`;
  } catch (e) {
    if (errorCode(e) === "ENOENT") {
      return `root: directory does not exist: ${root}`;
    }
    return `root: cannot access ${root} (${errorMessage(e)})`;
  }
}

/**
 * Normalize raw settings into a ServerConfig.
 * - Applies defaults for anything left out
 * - Resolves `root` against `baseDir` and checks it is an existing directory
 * - Throws ConfigError listing every problem
 */
export async function normalizeConfig(raw: RawServerConfig, baseDir: string = process.cwd()): Promise<ServerConfig> {
  const errors = validateRawConfig(raw);
  const root = path.resolve(baseDir, raw.root?.trim() || ".");
  if (raw.root === undefined || raw.root.trim() !== "") {
    const problem = await checkDirectory(root);
    if (problem) {
      errors.push(problem);
    }
  }
  const port = raw.port === undefined ? DEFAULT_PORT : parsePort(raw.port);
  if (errors.length > 0 || port === null) {
    throw new ConfigError(errors);
  }
  return {
    root,
    port,
    host: raw.host?.trim() || DEFAULT_HOST,
    listDirectories: raw.listDirectories ?? true,
    indexFiles: [...(raw.indexFiles ?? DEFAULT_INDEX_FILES)],
    logRequests: raw.logRequests ?? true,
  } satisfies ServerConfig;
}
