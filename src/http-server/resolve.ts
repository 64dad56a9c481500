/**
 * @file URL path -> filesystem path, confined to the served root
 */
import path from "node:path";
import { httpError } from "./common/errors";

export type ResolvedPath = {
  /** Percent-decoded URL path, always starting with "/". */
  urlPath: string;
  /** Absolute filesystem path inside the root. */
  fsPath: string;
};

/** Percent-decode a raw URL pathname. Undecodable input or NUL bytes are a bad request. */
export function decodeUrlPath(pathname: string): string {
  const decoded = (() => {
    try {
      return decodeURIComponent(pathname);
    } catch {
      throw httpError("BadRequest");
    }
  })();
  if (decoded.includes("\0")) {
    throw httpError("BadRequest");
  }
  return decoded.startsWith("/") ? decoded : `/${decoded}`;
}

/** True when `target` is `root` itself or lies beneath it. */
export function isWithinRoot(root: string, target: string): boolean {
  const rel = path.relative(root, target);
  if (rel === "") {
    return true;
  }
  if (path.isAbsolute(rel)) {
    return false;
  }
  return rel !== ".." && !rel.startsWith(`..${path.sep}`);
}

/**
 * Map a raw request pathname onto the filesystem under `root`.
 * Throws BadRequest for undecodable paths and Forbidden for anything escaping the root.
 */
export function resolveRequestPath(root: string, pathname: string): ResolvedPath {
  const urlPath = decodeUrlPath(pathname);
  const fsPath = path.resolve(root, urlPath.replace(/^\/+/, ""));
  if (!isWithinRoot(root, fsPath)) {
    throw httpError("Forbidden");
  }
  return { urlPath, fsPath };
}
