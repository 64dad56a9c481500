/**
 * @file GET/HEAD handler
 * Serves a file, a directory's index file, or a directory listing from under the root.
 */
import type { Context } from "hono";
import { open, stat, type FileHandle } from "node:fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { getMimeType } from "hono/utils/mime";
import type { RouteContext } from "../context";
import { resolveRequestPath } from "../../resolve";
import { httpError } from "../../common/errors";
import { errorCode } from "../../../util/is-error";
import { readListing, renderListing } from "./listing";

const FALLBACK_CONTENT_TYPE = "application/octet-stream";

// Errno codes that mean "nothing servable here" rather than a server fault.
const NOT_FOUND_CODES = new Set(["ENOENT", "ENOTDIR", "ENAMETOOLONG", "ELOOP", "EACCES", "EPERM", "EISDIR"]);

function isNotFoundError(e: unknown): boolean {
  const code = errorCode(e);
  return code !== undefined && NOT_FOUND_CODES.has(code);
}

async function statOrNull(p: string): Promise<Stats | null> {
  try {
    return await stat(p);
  } catch (e) {
    if (isNotFoundError(e)) {
      return null;
    }
    throw httpError("InternalError", `Cannot stat ${p}`, e);
  }
}

/** Content type inferred from the file extension. */
export function contentTypeFor(filePath: string): string {
  return getMimeType(path.basename(filePath).toLowerCase()) ?? FALLBACK_CONTENT_TYPE;
}

/**
 * True when a conditional GET can be answered with 304.
 * `If-None-Match` takes precedence, and this server issues no ETags, so its presence disables the check.
 */
export function isNotModified(
  ifModifiedSince: string | undefined,
  ifNoneMatch: string | undefined,
  mtime: Date,
): boolean {
  if (!ifModifiedSince || ifNoneMatch !== undefined) {
    return false;
  }
  const since = Date.parse(ifModifiedSince);
  if (Number.isNaN(since)) {
    return false;
  }
  // HTTP dates carry whole seconds only
  return Math.floor(mtime.getTime() / 1000) * 1000 <= since;
}

async function openForReading(filePath: string): Promise<FileHandle> {
  try {
    return await open(filePath, "r");
  } catch (e) {
    if (isNotFoundError(e)) {
      throw httpError("NotFound");
    }
    throw httpError("InternalError", `Cannot open ${filePath}`, e);
  }
}

/**
 * Answer with the file's headers and, for GET, a stream of its bytes.
 * The file is opened before answering so an unreadable file is still a 404.
 */
async function sendFile(c: Context, filePath: string, stats: Stats): Promise<Response> {
  const lastModified = stats.mtime.toUTCString();
  if (isNotModified(c.req.header("If-Modified-Since"), c.req.header("If-None-Match"), stats.mtime)) {
    return new Response(null, { status: 304, headers: { "Last-Modified": lastModified } });
  }
  const headers = {
    "Content-Type": contentTypeFor(filePath),
    "Content-Length": String(stats.size),
    "Last-Modified": lastModified,
  };
  const handle = await openForReading(filePath);
  if (c.req.method === "HEAD") {
    await handle.close();
    return new Response(null, { status: 200, headers });
  }
  // the read stream closes the handle once it ends or fails
  const body = Readable.toWeb(handle.createReadStream());
  return new Response(body, { status: 200, headers });
}

async function findIndexFile(
  dir: string,
  indexFiles: readonly string[],
): Promise<{ filePath: string; stats: Stats } | null> {
  for (const name of indexFiles) {
    const filePath = path.join(dir, name);
    const stats = await statOrNull(filePath);
    if (stats?.isFile()) {
      return { filePath, stats };
    }
  }
  return null;
}

/**
 * Handle GET and HEAD for any path.
 * @param c - Hono context
 * @param ctx - Route context
 */
export async function servePath(c: Context, ctx: RouteContext): Promise<Response> {
  const url = new URL(c.req.url);
  const { urlPath, fsPath } = resolveRequestPath(ctx.root, url.pathname);
  const stats = await statOrNull(fsPath);
  if (!stats) {
    throw httpError("NotFound");
  }
  if (stats.isDirectory()) {
    if (!url.pathname.endsWith("/")) {
      return c.redirect(`${url.pathname}/${url.search}`, 301);
    }
    const index = await findIndexFile(fsPath, ctx.indexFiles);
    if (index) {
      return sendFile(c, index.filePath, index.stats);
    }
    if (!ctx.listDirectories) {
      throw httpError("NotFound");
    }
    const page = await renderListing(urlPath, await readListing(fsPath));
    return c.html(page);
  }
  if (!stats.isFile()) {
    throw httpError("NotFound");
  }
  return sendFile(c, fsPath, stats);
}
