/**
 * @file Directory listing page
 */
import { readdir } from "node:fs/promises";
import { html } from "hono/html";
import { httpError } from "../../common/errors";

export type ListingEntry = { name: string; isDirectory: boolean };

/** Case-insensitive name order. */
function byLowerName(a: ListingEntry, b: ListingEntry): number {
  const x = a.name.toLowerCase();
  const y = b.name.toLowerCase();
  if (x === y) {
    return 0;
  }
  return x < y ? -1 : 1;
}

/** Read a directory's entries, sorted for display. Unlistable directories are a 404. */
export async function readListing(dir: string): Promise<ListingEntry[]> {
  const dirents = await readdir(dir, { withFileTypes: true }).catch(() => {
    throw httpError("NotFound", "No permission to list directory");
  });
  return dirents.map((d) => ({ name: d.name, isDirectory: d.isDirectory() })).sort(byLowerName);
}

/**
 * Render the listing for `urlPath` (decoded, ending in "/").
 * Link targets are percent-encoded, labels HTML-escaped.
 */
export async function renderListing(urlPath: string, entries: readonly ListingEntry[]): Promise<string> {
  const title = `Directory listing for ${urlPath}`;
  const items = entries.map((e) => {
    const suffix = e.isDirectory ? "/" : "";
    return html`<li><a href="${encodeURIComponent(e.name)}${suffix}">${e.name}${suffix}</a></li>`;
  });
  const page = await html`<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${title}</title>
</head>
<body>
<h1>${title}</h1>
<hr>
<ul>
${items}
</ul>
<hr>
</body>
</html>
`;
  return page.toString();
}
