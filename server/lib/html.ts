import type { FileEntry } from "./types.js";

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Build one `<li>` for a listing entry. */
function entryElement(entry: FileEntry): string {
  const type = entry.type ? ` ${escapeHtml(entry.type)}` : "";
  return `<li><a href="${escapeHtml(entry.url)}">${escapeHtml(entry.name)}</a>${type}</li>`;
}

/**
 * Render the listing page: upload form, the resolved directory and its
 * entries in the order given.
 */
export function listingPage(fullPath: string, entries: FileEntry[]): string {
  const items = entries.map(entryElement);
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>filedrop</title>
<style>
a { text-decoration: none; }
a:hover { text-decoration: underline; }
</style>
</head>
<body>
<h1>filedrop</h1>
<p>Drop a file here or pick one below.</p>
<form method="post" action="/upload" enctype="multipart/form-data">
<input type="file" name="file">
<button type="submit">Upload</button>
</form>
<h2>Serving files</h2>
<p>Path: ${escapeHtml(fullPath)}</p>
<ul>
${items.join("\n")}
</ul>
</body>
</html>
`;
}
