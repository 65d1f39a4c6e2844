import type { Dirent } from "fs";
import { readdir } from "fs/promises";
import { getNavPath, joinNavPath, resolveInRoot } from "../lib/paths.js";
import { listingPage } from "../lib/html.js";
import { endWithStatus } from "../lib/respond.js";
import type { FileEntry, Handler } from "../lib/types.js";

function linkTo(route: "/" | "/download", navPath: string): string {
  return `${route}?${new URLSearchParams({ p: navPath }).toString()}`;
}

/**
 * Turn directory children into listing rows. The parent entry always comes
 * first; children keep the order they were given in.
 */
export function buildEntries(
  navPath: string,
  children: ReadonlyArray<Pick<Dirent, "name" | "isDirectory">>
): FileEntry[] {
  const entries: FileEntry[] = [
    { url: linkTo("/", joinNavPath(navPath, "..")), name: "../", type: "<DIR>" },
  ];
  for (const child of children) {
    const childPath = joinNavPath(navPath, child.name);
    if (child.isDirectory()) {
      entries.push({ url: linkTo("/", childPath), name: `${child.name}/`, type: "<DIR>" });
    } else {
      entries.push({ url: linkTo("/download", childPath), name: child.name, type: "" });
    }
  }
  return entries;
}

export function createListingHandler(serveDir: string): Handler {
  return async (_req, res, url) => {
    if (url.pathname !== "/") {
      endWithStatus(res, 404);
      return;
    }

    const navPath = getNavPath(url.searchParams);
    const fullPath = resolveInRoot(serveDir, navPath);
    if (!fullPath) {
      endWithStatus(res, 403);
      return;
    }

    let children: Dirent[];
    try {
      children = await readdir(fullPath, { withFileTypes: true });
    } catch (err) {
      console.error(`[listing] Unable to read ${fullPath}:`, err);
      endWithStatus(res, 500);
      return;
    }

    const body = Buffer.from(listingPage(fullPath, buildEntries(navPath, children)), "utf-8");
    res.writeHead(200, {
      "Content-Type": "text/html; charset=utf-8",
      "Content-Length": body.length,
    });
    res.end(body);
  };
}
