import path from "path";
import { open } from "fs/promises";
import type { FileHandle } from "fs/promises";
import { pipeline } from "stream/promises";
import contentDisposition from "content-disposition";
import { getNavPath, resolveInRoot } from "../lib/paths.js";
import { endWithStatus } from "../lib/respond.js";
import type { Handler } from "../lib/types.js";

export function createDownloadHandler(serveDir: string): Handler {
  return async (_req, res, url) => {
    const fsPath = resolveInRoot(serveDir, getNavPath(url.searchParams));
    if (!fsPath) {
      endWithStatus(res, 403);
      return;
    }

    let file: FileHandle;
    try {
      file = await open(fsPath, "r");
    } catch (err) {
      console.error(`[download] Unable to open ${fsPath}:`, err);
      endWithStatus(res, 500);
      return;
    }

    try {
      const stat = await file.stat();
      if (!stat.isFile()) {
        console.error(`[download] Not a regular file: ${fsPath}`);
        endWithStatus(res, 500);
        return;
      }

      res.writeHead(200, {
        "Content-Type": "application/octet-stream",
        "Content-Length": stat.size,
        "Content-Disposition": contentDisposition(path.basename(fsPath)),
      });
      await pipeline(file.createReadStream({ autoClose: false }), res);
    } catch (err) {
      console.error(`[download] Transfer of ${fsPath} failed:`, err);
      if (res.headersSent) {
        // Body already started; the only signal left is a cut connection.
        res.destroy();
      } else {
        endWithStatus(res, 500);
      }
    } finally {
      await file.close().catch((err: unknown) => {
        console.error(`[download] Unable to close ${fsPath}:`, err);
      });
    }
  };
}
