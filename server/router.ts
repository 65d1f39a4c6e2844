import type { IncomingMessage, ServerResponse } from "http";
import { createListingHandler } from "./handlers/listing.js";
import { createDownloadHandler } from "./handlers/download.js";
import { createUploadHandler } from "./handlers/upload.js";
import { endWithStatus } from "./lib/respond.js";
import type { ByMethod, Handler, ServerConfig } from "./lib/types.js";

/** Dispatch on GET/POST; every other method, or an unset one, is a 405. */
export function byMethod(handlers: ByMethod): Handler {
  const allow = Object.keys(handlers).join(", ");
  return async (req, res, url) => {
    const method = (req.method ?? "GET").toUpperCase();
    const handler =
      method === "GET" ? handlers.GET : method === "POST" ? handlers.POST : undefined;
    if (!handler) {
      res.writeHead(405, { Allow: allow, "Content-Length": "0" });
      res.end();
      return;
    }
    await handler(req, res, url);
  };
}

/**
 * Route by pathname. "/upload" and "/download" match exactly; anything else
 * goes to the "/" route, whose GET handler answers 404 for unknown paths.
 */
export function createRouter(
  config: ServerConfig
): (req: IncomingMessage, res: ServerResponse) => void {
  const root = byMethod({ GET: createListingHandler(config.serveDir) });
  const routes = new Map<string, Handler>([
    ["/", root],
    ["/upload", byMethod({ POST: createUploadHandler(config.outputDir) })],
    ["/download", byMethod({ GET: createDownloadHandler(config.serveDir) })],
  ]);

  return (req, res) => {
    const method = (req.method ?? "GET").toUpperCase();

    let url: URL;
    try {
      url = new URL(req.url ?? "/", "http://localhost");
    } catch (err) {
      console.error(`[${method} ${req.url}] Unparseable request URL:`, err);
      endWithStatus(res, 400);
      return;
    }

    const handler = routes.get(url.pathname) ?? root;
    handler(req, res, url).catch((err: unknown) => {
      console.error(`[${method} ${url.pathname}] Error:`, err);
      endWithStatus(res, 500);
    });
  };
}
