import type { IncomingMessage, RequestListener, ServerResponse } from "http";
import { createRouter } from "./router.js";
import type { ServerConfig } from "./lib/types.js";

/** Log every request before it is dispatched, and its outcome once sent. */
export function withRequestLog(
  listener: (req: IncomingMessage, res: ServerResponse) => void
): RequestListener {
  return (req, res) => {
    const start = Date.now();
    console.log(`${new Date(start).toISOString()} ${req.method} ${req.url}`);
    res.on("finish", () => {
      const ms = Date.now() - start;
      console.log(`${req.method} ${req.url} → ${res.statusCode} (${ms}ms)`);
    });
    listener(req, res);
  };
}

export function createApp(config: ServerConfig): RequestListener {
  return withRequestLog(createRouter(config));
}
