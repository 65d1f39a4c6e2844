import type { ServerResponse } from "http";

/** End the response with a bare status and no body. */
export function endWithStatus(res: ServerResponse, status: number): void {
  if (!res.headersSent) {
    res.writeHead(status, { "Content-Length": "0" });
  }
  res.end();
}
