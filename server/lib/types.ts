import type { IncomingMessage, ServerResponse } from "http";

/** Startup settings, fixed for the lifetime of the process. */
export interface ServerConfig {
  port: number;
  host: string;
  /** Absolute directory exposed for listing and download. */
  serveDir: string;
  /** Absolute directory that receives uploads. */
  outputDir: string;
}

/** One row of a directory listing page. */
export interface FileEntry {
  url: string;
  name: string;
  type: "" | "<DIR>";
}

/** A request handler. `url` is the parsed request URL. */
export type Handler = (
  req: IncomingMessage,
  res: ServerResponse,
  url: URL
) => Promise<void>;

export interface ByMethod {
  GET?: Handler;
  POST?: Handler;
}
