#!/usr/bin/env node
import { createServer } from "http";
import { mkdirSync } from "fs";
import { createApp } from "./app.js";
import { ConfigError, loadConfig } from "./lib/config.js";
import type { ServerConfig } from "./lib/types.js";

let config: ServerConfig;
try {
  config = loadConfig();
} catch (err) {
  if (!(err instanceof ConfigError)) throw err;
  console.error(`filedrop: ${err.message}`);
  console.error("usage: filedrop [-p port] [-o outputDir] [-s serveDir] [--host host]");
  process.exit(1);
}

mkdirSync(config.outputDir, { recursive: true });

const server = createServer(createApp(config));

server.listen(config.port, config.host, () => {
  console.log(`filedrop listening on http://${config.host}:${config.port}`);
  console.log(`Serving ${config.serveDir}, uploads go to ${config.outputDir}`);
});
