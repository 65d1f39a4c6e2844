import path from "path";
import { parseArgs } from "util";
import type { ServerConfig } from "./types.js";

const DEFAULT_PORT = 6600;
const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_DIR = ".";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function parsePort(raw: string): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65_535) {
    throw new ConfigError(`Invalid port "${raw}", expected an integer in 1-65535`);
  }
  return parsed;
}

function nonEmpty(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build the server config from command-line flags, then FILEDROP_*
 * environment variables, then defaults.
 *
 *   -p, --port    FILEDROP_PORT        (6600)
 *   -o, --output  FILEDROP_OUTPUT_DIR  (.)
 *   -s, --serve   FILEDROP_SERVE_DIR   (.)
 *       --host    FILEDROP_HOST        (0.0.0.0)
 */
export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  let values: { port?: string; output?: string; serve?: string; host?: string };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        port: { type: "string", short: "p" },
        output: { type: "string", short: "o" },
        serve: { type: "string", short: "s" },
        host: { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }

  const rawPort = nonEmpty(values.port) ?? nonEmpty(env.FILEDROP_PORT);

  return {
    port: rawPort === undefined ? DEFAULT_PORT : parsePort(rawPort),
    host: nonEmpty(values.host) ?? nonEmpty(env.FILEDROP_HOST) ?? DEFAULT_HOST,
    outputDir: path.resolve(
      nonEmpty(values.output) ?? nonEmpty(env.FILEDROP_OUTPUT_DIR) ?? DEFAULT_DIR
    ),
    serveDir: path.resolve(
      nonEmpty(values.serve) ?? nonEmpty(env.FILEDROP_SERVE_DIR) ?? DEFAULT_DIR
    ),
  };
}
