import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { log } from "./logging/index.ts";
import { DEFAULT_PAGE_SIZE, DEFAULT_RECENT_LIMIT, DEFAULT_RECENT_TTL_SECONDS } from "./constants.ts";

export interface Config {
  filesPath: string;
  port: number;
  pageSize: number;
  recentLimit: number;
  recentTtlSeconds: number;
  watch: boolean;
  devMode: boolean;
  logLevel: string;
  /** XSLT served at /opds_to_html.xslt for viewing feeds in a browser */
  stylesheetPath: string;
}

export const DEFAULT_STYLESHEET_PATH = fileURLToPath(new URL("../static/opds_to_html.xslt", import.meta.url));

function requireEnv(name: string, defaultValue?: string): string {
  const value = process.env[name] || defaultValue;
  if (!value) {
    log.error("Config", `Missing required environment variable: ${name}`);
    process.exit(1);
  }
  return value;
}

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    log.error("Config", `Invalid PORT: ${value} (must be 1-65535)`);
    process.exit(1);
  }
  return port;
}

function parsePositiveInt(name: string, value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    log.error("Config", `Invalid ${name}: ${value} (must be a positive integer)`);
    process.exit(1);
  }
  return parsed;
}

export function loadConfig(): Config {
  return {
    filesPath: resolve(requireEnv("FILES", "./books")),
    port: parsePort(process.env.PORT || "8080"),
    pageSize: parsePositiveInt("PAGE_SIZE", process.env.PAGE_SIZE || String(DEFAULT_PAGE_SIZE)),
    recentLimit: parsePositiveInt("RECENT_LIMIT", process.env.RECENT_LIMIT || String(DEFAULT_RECENT_LIMIT)),
    recentTtlSeconds: parsePositiveInt(
      "RECENT_CACHE_TTL",
      process.env.RECENT_CACHE_TTL || String(DEFAULT_RECENT_TTL_SECONDS),
    ),
    watch: process.env.WATCH === "true",
    devMode: process.env.DEV_MODE === "true",
    logLevel: process.env.LOG_LEVEL || "info",
    stylesheetPath: resolve(process.env.STYLESHEET || DEFAULT_STYLESHEET_PATH),
  };
}
