/**
 * Runtime configuration, read from the environment in one place.
 *
 *   EXPORTER_HOST      exporter host (default: localhost)
 *   EXPORTER_PORT      exporter port (default: 9100, node_exporter)
 *   SCRAPE_TIMEOUT_MS  fetch timeout (default: 5000)
 *   HOST / PORT        API listen address (default: 0.0.0.0:3000)
 *   CORS_ORIGIN        allowed origin for browser front ends
 *   NODE_ENV           "production" switches logging to plain JSON
 */

import { DEFAULT_TIMEOUT_MS } from "./metrics/exporter-scraper.js";

export interface ExplorerConfig {
  exporterHost: string;
  exporterPort: number;
  scrapeTimeoutMs: number;
  host: string;
  port: number;
  corsOrigin: string | undefined;
  isDev: boolean;
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExplorerConfig {
  return {
    exporterHost: env.EXPORTER_HOST || "localhost",
    exporterPort: intFromEnv(env.EXPORTER_PORT, 9100),
    scrapeTimeoutMs: intFromEnv(env.SCRAPE_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    host: env.HOST || "0.0.0.0",
    port: intFromEnv(env.PORT, 3000),
    corsOrigin: env.CORS_ORIGIN || undefined,
    isDev: env.NODE_ENV !== "production",
  };
}
