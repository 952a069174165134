/**
 * Metrics Module
 *
 * Fetches exporter output and keeps the parsed snapshot that the API
 * routes and the CLI query.
 */

export { MetricsExplorer } from "./metrics-explorer.js";
export type {
  ExplorerLogger,
  ExplorerSnapshot,
  MetricsExplorerOptions,
} from "./metrics-explorer.js";
export {
  ScrapeError,
  scrapeExporter,
  exporterMetricsUrl,
  DEFAULT_TIMEOUT_MS,
} from "./exporter-scraper.js";
export type { ExporterTarget } from "./exporter-scraper.js";
