/**
 * Metrics Explorer — owns the current snapshot of an exporter's metrics.
 *
 * The first query fetches and parses the exporter output; later queries
 * reuse that snapshot until `refresh()` is called. Snapshots are never
 * mutated, so a refresh can run while requests are still reading the
 * previous one. Concurrent callers share one in-flight fetch.
 *
 * Like the scraper, this is independent of the web framework; the HTTP
 * routes and the CLI both drive it.
 */

import type { FastifyBaseLogger } from "fastify";
import type { MetricDetails, SearchResult } from "@metrics-explorer/shared";
import { MetricIndex } from "../exposition/metric-index.js";
import { DEFAULT_TIMEOUT_MS, scrapeExporter } from "./exporter-scraper.js";

/** The slice of Fastify's pino logger the explorer writes to */
export type ExplorerLogger = Pick<FastifyBaseLogger, "info" | "debug">;

export interface ExplorerSnapshot {
  index: MetricIndex;
  fetchedAt: Date;
}

export interface MetricsExplorerOptions {
  /** Full URL of the exporter's metrics endpoint */
  metricsUrl: string;
  /** Per-fetch timeout in ms (default: 5000) */
  timeoutMs?: number;
  /** Receives one line per snapshot built (optional) */
  logger?: ExplorerLogger;
}

export class MetricsExplorer {
  readonly metricsUrl: string;
  private timeoutMs: number;
  private logger: ExplorerLogger | null;
  private current: ExplorerSnapshot | null = null;
  private inflight: Promise<ExplorerSnapshot> | null = null;

  constructor(options: MetricsExplorerOptions) {
    this.metricsUrl = options.metricsUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? null;
  }

  /** Whether a snapshot has been loaded yet */
  get isLoaded(): boolean {
    return this.current !== null;
  }

  /** Current snapshot, fetching one on first use */
  async snapshot(): Promise<ExplorerSnapshot> {
    return this.current ?? this.refresh();
  }

  /**
   * Fetch and parse a new snapshot. On failure the previous snapshot (if
   * any) stays current and the ScrapeError propagates.
   */
  refresh(): Promise<ExplorerSnapshot> {
    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  async listGroups(): Promise<Map<string, string[]>> {
    const { index } = await this.snapshot();
    return index.groupByPrefix();
  }

  async search(term: string): Promise<SearchResult[]> {
    const { index } = await this.snapshot();
    return index.search(term);
  }

  async details(name: string): Promise<MetricDetails> {
    const { index } = await this.snapshot();
    return index.details(name);
  }

  async names(): Promise<string[]> {
    const { index } = await this.snapshot();
    return index.names();
  }

  private async load(): Promise<ExplorerSnapshot> {
    const text = await scrapeExporter(this.metricsUrl, this.timeoutMs);
    const snapshot: ExplorerSnapshot = {
      index: MetricIndex.fromText(text),
      fetchedAt: new Date(),
    };
    this.current = snapshot;

    this.logger?.info(
      { url: this.metricsUrl, ...snapshot.index.stats },
      "metrics snapshot loaded",
    );
    if (snapshot.index.skipped.length > 0) {
      this.logger?.debug(
        { skipped: snapshot.index.skipped.slice(0, 20) },
        "skipped unparseable exposition lines",
      );
    }
    return snapshot;
  }
}
