/**
 * Exporter scraper.
 *
 * Fetches the `/metrics` endpoint of a Prometheus exporter (node_exporter by
 * default) and returns the raw exposition text. Every transport problem,
 * including a non-2xx status, surfaces as a single `ScrapeError`.
 */

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ScrapeError extends Error {
  constructor(
    public url: string,
    message: string,
    public status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ScrapeError";
  }
}

// ---------------------------------------------------------------------------
// Scraper
// ---------------------------------------------------------------------------

export interface ExporterTarget {
  host: string;
  port: number;
}

export const DEFAULT_TIMEOUT_MS = 5_000;

/** http://host:port/metrics (IPv6 hosts get brackets) */
export function exporterMetricsUrl({ host, port }: ExporterTarget): string {
  const hostPart = host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
  return `http://${hostPart}:${port}/metrics`;
}

function transportError(metricsUrl: string, err: unknown): ScrapeError {
  const reason = err instanceof Error ? err.message : String(err);
  return new ScrapeError(metricsUrl, `Failed to fetch ${metricsUrl}: ${reason}`, undefined, {
    cause: err,
  });
}

export async function scrapeExporter(
  metricsUrl: string,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<string> {
  let res: Response;
  try {
    res = await fetch(metricsUrl, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    throw transportError(metricsUrl, err);
  }

  if (!res.ok) {
    throw new ScrapeError(
      metricsUrl,
      `Failed to fetch ${metricsUrl}: HTTP ${res.status}`,
      res.status,
    );
  }

  try {
    return await res.text();
  } catch (err) {
    throw transportError(metricsUrl, err);
  }
}
