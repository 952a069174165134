/**
 * Metric Index — an immutable snapshot of one parsed document with the
 * queries the explorer front ends need (prefix groups, search, details).
 *
 * All queries are total: unknown names and empty snapshots produce empty
 * results rather than errors.
 */

import type {
  IndexStats,
  MetricDetails,
  MetricMeta,
  MetricSample,
  SearchResult,
  SkippedLine,
} from "@metrics-explorer/shared";
import { parseExposition, type ParseResult } from "./exposition-parser.js";

/** Leading `_`-separated token of a metric name */
export function metricPrefix(name: string): string {
  const idx = name.indexOf("_");
  return idx === -1 ? name : name.substring(0, idx);
}

export class MetricIndex {
  readonly samples: readonly MetricSample[];
  readonly skipped: readonly SkippedLine[];
  private readonly metadata: ReadonlyMap<string, MetricMeta>;

  constructor(result: ParseResult) {
    this.samples = result.samples;
    this.skipped = result.skipped;
    this.metadata = result.metadata;
  }

  static fromText(text: string): MetricIndex {
    return new MetricIndex(parseExposition(text));
  }

  static empty(): MetricIndex {
    return new MetricIndex({ samples: [], metadata: new Map(), skipped: [] });
  }

  get stats(): IndexStats {
    return {
      samples: this.samples.length,
      metrics: this.metadata.size,
      skipped: this.skipped.length,
    };
  }

  /**
   * Distinct metric names bucketed by prefix. Groups and the names within
   * them keep first-seen order.
   */
  groupByPrefix(): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    const seen = new Set<string>();

    for (const { name } of this.samples) {
      if (seen.has(name)) continue;
      seen.add(name);

      const prefix = metricPrefix(name);
      const group = groups.get(prefix);
      if (group) group.push(name);
      else groups.set(prefix, [name]);
    }

    return groups;
  }

  /**
   * Case-insensitive substring search over each sample's name and help
   * text. One result per name, taken from its first matching sample.
   */
  search(term: string): SearchResult[] {
    const needle = term.toLowerCase();
    const results: SearchResult[] = [];
    const seen = new Set<string>();

    for (const sample of this.samples) {
      if (seen.has(sample.name)) continue;
      if (
        !sample.name.toLowerCase().includes(needle) &&
        !sample.help.toLowerCase().includes(needle)
      ) {
        continue;
      }
      seen.add(sample.name);
      results.push({ name: sample.name, help: sample.help, value: sample.value });
    }

    return results;
  }

  details(name: string): MetricDetails {
    const meta = this.metadata.get(name);
    return {
      name,
      type: meta ? meta.type : null,
      help: meta ? meta.help : null,
      values: this.samples
        .filter((s) => s.name === name)
        .map((s) => ({ value: s.value, labels: s.labels })),
    };
  }

  /** Distinct names, sorted (used for completion) */
  names(): string[] {
    return [...new Set(this.samples.map((s) => s.name))].sort();
  }
}
