/**
 * Types for parsed Prometheus exposition data and the explorer API.
 *
 * The core (parser + index) produces the first group; the HTTP API wraps
 * them in the response envelopes at the bottom of this file.
 */

// ---------------------------------------------------------------------------
// Parsed data
// ---------------------------------------------------------------------------

/** Label set of a sample (keys unique) */
export type MetricLabels = Record<string, string>;

/** One decoded sample line */
export interface MetricSample {
  name: string;
  value: number;
  labels: MetricLabels;
  /** HELP text that was active when this line was parsed */
  help: string;
}

/** HELP/TYPE pair recorded the first time a metric name was seen */
export interface MetricMeta {
  help: string;
  /** TYPE token (counter, gauge, ...) or "" if none preceded the sample */
  type: string;
}

/** Why a line produced no sample */
export type SkipReason =
  | "malformed-help"
  | "malformed-type"
  | "bad-value-separator"
  | "empty-name"
  | "unterminated-labels"
  | "malformed-labels"
  | "bad-value";

export interface SkippedLine {
  /** 1-based line number in the source text */
  lineNumber: number;
  reason: SkipReason;
  line: string;
}

// ---------------------------------------------------------------------------
// Query results
// ---------------------------------------------------------------------------

export interface SearchResult {
  name: string;
  help: string;
  /** Value of the first matching sample for this name */
  value: number;
}

export interface MetricValue {
  value: number;
  labels: MetricLabels;
}

export interface MetricDetails {
  name: string;
  /** null when the name has no metadata entry */
  type: string | null;
  help: string | null;
  values: MetricValue[];
}

export interface IndexStats {
  samples: number;
  metrics: number;
  skipped: number;
}

// ---------------------------------------------------------------------------
// API response envelopes
// ---------------------------------------------------------------------------

/**
 * Sample values travel as strings in exposition notation ("+Inf", "NaN")
 * because JSON cannot carry non-finite numbers.
 */
export type WireValue = string;

export interface GroupsResponse {
  groups: Record<string, string[]>;
}

export interface SearchResponse {
  term: string;
  results: Array<Omit<SearchResult, "value"> & { value: WireValue }>;
}

export interface NamesResponse {
  names: string[];
}

export interface DetailsResponse extends Omit<MetricDetails, "values"> {
  values: Array<{ value: WireValue; labels: MetricLabels }>;
}

export interface RefreshResponse {
  stats: IndexStats;
  /** ISO 8601 timestamp */
  fetchedAt: string;
}
