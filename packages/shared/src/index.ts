export type {
  MetricLabels,
  MetricSample,
  MetricMeta,
  SkipReason,
  SkippedLine,
  SearchResult,
  MetricValue,
  MetricDetails,
  IndexStats,
  WireValue,
  GroupsResponse,
  SearchResponse,
  NamesResponse,
  DetailsResponse,
  RefreshResponse,
} from "./types/metrics.js";
