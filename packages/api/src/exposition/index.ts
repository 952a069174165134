/**
 * Exposition Module
 *
 * Parses Prometheus text exposition documents and indexes the result for
 * grouping, search and detail queries. Pure and synchronous; the fetch
 * lives in ../metrics.
 */

export { classifyLine } from "./line-classifier.js";
export type { ClassifiedLine } from "./line-classifier.js";
export { decodeSample, parseLabels, parseSampleValue } from "./sample-decoder.js";
export type { DecodeResult } from "./sample-decoder.js";
export { encodeSample, formatLabels, formatSampleValue } from "./sample-encoder.js";
export { parseExposition } from "./exposition-parser.js";
export type { ParseResult } from "./exposition-parser.js";
export { MetricIndex, metricPrefix } from "./metric-index.js";
