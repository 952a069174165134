/**
 * Line classifier for the Prometheus text exposition format.
 *
 * Every line of a document falls into exactly one of:
 *   # HELP <name> <text>   -> "help"
 *   # TYPE <name> <type>   -> "type"
 *   other comments, blanks -> "skip"
 *   anything else          -> "sample" (decoded separately)
 */

import type { SkipReason } from "@metrics-explorer/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ClassifiedLine =
  | { kind: "help"; metricName: string; text: string }
  | { kind: "type"; metricName: string; text: string }
  | { kind: "sample"; raw: string }
  | { kind: "skip" }
  | { kind: "malformed"; reason: SkipReason };

const HELP_MARKER = "# HELP ";
const TYPE_MARKER = "# TYPE ";

// ---------------------------------------------------------------------------
// Classifier
// ---------------------------------------------------------------------------

/**
 * Split a HELP/TYPE payload on its first space. A payload without a space
 * (a bare name, or nothing at all) yields null.
 */
function splitDescriptor(payload: string): { metricName: string; text: string } | null {
  const spaceIdx = payload.indexOf(" ");
  if (spaceIdx <= 0) return null;
  return {
    metricName: payload.substring(0, spaceIdx),
    text: payload.substring(spaceIdx + 1),
  };
}

export function classifyLine(line: string): ClassifiedLine {
  if (line.startsWith(HELP_MARKER)) {
    const descriptor = splitDescriptor(line.substring(HELP_MARKER.length));
    if (!descriptor) return { kind: "malformed", reason: "malformed-help" };
    return { kind: "help", ...descriptor };
  }

  if (line.startsWith(TYPE_MARKER)) {
    const descriptor = splitDescriptor(line.substring(TYPE_MARKER.length));
    if (!descriptor) return { kind: "malformed", reason: "malformed-type" };
    return { kind: "type", ...descriptor };
  }

  if (line.startsWith("#") || !line.trim()) return { kind: "skip" };

  return { kind: "sample", raw: line };
}
