/**
 * Exposition parser — one sequential pass over a metrics document.
 *
 * The HELP/TYPE context is a single running pair for the whole pass: a
 * HELP line applies to every following sample until the next HELP line,
 * whatever metric it names. Interleaved documents can therefore attach
 * one metric's help text to another metric's samples.
 *
 * Metadata is recorded once per name, from the context active at that
 * name's first sample; later HELP/TYPE lines do not overwrite it.
 */

import type {
  MetricMeta,
  MetricSample,
  SkippedLine,
} from "@metrics-explorer/shared";
import { classifyLine } from "./line-classifier.js";
import { decodeSample } from "./sample-decoder.js";

export interface ParseResult {
  samples: readonly MetricSample[];
  metadata: ReadonlyMap<string, MetricMeta>;
  /** Lines that produced nothing, in document order */
  skipped: readonly SkippedLine[];
}

export function parseExposition(text: string): ParseResult {
  const samples: MetricSample[] = [];
  const metadata = new Map<string, MetricMeta>();
  const skipped: SkippedLine[] = [];

  let currentHelp = "";
  let currentType = "";

  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].endsWith("\r") ? lines[i].slice(0, -1) : lines[i];
    const classified = classifyLine(line);

    switch (classified.kind) {
      case "help":
        currentHelp = classified.text;
        break;
      case "type":
        currentType = classified.text;
        break;
      case "skip":
        break;
      case "malformed":
        skipped.push({ lineNumber: i + 1, reason: classified.reason, line });
        break;
      case "sample": {
        const decoded = decodeSample(classified.raw);
        if (!decoded.ok) {
          skipped.push({ lineNumber: i + 1, reason: decoded.reason, line });
          break;
        }

        samples.push(
          Object.freeze({
            name: decoded.name,
            value: decoded.value,
            labels: Object.freeze(decoded.labels),
            help: currentHelp,
          }),
        );

        if (!metadata.has(decoded.name)) {
          metadata.set(
            decoded.name,
            Object.freeze({ help: currentHelp, type: currentType }),
          );
        }
        break;
      }
    }
  }

  return {
    samples: Object.freeze(samples),
    metadata,
    skipped: Object.freeze(skipped),
  };
}
