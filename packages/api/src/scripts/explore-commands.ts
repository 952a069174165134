/**
 * Plain-text rendering and name completion for the explore CLI.
 *
 * Renderers return lines instead of printing so they can be tested
 * without capturing stdout.
 */

import type { MetricDetails, SearchResult } from "@metrics-explorer/shared";
import { formatLabels, formatSampleValue } from "../exposition/index.js";

// ---------------------------------------------------------------------------
// Completion
// ---------------------------------------------------------------------------

export type CompleterResult = [string[], string];

/**
 * Readline completer over metric names. Names are only offered while a
 * prompt runs inside `during()`; every other prompt completes nothing.
 */
export function createNameCompleter() {
  let names: string[] = [];

  return {
    complete(line: string): CompleterResult {
      const lower = line.toLowerCase();
      const hits = names.filter((n) => n.toLowerCase().startsWith(lower));
      return [hits.length > 0 ? hits : names, line];
    },

    async during<T>(list: string[], prompt: () => Promise<T>): Promise<T> {
      names = list;
      try {
        return await prompt();
      } finally {
        names = [];
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

const HELP_PREVIEW_LENGTH = 100;

export function truncateHelp(help: string, max = HELP_PREVIEW_LENGTH): string {
  return help.length > max ? `${help.slice(0, max)}...` : help;
}

/** Grid table: `+---+` borders, `=` under the header row */
export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, col) =>
    Math.max(h.length, ...rows.map((r) => (r[col] ?? "").length)),
  );

  const border = (fill: string) =>
    `+${widths.map((w) => fill.repeat(w + 2)).join("+")}+`;
  const row = (cells: string[]) =>
    `|${widths.map((w, col) => ` ${(cells[col] ?? "").padEnd(w)} `).join("|")}|`;

  const lines = [border("-"), row(headers), border("=")];
  for (const r of rows) {
    lines.push(row(r), border("-"));
  }
  return lines;
}

export function renderGroups(groups: Map<string, string[]>): string[] {
  const lines: string[] = [];
  for (const [prefix, names] of groups) {
    lines.push("", `${prefix}:`);
    for (const name of names) lines.push(`  - ${name}`);
  }
  return lines;
}

export function renderSearch(results: SearchResult[]): string[] {
  if (results.length === 0) return ["No results found"];
  return [
    "",
    "Search results:",
    ...renderTable(
      ["Metric", "Description"],
      results.map((r) => [r.name, truncateHelp(r.help)]),
    ),
  ];
}

export function renderDetails(details: MetricDetails): string[] {
  const lines = ["", `Details for metric: ${details.name}`, "-".repeat(50)];

  if (details.type !== null) lines.push(`Type: ${details.type}`);
  if (details.help !== null) lines.push(`Help: ${details.help}`);

  lines.push("", "Current values:");
  if (details.values.length === 0) {
    lines.push("No current values found");
    return lines;
  }

  for (const { value, labels } of details.values) {
    const labelText = formatLabels(labels);
    lines.push(
      labelText
        ? `Value: ${formatSampleValue(value)} (Labels: ${labelText})`
        : `Value: ${formatSampleValue(value)}`,
    );
  }
  return lines;
}
