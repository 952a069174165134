/**
 * Sample decoder — turns one exposition sample line into
 * (name, labels, value), or reports why the line cannot be used.
 *
 * Accepted shapes:
 *   metric_name 42
 *   metric_name{label="val",other="x"} 1.5e+09
 *
 * Decoding never throws; bad lines come back as `{ ok: false, reason }`.
 */

import type { MetricLabels, SkipReason } from "@metrics-explorer/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DecodeResult =
  | { ok: true; name: string; labels: MetricLabels; value: number }
  | { ok: false; reason: SkipReason };

function fail(reason: SkipReason): DecodeResult {
  return { ok: false, reason };
}

// ---------------------------------------------------------------------------
// Value
// ---------------------------------------------------------------------------

const FLOAT_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a sample value token. Besides plain decimals this accepts
 * Inf/+Inf/-Inf/Infinity and NaN in any case. Returns null for anything
 * else (including the empty string, which `Number()` would read as 0).
 */
export function parseSampleValue(token: string): number | null {
  if (FLOAT_RE.test(token)) return Number(token);

  const lower = token.toLowerCase();
  const unsigned = lower.replace(/^[+-]/, "");
  if (unsigned === "inf" || unsigned === "infinity") {
    return lower.startsWith("-") ? -Infinity : Infinity;
  }
  if (unsigned === "nan") return NaN;
  return null;
}

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

const KEY_CHAR_RE = /\w/;

function isBlank(ch: string | undefined): boolean {
  return ch === " " || ch === "\t";
}

/**
 * Tokenize the text between the braces: `key="value"` pairs separated by
 * commas, optional whitespace around separators, optional trailing comma.
 * Inside values `\\`, `\"` and `\n` are unescaped; any other backslash is
 * kept as written. Returns null on any other syntax.
 */
export function parseLabels(block: string): MetricLabels | null {
  const pairs = new Map<string, string>();
  let pos = 0;

  const skipBlanks = () => {
    while (pos < block.length && isBlank(block[pos])) pos++;
  };

  skipBlanks();
  while (pos < block.length) {
    const keyStart = pos;
    while (pos < block.length && KEY_CHAR_RE.test(block[pos])) pos++;
    if (pos === keyStart) return null;
    const key = block.substring(keyStart, pos);

    if (block[pos] !== "=" || block[pos + 1] !== '"') return null;
    pos += 2;

    let value = "";
    let closed = false;
    while (pos < block.length) {
      const ch = block[pos];
      if (ch === "\\" && pos + 1 < block.length) {
        const next = block[pos + 1];
        if (next === "n") value += "\n";
        else if (next === "\\" || next === '"') value += next;
        else value += ch + next;
        pos += 2;
        continue;
      }
      pos++;
      if (ch === '"') {
        closed = true;
        break;
      }
      value += ch;
    }
    if (!closed) return null;

    // Duplicate keys: last one wins
    pairs.set(key, value);

    skipBlanks();
    if (pos < block.length) {
      if (block[pos] !== ",") return null;
      pos++;
      skipBlanks();
    }
  }

  // fromEntries defines own properties, so a "__proto__" label survives
  return Object.fromEntries(pairs);
}

// ---------------------------------------------------------------------------
// Line
// ---------------------------------------------------------------------------

/**
 * Decode a sample line. The name/label part and the value must be
 * separated by exactly one space; a trailing timestamp is rejected.
 * The label block runs from the first `{` to the last `}` of the line.
 */
export function decodeSample(raw: string): DecodeResult {
  const braceIdx = raw.indexOf("{");
  let name: string;
  let labelBlock = "";
  let valueToken: string;

  if (braceIdx === -1) {
    const tokens = raw.split(" ");
    if (tokens.length !== 2) return fail("bad-value-separator");
    [name, valueToken] = tokens;
  } else {
    const closeIdx = raw.lastIndexOf("}");
    if (closeIdx < braceIdx) return fail("unterminated-labels");

    name = raw.substring(0, braceIdx);
    labelBlock = raw.substring(braceIdx + 1, closeIdx);

    const rest = raw.substring(closeIdx + 1);
    if (!rest.startsWith(" ")) return fail("bad-value-separator");
    valueToken = rest.substring(1);
    if (name.includes(" ") || valueToken.includes(" ")) {
      return fail("bad-value-separator");
    }
  }

  if (!name) return fail("empty-name");

  const labels = parseLabels(labelBlock);
  if (!labels) return fail("malformed-labels");

  const value = parseSampleValue(valueToken);
  if (value === null) return fail("bad-value");

  return { ok: true, name, labels, value };
}
