import type { MetricLabels } from "@metrics-explorer/shared";

/** Render a value the way the exposition format writes it */
export function formatSampleValue(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "+Inf";
  if (value === -Infinity) return "-Inf";
  if (Object.is(value, -0)) return "-0";
  return String(value);
}

function escapeLabelValue(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n");
}

/** `{a="1",b="2"}`, or "" for an empty label set */
export function formatLabels(labels: MetricLabels): string {
  const pairs = Object.entries(labels).map(
    ([key, value]) => `${key}="${escapeLabelValue(value)}"`,
  );
  return pairs.length > 0 ? `{${pairs.join(",")}}` : "";
}

/** Inverse of `decodeSample` */
export function encodeSample(sample: {
  name: string;
  labels: MetricLabels;
  value: number;
}): string {
  return `${sample.name}${formatLabels(sample.labels)} ${formatSampleValue(sample.value)}`;
}
