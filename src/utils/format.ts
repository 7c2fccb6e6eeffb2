const usdFormatter = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** `2040` -> `$2,040.00` */
export function formatUsd(value: number): string {
  return `$${usdFormatter.format(value)}`;
}

/** `0.4926` -> `+0.49%` */
export function formatSignedPct(value: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(2)}%`;
}

/**
 * `2024-01-01T19:00:00.000Z` -> `2024-01-01T19:00:00+00:00`,
 * `2024-01-01T19:00:00.123Z` -> `2024-01-01T19:00:00.123000+00:00`
 */
export function formatUtcTimestamp(date: Date): string {
  const iso = date.toISOString();
  if (date.getUTCMilliseconds() === 0) {
    return iso.replace(/\.\d{3}Z$/, "+00:00");
  }
  return iso.replace(/Z$/, "000+00:00");
}
