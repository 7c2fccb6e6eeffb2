import { ETHPriceMetrics, PricePoint } from "../types";
import { formatRecentPrices } from "../llm/prompts/analyst-prompts";
import { formatSignedPct, formatUsd } from "../utils/format";
import { MetricsCalculator } from "./metrics-calculator";

export type FallbackReason = "offline" | "rate_limit";

export interface FallbackSummaryInput {
  metrics: ETHPriceMetrics;
  recentPoints: readonly PricePoint[];
  reason: FallbackReason;
  errorMessage?: string;
}

const HEADLINES: Record<FallbackReason, string> = {
  offline: "ETH market summary (offline: no language model configured)",
  rate_limit:
    "ETH market summary (rate limited: language model quota exhausted)",
};

const OPERATOR_NOTES: Record<FallbackReason, string> = {
  offline:
    "Note: set LLM_API_KEY and LLM_PROVIDER=openai to enable generated commentary.",
  rate_limit:
    "Note: the provider rejected the request for rate or quota reasons. Retry later, lower the request frequency, or check the account's usage limits.",
};

/**
 * Deterministic plain-text summary used when no generated commentary is
 * available. Performs no I/O.
 */
export function buildFallbackSummary(input: FallbackSummaryInput): string {
  const { metrics, recentPoints, reason, errorMessage } = input;

  const hourlyDirection = metrics.hourlyChangePct >= 0 ? "up" : "down";
  const dailyDirection = metrics.dailyChangePct >= 0 ? "higher" : "lower";
  const hourlyMagnitude = Math.abs(metrics.hourlyChangePct).toFixed(2);
  const dailyMagnitude = Math.abs(metrics.dailyChangePct).toFixed(2);
  const spread = MetricsCalculator.rangeSpreadPct(metrics).toFixed(2);

  const lines = [
    HEADLINES[reason],
    OPERATOR_NOTES[reason],
    "",
    `ETH is ${hourlyDirection} ${hourlyMagnitude}% over the last hour and ${dailyMagnitude}% ${dailyDirection} over the last 24 hours.`,
    "Key stats:",
    `- Current price: ${formatUsd(metrics.currentPrice)}`,
    `- 1h change: ${formatSignedPct(metrics.hourlyChangePct)}`,
    `- 24h change: ${formatSignedPct(metrics.dailyChangePct)}`,
    `- 24h high: ${formatUsd(metrics.high24h)}`,
    `- 24h low: ${formatUsd(metrics.low24h)}`,
    `- 24h range spread: ${spread}%`,
    "",
    "Recent prices:",
    formatRecentPrices(recentPoints),
  ];

  if (errorMessage) {
    lines.push("", `Provider error: ${errorMessage}`);
  }

  return lines.join("\n");
}
