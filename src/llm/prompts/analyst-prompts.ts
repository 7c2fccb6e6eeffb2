import { ETHPriceMetrics, PricePoint } from "../../types";
import {
  formatSignedPct,
  formatUsd,
  formatUtcTimestamp,
} from "../../utils/format";

export const ANALYST_SYSTEM_PROMPT =
  "You are a cryptocurrency market analyst focusing on Ethereum (ETH). " +
  "Analyse short-term momentum, key levels, and potential catalysts without giving investment advice.";

/**
 * One bullet per observation, e.g.
 * `- 2024-01-01T19:00:00+00:00 UTC: $1,990.00`
 */
export function formatRecentPrices(points: readonly PricePoint[]): string {
  return points
    .map(
      point =>
        `- ${formatUtcTimestamp(point.timestamp)} UTC: ${formatUsd(point.price)}`
    )
    .join("\n");
}

export function buildAnalystUserPrompt(
  metrics: ETHPriceMetrics,
  recentPoints: readonly PricePoint[]
): string {
  return `Provide a concise analysis of ETH price action based on the following metrics and recent prices.
Current price: ${formatUsd(metrics.currentPrice)}
1h change: ${formatSignedPct(metrics.hourlyChangePct)}
24h change: ${formatSignedPct(metrics.dailyChangePct)}
24h high: ${formatUsd(metrics.high24h)}
24h low: ${formatUsd(metrics.low24h)}
Recent prices:
${formatRecentPrices(recentPoints)}
Explain momentum, volatility, and notable support/resistance zones.`;
}
