/**
 * Core type definitions for the ETH commentary pipeline
 */

export interface PricePoint {
  readonly timestamp: Date;
  readonly price: number;
}

export interface ETHPriceMetrics {
  readonly currentPrice: number;
  readonly hourlyChangePct: number;
  readonly dailyChangePct: number;
  readonly high24h: number;
  readonly low24h: number;
}

/**
 * Which path produced a summary: the language model, or the deterministic
 * fallback (no provider configured / provider rate-limited).
 */
export type SummarySource = "llm" | "offline" | "rate_limit";

export interface ETHAnalysisResult {
  readonly metrics: ETHPriceMetrics;
  readonly summary: string;
  readonly summarySource: SummarySource;
}

export interface GenerationConfig {
  model: string;
  temperature: number;
  maxTokens?: number;
}

export type RewriteStyle = "professional" | "casual" | "concise" | "friendly";

export interface RewriteRequest {
  text: string;
  style?: string;
  extraInstructions?: string;
}
