import { ETHPriceMetrics, GenerationConfig, PricePoint, SummarySource } from "../types";
import { logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import { buildFallbackSummary } from "../analysis/fallback-summary";
import { classifyProviderError } from "./error-classifier";
import { GenerationProvider } from "./providers/provider";
import {
  ANALYST_SYSTEM_PROMPT,
  buildAnalystUserPrompt,
} from "./prompts/analyst-prompts";

export interface SummaryOutcome {
  text: string;
  source: SummarySource;
}

export interface SummaryGeneratorOptions {
  /** `null` means offline mode: only fallback summaries are produced. */
  provider: GenerationProvider | null;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Turns metrics into commentary through the provider, falling back to a
 * deterministic summary when there is no provider or it is rate-limited.
 * Any other provider failure propagates.
 */
export class SummaryGenerator {
  private provider: GenerationProvider | null;
  private generationConfig: GenerationConfig;

  constructor(options: SummaryGeneratorOptions) {
    this.provider = options.provider;
    this.generationConfig = {
      model: options.model,
      temperature: options.temperature ?? 0.3,
      maxTokens: options.maxTokens ?? 400,
    };
  }

  public async summarize(
    metrics: ETHPriceMetrics,
    recentPoints: readonly PricePoint[]
  ): Promise<SummaryOutcome> {
    if (!this.provider) {
      return {
        text: buildFallbackSummary({ metrics, recentPoints, reason: "offline" }),
        source: "offline",
      };
    }

    const userPrompt = buildAnalystUserPrompt(metrics, recentPoints);

    try {
      const text = await this.provider.generate(
        ANALYST_SYSTEM_PROMPT,
        userPrompt,
        this.generationConfig
      );
      return { text, source: "llm" };
    } catch (error) {
      if (classifyProviderError(error) !== "rate_limited") {
        throw error;
      }

      const message = errorMessage(error);
      logger.warn(
        `[Summary] ${this.provider.name} rate limited, using fallback summary: ${message}`
      );
      return {
        text: buildFallbackSummary({
          metrics,
          recentPoints,
          reason: "rate_limit",
          errorMessage: message,
        }),
        source: "rate_limit",
      };
    }
  }
}
