import { ETHAnalysisResult } from "../types";
import { MarketDataSource } from "../market/price-source";
import { GenerationProvider } from "../llm/providers/provider";
import { SummaryGenerator } from "../llm/summary-generator";
import { logger } from "../utils/logger";
import { MetricsCalculator } from "./metrics-calculator";

export interface ETHPriceAnalyzerOptions {
  dataSource: MarketDataSource;
  /** `null` runs the analyzer offline. */
  provider: GenerationProvider | null;
  model?: string;
  /** Number of trailing observations shown to the model, default 6. */
  recentWindow?: number;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Fetches ETH prices, derives metrics and explains them.
 * Either returns a complete result or throws; never a partial result.
 */
export class ETHPriceAnalyzer {
  private dataSource: MarketDataSource;
  private summaryGenerator: SummaryGenerator;
  private recentWindow: number;

  constructor(options: ETHPriceAnalyzerOptions) {
    this.dataSource = options.dataSource;
    this.recentWindow = Math.max(1, options.recentWindow ?? 6);
    this.summaryGenerator = new SummaryGenerator({
      provider: options.provider,
      model: options.model ?? "gpt-4o-mini",
      temperature: options.temperature,
      maxTokens: options.maxTokens,
    });
  }

  public async analyze(): Promise<ETHAnalysisResult> {
    const points = await this.dataSource.fetchPricePoints();
    logger.debug(`[Analyzer] ${points.length} price points from ${this.dataSource.name}`);

    // Throws InsufficientDataError below two points
    const metrics = MetricsCalculator.calculate(points);

    const recentPoints = points.slice(-this.recentWindow);
    const summary = await this.summaryGenerator.summarize(metrics, recentPoints);

    logger.info(
      `[Analyzer] ETH ${metrics.currentPrice.toFixed(2)} (24h ${metrics.dailyChangePct.toFixed(2)}%), summary via ${summary.source}`
    );

    return {
      metrics,
      summary: summary.text,
      summarySource: summary.source,
    };
  }
}
