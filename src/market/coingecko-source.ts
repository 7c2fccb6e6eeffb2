import { z } from "zod";
import { PricePoint } from "../types";
import { DataUnavailableError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { MarketDataSource, MIN_PRICE_POINTS } from "./price-source";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface CoinGeckoSourceOptions {
  days?: number;
  interval?: string;
  baseUrl?: string;
  timeoutMs?: number;
  apiKey?: string;
  fetchFn?: FetchLike;
}

const MarketChartSchema = z.object({
  prices: z.array(z.array(z.number())).default([]),
});

/**
 * ETH/USD prices from CoinGecko's public `market_chart` endpoint.
 */
export class CoinGeckoETHDataSource implements MarketDataSource {
  public readonly name = "coingecko";
  private days: number;
  private interval: string;
  private baseUrl: string;
  private timeoutMs: number;
  private apiKey?: string;
  private fetchFn: FetchLike;

  constructor(options: CoinGeckoSourceOptions = {}) {
    this.days = options.days ?? 1;
    this.interval = options.interval ?? "hourly";
    this.baseUrl = (options.baseUrl ?? "https://api.coingecko.com/api/v3").replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.apiKey = options.apiKey;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  public buildUrl(): string {
    const params = new URLSearchParams({
      vs_currency: "usd",
      days: String(this.days),
      interval: this.interval,
    });
    return `${this.baseUrl}/coins/ethereum/market_chart?${params.toString()}`;
  }

  public async fetchPricePoints(): Promise<PricePoint[]> {
    const url = this.buildUrl();
    const payload = await this.request(url);

    const parsed = MarketChartSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DataUnavailableError("Malformed market_chart payload from CoinGecko", {
        cause: parsed.error,
      });
    }

    const points: PricePoint[] = [];
    for (const entry of parsed.data.prices) {
      if (entry.length < 2) continue;
      const [timestampMs, price] = entry;
      // CoinGecko timestamps are epoch milliseconds
      points.push({ timestamp: new Date(timestampMs), price });
    }

    if (points.length < MIN_PRICE_POINTS) {
      throw new DataUnavailableError(
        `Not enough price points returned from CoinGecko (got ${points.length})`
      );
    }

    logger.debug(`[CoinGecko] ${points.length} price points`);
    return points;
  }

  private async request(url: string): Promise<unknown> {
    const headers: Record<string, string> = { accept: "application/json" };
    if (this.apiKey) {
      headers["x-cg-demo-api-key"] = this.apiKey;
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      logger.error(`[CoinGecko] Request to ${url} failed`, error);
      throw new DataUnavailableError(
        `CoinGecko request failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new DataUnavailableError(
        `CoinGecko request failed (${response.status} ${response.statusText})`
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new DataUnavailableError("CoinGecko returned invalid JSON", {
        cause: error,
      });
    }
  }
}
