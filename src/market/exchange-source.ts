import { PricePoint } from "../types";
import { DataUnavailableError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { MarketDataSource, MIN_PRICE_POINTS } from "./price-source";

/**
 * The part of a ccxt `Exchange` this source needs.
 */
export interface OhlcvFetcher {
  fetchOHLCV(
    symbol: string,
    timeframe?: string,
    since?: number,
    limit?: number
  ): Promise<Array<Array<number | undefined>>>;
}

export interface ExchangeSourceOptions {
  exchange: OhlcvFetcher;
  exchangeId?: string;
  symbol?: string;
  days?: number;
  interval?: string;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function intervalToTimeframe(interval: string): string {
  if (interval === "hourly") return "1h";
  if (interval === "daily") return "1d";
  return interval;
}

/**
 * Parses a ccxt timeframe such as `15m`, `1h` or `1d` into milliseconds.
 */
export function parseTimeframeToMs(tf: string): number {
  const unit = tf.slice(-1);
  const value = parseInt(tf.slice(0, -1), 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new DataUnavailableError(`Unsupported timeframe ${tf}`);
  }

  switch (unit) {
    case "m":
      return value * 60 * 1000;
    case "h":
      return value * 60 * 60 * 1000;
    case "d":
      return value * MS_PER_DAY;
    case "w":
      return value * 7 * MS_PER_DAY;
    default:
      throw new DataUnavailableError(`Unsupported timeframe ${tf}`);
  }
}

/**
 * ETH prices from exchange candles: each candle's close at its open time.
 */
export class ExchangeETHDataSource implements MarketDataSource {
  public readonly name: string;
  private exchange: OhlcvFetcher;
  private symbol: string;
  private days: number;
  private timeframe: string;

  constructor(options: ExchangeSourceOptions) {
    this.exchange = options.exchange;
    this.symbol = options.symbol ?? "ETH/USDT";
    this.days = options.days ?? 1;
    this.timeframe = intervalToTimeframe(options.interval ?? "hourly");
    this.name = `exchange:${options.exchangeId ?? "unknown"}`;
  }

  /** Candles covering the lookback, plus the opening one. */
  public candleLimit(): number {
    const candlesPerDay = MS_PER_DAY / parseTimeframeToMs(this.timeframe);
    return Math.ceil(this.days * candlesPerDay) + 1;
  }

  public async fetchPricePoints(): Promise<PricePoint[]> {
    const limit = this.candleLimit();

    let ohlcv: Array<Array<number | undefined>>;
    try {
      // ccxt returns [timestamp, open, high, low, close, volume]
      ohlcv = await this.exchange.fetchOHLCV(this.symbol, this.timeframe, undefined, limit);
    } catch (error) {
      logger.error(`[Exchange] Failed to fetch OHLCV for ${this.symbol}`, error);
      throw new DataUnavailableError(
        `Exchange request failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const points: PricePoint[] = [];
    for (const candle of ohlcv) {
      const timestamp = candle[0];
      const close = candle[4];
      if (typeof timestamp !== "number" || typeof close !== "number") continue;
      points.push({ timestamp: new Date(timestamp), price: close });
    }
    points.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

    if (points.length < MIN_PRICE_POINTS) {
      throw new DataUnavailableError(
        `Not enough candles returned for ${this.symbol} (got ${points.length})`
      );
    }

    return points;
  }
}
