import { ETHPriceMetrics, PricePoint } from "../types";
import { InsufficientDataError } from "../utils/errors";

export class MetricsCalculator {
  /**
   * Percentage change from `oldValue` to `newValue`.
   * Defined as exactly 0 when `oldValue` is 0.
   */
  public static percentChange(oldValue: number, newValue: number): number {
    if (oldValue === 0) {
      return 0;
    }
    return ((newValue - oldValue) / oldValue) * 100;
  }

  /**
   * Derives current price, 1h / 24h change and the 24h range from a series
   * ordered ascending by time.
   * @throws InsufficientDataError when fewer than two points are given
   */
  public static calculate(points: readonly PricePoint[]): ETHPriceMetrics {
    if (points.length < 2) {
      throw new InsufficientDataError(points.length);
    }

    const first = points[0].price;
    const previous = points[points.length - 2].price;
    const current = points[points.length - 1].price;

    let high = first;
    let low = first;
    for (const point of points) {
      if (point.price > high) high = point.price;
      if (point.price < low) low = point.price;
    }

    return {
      currentPrice: current,
      hourlyChangePct: this.percentChange(previous, current),
      dailyChangePct: this.percentChange(first, current),
      high24h: high,
      low24h: low,
    };
  }

  /** Spread of the day range relative to its low, in percent. */
  public static rangeSpreadPct(metrics: ETHPriceMetrics): number {
    return this.percentChange(metrics.low24h, metrics.high24h);
  }
}
