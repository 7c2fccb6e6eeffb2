import { PricePoint } from "../types";

/**
 * Produces ETH price points ordered ascending by time for a fixed lookback
 * window. Implementations fail with `DataUnavailableError` when the upstream
 * call fails or yields fewer than two points, and never retry.
 */
export interface MarketDataSource {
  readonly name: string;
  fetchPricePoints(): Promise<PricePoint[]>;
}

export const MIN_PRICE_POINTS = 2;
