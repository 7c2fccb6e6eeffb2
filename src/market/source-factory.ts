import { MarketConfig } from "../config/config";
import { CoinGeckoETHDataSource } from "./coingecko-source";
import { createPublicExchange } from "./exchange-manager";
import { ExchangeETHDataSource } from "./exchange-source";
import { MarketDataSource } from "./price-source";

export function createMarketDataSource(market: MarketConfig): MarketDataSource {
  if (market.source === "exchange") {
    return new ExchangeETHDataSource({
      exchange: createPublicExchange(market.exchangeId, market.timeoutMs),
      exchangeId: market.exchangeId,
      symbol: market.symbol,
      days: market.days,
      interval: market.interval,
    });
  }

  return new CoinGeckoETHDataSource({
    days: market.days,
    interval: market.interval,
    baseUrl: market.baseUrl,
    timeoutMs: market.timeoutMs,
    apiKey: market.apiKey,
  });
}
