import {
  ExchangeETHDataSource,
  intervalToTimeframe,
  OhlcvFetcher,
  parseTimeframeToMs,
} from "./exchange-source";
import { DataUnavailableError } from "../utils/errors";

const T0 = Date.UTC(2024, 0, 1, 0, 0, 0);
const HOUR = 60 * 60 * 1000;

function fetcherReturning(candles: Array<Array<number | undefined>>) {
  const fetchOHLCV = jest.fn(
    async (_symbol: string, _timeframe?: string, _since?: number, _limit?: number) => candles
  );
  const exchange: OhlcvFetcher = { fetchOHLCV };
  return { exchange, fetchOHLCV };
}

describe("ExchangeETHDataSource", () => {
  it("requests 25 hourly candles for a one day lookback", async () => {
    const { exchange, fetchOHLCV } = fetcherReturning([
      [T0, 1, 1, 1, 1800, 10],
      [T0 + HOUR, 1, 1, 1, 1810, 10],
    ]);
    const source = new ExchangeETHDataSource({ exchange, exchangeId: "binance" });

    await source.fetchPricePoints();

    expect(fetchOHLCV).toHaveBeenCalledWith("ETH/USDT", "1h", undefined, 25);
    expect(source.name).toBe("exchange:binance");
  });

  it("uses closes, skips incomplete candles and sorts by time", async () => {
    const { exchange } = fetcherReturning([
      [T0 + 2 * HOUR, 1, 1, 1, 1820, 10],
      [T0, 1, 1, 1, 1800, 10],
      [T0 + HOUR, 1, 1, 1, undefined, 10],
      [undefined, 1, 1, 1, 1799, 10],
    ]);
    const source = new ExchangeETHDataSource({ exchange });

    const points = await source.fetchPricePoints();

    expect(points.map(p => [p.timestamp.toISOString(), p.price])).toEqual([
      ["2024-01-01T00:00:00.000Z", 1800],
      ["2024-01-01T02:00:00.000Z", 1820],
    ]);
  });

  it("fails with fewer than two usable candles", async () => {
    const { exchange } = fetcherReturning([[T0, 1, 1, 1, 1800, 10]]);
    const source = new ExchangeETHDataSource({ exchange, symbol: "ETH/USDC" });

    await expect(source.fetchPricePoints()).rejects.toThrow(
      "Not enough candles returned for ETH/USDC (got 1)"
    );
  });

  it("wraps exchange errors", async () => {
    const exchange: OhlcvFetcher = {
      fetchOHLCV: async () => {
        throw new Error("NetworkError: binance GET failed");
      },
    };
    const source = new ExchangeETHDataSource({ exchange });

    await expect(source.fetchPricePoints()).rejects.toBeInstanceOf(DataUnavailableError);
  });

  it("sizes daily lookbacks in days", () => {
    const { exchange } = fetcherReturning([]);
    const source = new ExchangeETHDataSource({ exchange, days: 7, interval: "daily" });

    expect(source.candleLimit()).toBe(8);
  });
});

describe("intervalToTimeframe", () => {
  it("maps named intervals and passes timeframes through", () => {
    expect(intervalToTimeframe("hourly")).toBe("1h");
    expect(intervalToTimeframe("daily")).toBe("1d");
    expect(intervalToTimeframe("15m")).toBe("15m");
  });
});

describe("parseTimeframeToMs", () => {
  it("parses minute, hour, day and week timeframes", () => {
    expect(parseTimeframeToMs("15m")).toBe(15 * 60 * 1000);
    expect(parseTimeframeToMs("4h")).toBe(4 * HOUR);
    expect(parseTimeframeToMs("1d")).toBe(24 * HOUR);
    expect(parseTimeframeToMs("1w")).toBe(7 * 24 * HOUR);
  });

  it("rejects unknown units", () => {
    expect(() => parseTimeframeToMs("5x")).toThrow(DataUnavailableError);
    expect(() => parseTimeframeToMs("hourly")).toThrow(DataUnavailableError);
  });
});
