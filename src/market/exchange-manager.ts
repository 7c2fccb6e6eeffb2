import ccxt, { Exchange } from "ccxt";
import { DataUnavailableError } from "../utils/errors";
import { logger } from "../utils/logger";

type ExchangeConstructor = new (config?: Record<string, unknown>) => Exchange;

/**
 * Creates a ccxt exchange for public market data (no credentials).
 * `timeoutMs` overrides ccxt's default request timeout.
 */
export function createPublicExchange(exchangeId: string, timeoutMs?: number): Exchange {
  // ccxt exposes exchange classes as properties keyed by id
  const exchangeClass = (
    ccxt as unknown as Record<string, ExchangeConstructor | undefined>
  )[exchangeId];

  if (!exchangeClass) {
    throw new DataUnavailableError(`Exchange ${exchangeId} not found in ccxt`);
  }

  logger.debug(`[Exchange] Using ${exchangeId} for public market data`);
  const options: Record<string, unknown> = { enableRateLimit: true };
  if (timeoutMs !== undefined) {
    options.timeout = timeoutMs;
  }
  return new exchangeClass(options);
}
