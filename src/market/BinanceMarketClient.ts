/**
 * Binance Market Client
 *
 * Public USD-M futures market data: kline closes and 24h tickers.
 * Kline failures degrade to an empty series; ticker failures propagate so
 * a scan never runs against a truncated universe.
 */

import { USDMClient } from 'binance';
import { logger, normalizeError } from '../logger.js';
import type { PriceSeries } from '../types.js';
import type {
  BinanceMarketClientConfig,
  InstrumentUniverseProvider,
  PriceDataProvider,
  TickerSnapshot,
} from './types.js';
import { parseKlineInterval } from './types.js';
import { selectUniverse } from './universe.js';

function toNumber(value: string | number): number {
  return parseFloat(String(value));
}

export class BinanceMarketClient implements PriceDataProvider, InstrumentUniverseProvider {
  private client: USDMClient;
  private config: BinanceMarketClientConfig;

  constructor(config: BinanceMarketClientConfig) {
    this.config = config;
    this.client = new USDMClient({ disableTimeSync: true }, undefined, config.testnet);

    logger.info('Binance Market Client initialized', {
      testnet: config.testnet,
      quoteAsset: config.universe.quoteAsset,
    });
  }

  /**
   * Closing prices, oldest first; empty on any failure
   */
  async getCloses(symbol: string, interval: string, limit: number): Promise<PriceSeries> {
    const klineInterval = parseKlineInterval(interval);
    if (!klineInterval) {
      logger.error('Unsupported kline interval', { symbol, interval });
      return [];
    }

    try {
      const klines = await this.client.getKlines({
        symbol,
        interval: klineInterval,
        limit,
      });

      return klines
        .map((kline) => toNumber(kline[4]))
        .filter((close) => Number.isFinite(close));
    } catch (error) {
      logger.warn('Failed to fetch klines', {
        symbol,
        interval,
        limit,
        error: normalizeError(error),
      });
      return [];
    }
  }

  /**
   * 24h ticker snapshots for every listed perpetual
   */
  async getTickers(): Promise<TickerSnapshot[]> {
    const stats = await this.client.get24hrChangeStatistics();

    // API returns array for all symbols, single object when a symbol is given
    const list = Array.isArray(stats) ? stats : [stats];

    return list.map((ticker) => ({
      symbol: ticker.symbol,
      lastPrice: toNumber(ticker.lastPrice),
      highPrice: toNumber(ticker.highPrice),
      lowPrice: toNumber(ticker.lowPrice),
      quoteVolume: toNumber(ticker.quoteVolume),
      priceChangePercent: toNumber(ticker.priceChangePercent),
    }));
  }

  /**
   * Ranked scan universe
   */
  async getUniverse(): Promise<string[]> {
    try {
      const tickers = await this.getTickers();
      const universe = selectUniverse(tickers, this.config.universe);

      logger.info('Instrument universe selected', {
        tickers: tickers.length,
        selected: universe.length,
      });
      return universe;
    } catch (error) {
      logger.error('Failed to fetch instrument universe', {
        error: normalizeError(error),
      });
      throw error;
    }
  }
}
