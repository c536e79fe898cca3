/**
 * Types for market data collaborators
 */

import type { KlineInterval } from 'binance';
import type { PriceSeries } from '../types.js';

export type { KlineInterval };

export const KLINE_INTERVALS: readonly KlineInterval[] = [
  '1m', '3m', '5m', '15m', '30m', '1h', '2h', '4h', '6h', '8h', '12h', '1d',
];

export function parseKlineInterval(value: string): KlineInterval | undefined {
  return KLINE_INTERVALS.find((interval) => interval === value);
}

/**
 * Supplies closing prices, oldest first. Implementations return an empty
 * series when data is unavailable.
 */
export interface PriceDataProvider {
  getCloses(symbol: string, interval: string, limit: number): Promise<PriceSeries>;
}

/**
 * Supplies the ranked instrument universe for one scan
 */
export interface InstrumentUniverseProvider {
  getUniverse(): Promise<string[]>;
}

/**
 * 24h ticker fields used for universe filtering
 */
export interface TickerSnapshot {
  symbol: string;
  lastPrice: number;
  highPrice: number;
  lowPrice: number;
  /** 24h traded value in quote currency */
  quoteVolume: number;
  priceChangePercent: number;
}

/**
 * Universe filter rules
 */
export interface UniverseFilterConfig {
  quoteAsset: string;
  minNotional: number;
  minPrice: number;
  minPriceChangePct: number;
  excludeSymbols: readonly string[];
  topCandidates: number;
}

/**
 * Configuration for the Binance market client
 */
export interface BinanceMarketClientConfig {
  testnet: boolean;
  universe: UniverseFilterConfig;
}
