/**
 * Tests for universe selection
 */

import { describe, it, expect } from 'vitest';
import {
  getBaseAsset,
  isEligibleSymbol,
  isLeveragedToken,
  scoreCandidate,
  selectUniverse,
} from '../../src/market/universe.js';
import type { TickerSnapshot, UniverseFilterConfig } from '../../src/market/types.js';

function ticker(symbol: string, overrides: Partial<TickerSnapshot> = {}): TickerSnapshot {
  return {
    symbol,
    lastPrice: 100,
    highPrice: 110,
    lowPrice: 90,
    quoteVolume: 1_000_000,
    priceChangePercent: 5,
    ...overrides,
  };
}

const filter: UniverseFilterConfig = {
  quoteAsset: 'USDT',
  minNotional: 100_000,
  minPrice: 0.005,
  minPriceChangePct: 0,
  excludeSymbols: [],
  topCandidates: 30,
};

describe('getBaseAsset', () => {
  it('should strip the quote asset', () => {
    expect(getBaseAsset('btcusdt', 'USDT')).toBe('BTC');
  });

  it('should return null for other quotes', () => {
    expect(getBaseAsset('BTCBUSD', 'USDT')).toBeNull();
    expect(getBaseAsset('USDT', 'USDT')).toBeNull();
  });
});

describe('isLeveragedToken', () => {
  it('should match suffixes after a full ticker', () => {
    expect(isLeveragedToken('BTCUP')).toBe(true);
    expect(isLeveragedToken('ETHDOWN')).toBe(true);
    expect(isLeveragedToken('XRP3L')).toBe(true);
  });

  it('should not match short names ending in a suffix', () => {
    expect(isLeveragedToken('JUP')).toBe(false);
    expect(isLeveragedToken('BTC')).toBe(false);
  });
});

describe('isEligibleSymbol', () => {
  it('should accept a plain perpetual', () => {
    expect(isEligibleSymbol('BTCUSDT', 'USDT')).toBe(true);
    expect(isEligibleSymbol('JUPUSDT', 'USDT')).toBe(true);
  });

  it('should reject wrapped, stable and blacklisted assets', () => {
    expect(isEligibleSymbol('WBTCUSDT', 'USDT')).toBe(false);
    expect(isEligibleSymbol('USDCUSDT', 'USDT')).toBe(false);
    expect(isEligibleSymbol('LUNCUSDT', 'USDT')).toBe(false);
  });

  it('should reject leveraged tokens and configured exclusions', () => {
    expect(isEligibleSymbol('BTCUPUSDT', 'USDT')).toBe(false);
    expect(isEligibleSymbol('DOGEUSDT', 'USDT', ['DOGE'])).toBe(false);
    expect(isEligibleSymbol('PEPEUSDT', 'USDT', ['PEPEUSDT'])).toBe(false);
  });
});

describe('scoreCandidate', () => {
  it('should divide range width by log volume', () => {
    // 20% width over log10(1e6) = 6
    expect(scoreCandidate(ticker('BTCUSDT'))).toBeCloseTo(20 / 6, 10);
  });

  it('should not divide by less than one', () => {
    expect(scoreCandidate(ticker('BTCUSDT', { quoteVolume: 5 }))).toBeCloseTo(20, 10);
  });
});

describe('selectUniverse', () => {
  it('should rank eligible tickers by score', () => {
    const tickers = [
      ticker('AAAUSDT', { highPrice: 105, lowPrice: 95 }),
      ticker('BBBUSDT', { highPrice: 120, lowPrice: 80 }),
      ticker('CCCUSDT'),
    ];

    expect(selectUniverse(tickers, filter)).toEqual(['BBBUSDT', 'CCCUSDT', 'AAAUSDT']);
  });

  it('should apply price, notional and change filters', () => {
    const tickers = [
      ticker('AAAUSDT', { lastPrice: 0.001, highPrice: 0.0011, lowPrice: 0.0009 }),
      ticker('BBBUSDT', { quoteVolume: 50_000 }),
      ticker('CCCUSDT', { priceChangePercent: -0.5 }),
      ticker('DDDUSDT', { priceChangePercent: -3 }),
    ];

    expect(selectUniverse(tickers, { ...filter, minPriceChangePct: 1 })).toEqual(['DDDUSDT']);
  });

  it('should keep only the top candidates', () => {
    const tickers = ['AAAUSDT', 'BBBUSDT', 'CCCUSDT'].map((symbol, i) =>
      ticker(symbol, { highPrice: 110 + i })
    );

    expect(selectUniverse(tickers, { ...filter, topCandidates: 2 })).toEqual(['CCCUSDT', 'BBBUSDT']);
  });
});
