/**
 * Shared test fixtures
 */

import type { GridSignal, IndicatorSet, StateEntry, Zone } from '../../src/types.js';
import type { SignalAnalyzerConfig } from '../../src/strategy/types.js';
import { relaxedVoting } from '../../src/strategy/zoneClassifier.js';
import { DEFAULT_INDICATOR_PERIODS } from '../../src/strategy/indicators.js';
import { DEFAULT_GRID_CONFIG } from '../../src/strategy/gridCalculator.js';

/**
 * Quiet range around `mid` with one early high and low, followed by `tail`
 */
export function rangeSeries(
  length: number,
  tail: number[],
  { mid, high, low }: { mid: number; high: number; low: number } = { mid: 110, high: 120, low: 100 }
): number[] {
  const closes = Array.from({ length: length - tail.length }, (_, i) => (i % 2 ? mid + 0.5 : mid - 0.5));
  closes[10] = high;
  closes[20] = low;
  return [...closes, ...tail];
}

/** 100-200 range closing at 101: LONG with ~99% volatility and a cooldown of ~1.9h */
export function wideLongSeries(): number[] {
  return rangeSeries(200, [140, 120, 101], { mid: 150, high: 200, low: 100 });
}

/** Sharp drop to the bottom of the range: RSI and Bollinger vote LONG */
export const LONG_TAIL = [108, 104, 100.5];

/** Sharp rally to the top of the range: RSI and Bollinger vote SHORT */
export const SHORT_TAIL = [112, 116, 119.5];

export function makeIndicators(overrides: Partial<IndicatorSet> = {}): IndicatorSet {
  return {
    rsi: 50,
    bollingerLower: null,
    bollingerUpper: null,
    macdLine: null,
    macdSignal: null,
    macdHistogram: null,
    stdDev: 0.01,
    volatilityPct: 20,
    ...overrides,
  };
}

export function makeSignal(symbol: string, zone: Zone, overrides: Partial<GridSignal> = {}): GridSignal {
  return {
    symbol,
    zone,
    price: zone === 'LONG' ? 101 : 119,
    position: zone === 'LONG' ? 0.05 : 0.95,
    indicators: makeIndicators(),
    plan: { low: 100, high: 120, spacingPct: 1, gridCount: 20, cycleDays: 1 },
    score: 50,
    resolution: 'coarse',
    votes: { rsi: true, bollinger: true, macd: false },
    timestamp: 0,
    ...overrides,
  };
}

export function makeEntry(zone: Zone, overrides: Partial<StateEntry> = {}): StateEntry {
  return {
    zone,
    low: 100,
    high: 120,
    startTime: 0,
    warned: false,
    cycleDays: 1,
    ...overrides,
  };
}

export function makeAnalyzerConfig(overrides: Partial<SignalAnalyzerConfig> = {}): SignalAnalyzerConfig {
  return {
    indicators: { ...DEFAULT_INDICATOR_PERIODS },
    zone: {
      rsiOversold: 30,
      rsiOverbought: 70,
      positionThreshold: 0.4,
      votingPolicy: relaxedVoting,
    },
    grid: { ...DEFAULT_GRID_CONFIG },
    minSamples: 60,
    volThresholdPct: 50,
    coarse: { interval: '1h', limit: 200 },
    fine: { interval: '5m', limit: 400 },
    ...overrides,
  };
}
