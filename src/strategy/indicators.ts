/**
 * Technical Indicators Helper
 *
 * RSI and MACD follow their recurrences directly; Bollinger Bands and the
 * rolling standard deviation use the technicalindicators library.
 */

import { BollingerBands, SD } from 'technicalindicators';
import type { IndicatorSet, PriceSeries } from '../types.js';
import type { IndicatorPeriods } from './types.js';

/** Neutral RSI returned when the series is too short */
export const NEUTRAL_RSI = 50;

const LOSS_EPSILON = 1e-10;

export const DEFAULT_INDICATOR_PERIODS: IndicatorPeriods = {
  rsiPeriod: 14,
  bollingerPeriod: 20,
  bollingerStdDev: 2,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  stdDevPeriod: 30,
};

export interface BandPair {
  lower: number;
  middle: number;
  upper: number;
}

export interface MacdResult {
  macd: number;
  signal: number;
  histogram: number;
}

/**
 * Population standard deviation of the last `period` closes, 0 if insufficient data
 */
export function calculateRollingStdDev(closes: PriceSeries, period: number = 30): number {
  if (closes.length < period) {
    return 0;
  }

  const result = SD.calculate({ period, values: closes.slice(-period) });
  return result[result.length - 1] ?? 0;
}

/**
 * Wilder-smoothed RSI of the whole series
 *
 * @returns RSI in [0, 100], or 50 with fewer than `period + 1` closes
 */
export function calculateRsi(closes: PriceSeries, period: number = 14): number {
  if (closes.length < period + 1) {
    return NEUTRAL_RSI;
  }

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const delta = closes[i] - closes[i - 1];
    if (delta >= 0) {
      avgGain += delta;
    } else {
      avgLoss -= delta;
    }
  }
  avgGain /= period;
  avgLoss /= period;

  for (let i = period + 1; i < closes.length; i++) {
    const delta = closes[i] - closes[i - 1];
    const gain = Math.max(delta, 0);
    const loss = Math.max(-delta, 0);
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
  }

  const rs = avgGain / Math.max(avgLoss, LOSS_EPSILON);
  return 100 - 100 / (1 + rs);
}

/**
 * Calculate Bollinger Bands over the last `period` closes
 *
 * @returns Band values or null if insufficient data
 */
export function calculateBollingerBands(
  closes: PriceSeries,
  period: number = 20,
  stdDev: number = 2
): BandPair | null {
  if (closes.length < period) {
    return null;
  }

  const result = BollingerBands.calculate({
    period,
    values: closes.slice(-period),
    stdDev,
  });

  // Get the most recent value
  const latest = result[result.length - 1];
  if (!latest) {
    return null;
  }

  return {
    lower: latest.lower,
    middle: latest.middle,
    upper: latest.upper,
  };
}

/**
 * Exponential moving average series seeded with the first value
 */
export function calculateEmaSeries(values: readonly number[], period: number): number[] {
  const alpha = 2 / (period + 1);
  const series: number[] = [];
  let ema = values[0];

  for (const value of values) {
    ema = alpha * value + (1 - alpha) * ema;
    series.push(ema);
  }

  return series;
}

/**
 * MACD line, signal line and histogram at the latest close
 *
 * @returns null with fewer than `slow` closes
 */
export function calculateMacd(
  closes: PriceSeries,
  fast: number = 12,
  slow: number = 26,
  signal: number = 9
): MacdResult | null {
  if (closes.length < slow || closes.length === 0) {
    return null;
  }

  const fastEma = calculateEmaSeries(closes, fast);
  const slowEma = calculateEmaSeries(closes, slow);
  const macdSeries = fastEma.map((value, i) => value - slowEma[i]);
  const signalSeries = calculateEmaSeries(macdSeries, signal);

  const macd = macdSeries[macdSeries.length - 1];
  const signalValue = signalSeries[signalSeries.length - 1];

  return {
    macd,
    signal: signalValue,
    histogram: macd - signalValue,
  };
}

/**
 * Build the indicator snapshot for a series
 *
 * `stdDev` is expressed relative to the latest close so it is comparable
 * across instruments of different price levels.
 */
export function buildIndicatorSet(
  closes: PriceSeries,
  volatilityPct: number,
  periods: IndicatorPeriods = DEFAULT_INDICATOR_PERIODS
): IndicatorSet {
  const price = closes[closes.length - 1];
  const bands = calculateBollingerBands(closes, periods.bollingerPeriod, periods.bollingerStdDev);
  const macd = calculateMacd(closes, periods.macdFast, periods.macdSlow, periods.macdSignal);
  const rawStdDev = calculateRollingStdDev(closes, periods.stdDevPeriod);

  return {
    rsi: calculateRsi(closes, periods.rsiPeriod),
    bollingerLower: bands?.lower ?? null,
    bollingerUpper: bands?.upper ?? null,
    macdLine: macd?.macd ?? null,
    macdSignal: macd?.signal ?? null,
    macdHistogram: macd?.histogram ?? null,
    stdDev: price > 0 ? rawStdDev / price : 0,
    volatilityPct,
  };
}
