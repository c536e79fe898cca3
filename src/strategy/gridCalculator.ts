/**
 * Grid Parameter Calculator
 *
 * Derives spacing, grid count and cycle estimate from range volatility.
 */

import type { GridPlan } from '../types.js';
import type { GridCalculatorConfig } from './types.js';

export const MIN_GRID_COUNT = 4;
export const MAX_GRID_COUNT = 200;

/** Grid count floor once volatility reaches LOW_VOLATILITY_PCT */
const VOLATILE_MIN_GRID_COUNT = 10;
const LOW_VOLATILITY_PCT = 1.5;
const CYCLE_EPSILON = 1e-9;

export const DEFAULT_GRID_CONFIG: GridCalculatorConfig = {
  spacingTargetPct: 0.75,
  spacingMinPct: 0.35,
  spacingMaxPct: 2,
  cycleMaxDays: 2,
  stopBuffer: 0.01,
};

export interface GridPlanInput {
  low: number;
  high: number;
  price: number;
  stdDev: number;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function calculateVolatilityPct(low: number, high: number, price: number): number {
  return ((high - low) / price) * 100;
}

export function calculateVolFactor(volatilityPct: number, stdDev: number): number {
  return Math.max(0.1, volatilityPct + stdDev * 100);
}

/**
 * Widen the side of the range the price has broken through
 */
export function widenRange(
  low: number,
  high: number,
  price: number,
  stopBuffer: number = DEFAULT_GRID_CONFIG.stopBuffer
): { low: number; high: number } {
  let widenedLow = low;
  let widenedHigh = high;

  if (price < low * (1 - stopBuffer)) {
    widenedLow = Math.min(price, low * 0.95);
  }
  if (price > high * (1 + stopBuffer)) {
    widenedHigh = Math.max(price, high * 1.05);
  }

  return { low: widenedLow, high: widenedHigh };
}

/**
 * Check whether the price left the buffered range
 */
export function isRangeBreached(
  price: number,
  low: number,
  high: number,
  stopBuffer: number = DEFAULT_GRID_CONFIG.stopBuffer
): boolean {
  return price < low * (1 - stopBuffer) || price > high * (1 + stopBuffer);
}

/**
 * Calculate grid parameters for a range
 *
 * @returns The plan, or null when the range is unusable or the cycle
 * estimate falls outside (0, cycleMaxDays]
 */
export function calculateGridPlan(
  input: GridPlanInput,
  config: GridCalculatorConfig = DEFAULT_GRID_CONFIG
): GridPlan | null {
  const { low, high, price, stdDev } = input;
  const range = high - low;
  if (range <= 0 || price <= 0) {
    return null;
  }

  const volatilityPct = calculateVolatilityPct(low, high, price);
  const volFactor = calculateVolFactor(volatilityPct, stdDev);

  const spacingPct = clamp(
    config.spacingTargetPct * (30 / Math.max(volFactor, 1)),
    config.spacingMinPct,
    config.spacingMaxPct
  );

  const gridBase = range / (price * (spacingPct / 100));
  const gridCount =
    volatilityPct < LOW_VOLATILITY_PCT
      ? clamp(Math.floor(gridBase / 2), MIN_GRID_COUNT, MAX_GRID_COUNT)
      : clamp(Math.floor(gridBase), VOLATILE_MIN_GRID_COUNT, MAX_GRID_COUNT);

  const cycleDays = roundTo(((gridCount * spacingPct) / (volFactor + CYCLE_EPSILON)) * 2, 1);
  if (cycleDays <= 0 || cycleDays > config.cycleMaxDays) {
    return null;
  }

  return { low, high, spacingPct, gridCount, cycleDays };
}

/**
 * Opportunity score; rewards volatility, fewer grids, tighter spacing and shorter cycles
 */
export function scoreOpportunity(volatilityPct: number, plan: GridPlan): number {
  const score =
    volatilityPct * 2 +
    ((MAX_GRID_COUNT - plan.gridCount) / MAX_GRID_COUNT) * 10 +
    (1.5 - Math.min(plan.spacingPct, 1.5)) * 15 +
    (1.5 / Math.max(plan.cycleDays, 0.1)) * 10;

  return roundTo(score, 1);
}
