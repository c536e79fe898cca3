/**
 * Signal Analyzer
 *
 * Runs the indicator, zone and grid pipeline per instrument. Coarse bars are
 * analysed first; when the market is already volatile the fine bars decide.
 * New triggers pass the cooldown tracker. A signal that keeps a held grid
 * alive (same zone, price inside the held range) is not a new trigger.
 */

import { logger, normalizeError } from '../logger.js';
import type { GridSignal, PriceSeries, Resolution, StateEntry, StateSnapshot } from '../types.js';
import type { PriceDataProvider } from '../market/types.js';
import type { SeriesAnalysis, SignalAnalyzerConfig } from './types.js';
import type { CooldownTracker } from './CooldownTracker.js';
import { buildIndicatorSet } from './indicators.js';
import { classifyZone } from './zoneClassifier.js';
import {
  calculateGridPlan,
  calculateVolatilityPct,
  isRangeBreached,
  scoreOpportunity,
  widenRange,
} from './gridCalculator.js';

function reject(reason: string, volatilityPct: number | null = null): SeriesAnalysis {
  return { signal: null, volatilityPct, reason };
}

/**
 * Analyze one price series. Pure: identical input gives identical output.
 *
 * The range comes from the closes before the latest one, so a breakout by
 * the latest close shows up as a position outside [0, 1].
 */
export function analyzeSeries(
  symbol: string,
  closes: PriceSeries,
  resolution: Resolution,
  timestamp: number,
  config: SignalAnalyzerConfig
): SeriesAnalysis {
  if (closes.length < config.minSamples) {
    return reject(`Insufficient data (${closes.length}/${config.minSamples})`);
  }

  const price = closes[closes.length - 1];
  if (!(price > 0)) {
    return reject('Non-positive price');
  }

  const history = closes.slice(0, -1);
  const low = Math.min(...history);
  const high = Math.max(...history);
  if (!(high - low > 0)) {
    return reject('Non-positive range');
  }

  const widened = widenRange(low, high, price, config.grid.stopBuffer);
  const volatilityPct = calculateVolatilityPct(widened.low, widened.high, price);
  const indicators = buildIndicatorSet(closes, volatilityPct, config.indicators);

  const classification = classifyZone({ price, low, high, indicators }, config.zone);
  if (classification.zone === null) {
    return reject(classification.reason, volatilityPct);
  }

  const plan = calculateGridPlan(
    { low: widened.low, high: widened.high, price, stdDev: indicators.stdDev },
    config.grid
  );
  if (!plan) {
    return reject('Cycle estimate out of bounds', volatilityPct);
  }

  const signal: GridSignal = {
    symbol,
    zone: classification.zone,
    price,
    position: classification.position,
    indicators,
    plan,
    score: scoreOpportunity(volatilityPct, plan),
    resolution,
    votes: classification.zone === 'LONG' ? classification.longVotes : classification.shortVotes,
    timestamp,
  };

  return { signal, volatilityPct, reason: classification.reason };
}

export class SignalAnalyzer {
  constructor(
    private readonly config: SignalAnalyzerConfig,
    private readonly prices: PriceDataProvider,
    private readonly cooldown: CooldownTracker
  ) {
    logger.info('Signal Analyzer initialized', {
      votingPolicy: config.zone.votingPolicy.name,
      positionThreshold: config.zone.positionThreshold,
      volThresholdPct: config.volThresholdPct,
      coarse: config.coarse,
      fine: config.fine,
    });
  }

  /**
   * Analyze one instrument at coarse and, when volatile, fine resolution
   *
   * @param held - Grid currently held for the instrument, if any
   * @returns The accepted signal, or null
   */
  public async analyzeInstrument(symbol: string, now: number, held?: StateEntry): Promise<GridSignal | null> {
    const coarseCloses = await this.fetchCloses(symbol, 'coarse');
    const coarse = analyzeSeries(symbol, coarseCloses, 'coarse', now, this.config);

    if (coarse.volatilityPct !== null && coarse.volatilityPct >= this.config.volThresholdPct) {
      const fineCloses = await this.fetchCloses(symbol, 'fine');
      const fine = analyzeSeries(symbol, fineCloses, 'fine', now, this.config);

      logger.debug('Fine resolution analysis', {
        symbol,
        coarseVolatilityPct: coarse.volatilityPct.toFixed(2),
        reason: fine.reason,
      });

      return this.accept(fine.signal, now, held);
    }

    logger.debug('Coarse resolution analysis', { symbol, reason: coarse.reason });
    return this.accept(coarse.signal, now, held);
  }

  /**
   * Sequential pass over the universe
   */
  public async scan(
    symbols: readonly string[],
    now: number,
    held: StateSnapshot = {}
  ): Promise<Map<string, GridSignal>> {
    const signals = new Map<string, GridSignal>();

    for (const symbol of symbols) {
      try {
        const entry = Object.hasOwn(held, symbol) ? held[symbol] : undefined;
        const signal = await this.analyzeInstrument(symbol, now, entry);
        if (signal) {
          signals.set(symbol, signal);
        }
      } catch (error) {
        logger.warn('Skipping instrument after analysis failure', {
          symbol,
          error: normalizeError(error),
        });
      }
    }

    logger.info('Signal scan finished', { scanned: symbols.length, accepted: signals.size });
    return signals;
  }

  private accept(signal: GridSignal | null, now: number, held?: StateEntry): GridSignal | null {
    if (!signal) {
      return null;
    }

    if (held && this.continuesGrid(signal, held)) {
      logger.debug('Held grid still qualifies', { symbol: signal.symbol, zone: signal.zone });
      return signal;
    }

    const { volatilityPct, stdDev } = signal.indicators;
    if (!this.cooldown.tryTrigger(signal.symbol, volatilityPct, stdDev, now)) {
      return null;
    }

    logger.info('Grid signal accepted', {
      symbol: signal.symbol,
      zone: signal.zone,
      resolution: signal.resolution,
      score: signal.score,
      gridCount: signal.plan.gridCount,
      spacingPct: signal.plan.spacingPct.toFixed(2),
      cycleDays: signal.plan.cycleDays,
    });
    return signal;
  }

  private continuesGrid(signal: GridSignal, held: StateEntry): boolean {
    return (
      signal.zone === held.zone &&
      !isRangeBreached(signal.price, held.low, held.high, this.config.grid.stopBuffer)
    );
  }

  private async fetchCloses(symbol: string, resolution: Resolution): Promise<PriceSeries> {
    const request = resolution === 'coarse' ? this.config.coarse : this.config.fine;
    try {
      return await this.prices.getCloses(symbol, request.interval, request.limit);
    } catch (error) {
      logger.warn('Price data unavailable', {
        symbol,
        interval: request.interval,
        error: normalizeError(error),
      });
      return [];
    }
  }
}
