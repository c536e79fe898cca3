/**
 * Tests for Signal Analyzer
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { SignalAnalyzer, analyzeSeries } from '../../src/strategy/SignalAnalyzer.js';
import {
  CooldownTracker,
  InMemoryCooldownStore,
  calculateCooldownSeconds,
} from '../../src/strategy/CooldownTracker.js';
import type { PriceDataProvider } from '../../src/market/types.js';
import type { PriceSeries } from '../../src/types.js';
import {
  LONG_TAIL,
  SHORT_TAIL,
  makeAnalyzerConfig,
  makeEntry,
  rangeSeries,
  wideLongSeries,
} from '../helpers/fixtures.js';
import { HOUR_MS } from '../../src/state/StateTransitionEngine.js';

const NOW = 1_700_000_000_000;

describe('analyzeSeries', () => {
  const config = makeAnalyzerConfig();

  it('should emit a LONG plan near the bottom of the range', () => {
    const result = analyzeSeries('BTCUSDT', rangeSeries(200, LONG_TAIL), 'coarse', NOW, config);
    const signal = result.signal;

    expect(signal).not.toBeNull();
    expect(signal?.zone).toBe('LONG');
    expect(signal?.price).toBe(100.5);
    expect(signal?.position).toBeCloseTo(0.025, 10);
    expect(signal?.plan.low).toBe(100);
    expect(signal?.plan.high).toBe(120);
    expect(signal?.plan.gridCount).toBe(19);
    expect(signal?.plan.cycleDays).toBe(1.8);
    expect(signal?.score).toBe(64.3);
    expect(signal?.votes).toEqual({ rsi: true, bollinger: true, macd: false });
    expect(signal?.resolution).toBe('coarse');
    expect(signal?.timestamp).toBe(NOW);
    expect(result.volatilityPct).toBeCloseTo(19.9005, 3);
  });

  it('should emit a SHORT plan near the top of the range', () => {
    const signal = analyzeSeries('BTCUSDT', rangeSeries(200, SHORT_TAIL), 'coarse', NOW, config).signal;

    expect(signal?.zone).toBe('SHORT');
    expect(signal?.plan.gridCount).toBe(13);
    expect(signal?.plan.cycleDays).toBe(1.7);
    expect(signal?.score).toBe(55.9);
  });

  it('should widen the range when the latest close breaks below it', () => {
    const signal = analyzeSeries('BTCUSDT', rangeSeries(200, [107, 103, 98]), 'coarse', NOW, config).signal;

    expect(signal?.zone).toBe('LONG');
    expect(signal?.position).toBeLessThan(0);
    expect(signal?.plan.low).toBe(95);
    expect(signal?.plan.high).toBe(120);
    expect(signal?.plan.gridCount).toBe(31);
    expect(signal?.score).toBe(78.3);
  });

  it('should reject a centered price', () => {
    const result = analyzeSeries('BTCUSDT', rangeSeries(200, []), 'coarse', NOW, config);

    expect(result.signal).toBeNull();
    expect(result.reason).toMatch(/^Price too centered/);
    expect(result.volatilityPct).not.toBeNull();
  });

  it('should reject a short series', () => {
    const result = analyzeSeries('BTCUSDT', [100, 101, 102], 'coarse', NOW, config);

    expect(result).toEqual({ signal: null, volatilityPct: null, reason: 'Insufficient data (3/60)' });
  });

  it('should reject a flat series', () => {
    const result = analyzeSeries('BTCUSDT', Array.from({ length: 100 }, () => 5), 'coarse', NOW, config);

    expect(result.signal).toBeNull();
    expect(result.reason).toBe('Non-positive range');
  });

  it('should be deterministic', () => {
    const closes = rangeSeries(200, LONG_TAIL);

    expect(analyzeSeries('BTCUSDT', closes, 'coarse', NOW, config)).toEqual(
      analyzeSeries('BTCUSDT', closes, 'coarse', NOW, config)
    );
  });
});

describe('SignalAnalyzer', () => {
  let series: Record<string, PriceSeries>;
  let getCloses: Mock<PriceDataProvider['getCloses']>;
  let provider: PriceDataProvider;

  beforeEach(() => {
    series = {};
    getCloses = vi.fn<PriceDataProvider['getCloses']>(async (symbol, interval) => series[`${symbol}:${interval}`] ?? []);
    provider = { getCloses };
  });

  function createAnalyzer(volThresholdPct: number): SignalAnalyzer {
    const cooldown = new CooldownTracker(new InMemoryCooldownStore(), () => NOW);
    return new SignalAnalyzer(makeAnalyzerConfig({ volThresholdPct }), provider, cooldown);
  }

  it('should use coarse bars below the volatility threshold', async () => {
    series['BTCUSDT:1h'] = rangeSeries(200, LONG_TAIL);
    const analyzer = createAnalyzer(50);

    const signal = await analyzer.analyzeInstrument('BTCUSDT', NOW);

    expect(signal?.resolution).toBe('coarse');
    expect(getCloses).toHaveBeenCalledTimes(1);
    expect(getCloses).toHaveBeenCalledWith('BTCUSDT', '1h', 200);
  });

  it('should switch to fine bars above the volatility threshold', async () => {
    series['BTCUSDT:1h'] = rangeSeries(200, LONG_TAIL);
    series['BTCUSDT:5m'] = rangeSeries(400, LONG_TAIL);
    const analyzer = createAnalyzer(10);

    const signal = await analyzer.analyzeInstrument('BTCUSDT', NOW);

    expect(getCloses).toHaveBeenCalledWith('BTCUSDT', '5m', 400);
    expect(signal?.resolution).toBe('fine');
    expect(signal?.zone).toBe('LONG');
    expect(signal?.plan.gridCount).toBe(19);
  });

  it('should let the fine verdict stand when fine bars are unavailable', async () => {
    series['BTCUSDT:1h'] = rangeSeries(200, LONG_TAIL);
    const analyzer = createAnalyzer(10);

    expect(await analyzer.analyzeInstrument('BTCUSDT', NOW)).toBeNull();
  });

  it('should suppress a repeat trigger inside the cooldown window', async () => {
    series['BTCUSDT:1h'] = rangeSeries(200, LONG_TAIL);
    const analyzer = createAnalyzer(50);

    const first = await analyzer.analyzeInstrument('BTCUSDT', NOW);
    if (!first) throw new Error('expected a signal');
    const cooldownMs = calculateCooldownSeconds(first.indicators.volatilityPct, first.indicators.stdDev) * 1000;

    expect(await analyzer.analyzeInstrument('BTCUSDT', NOW + 60_000)).toBeNull();
    expect(await analyzer.analyzeInstrument('BTCUSDT', NOW + cooldownMs + 1000)).not.toBeNull();
  });

  describe('held grids', () => {
    beforeEach(() => {
      series['BTCUSDT:1h'] = wideLongSeries();
    });

    it('should let a held grid continue inside the cooldown window', async () => {
      const analyzer = createAnalyzer(150);
      const held = makeEntry('LONG', { low: 100, high: 200 });

      expect(await analyzer.analyzeInstrument('BTCUSDT', NOW)).not.toBeNull();
      expect(await analyzer.analyzeInstrument('BTCUSDT', NOW + HOUR_MS)).toBeNull();
      expect(await analyzer.analyzeInstrument('BTCUSDT', NOW + HOUR_MS, held)).not.toBeNull();

      const signals = await analyzer.scan(['BTCUSDT'], NOW + HOUR_MS, { BTCUSDT: held });
      expect(signals.get('BTCUSDT')?.zone).toBe('LONG');
    });

    it('should still gate a held grid that flips zone', async () => {
      const analyzer = createAnalyzer(150);
      await analyzer.analyzeInstrument('BTCUSDT', NOW);

      const held = makeEntry('SHORT', { low: 100, high: 200 });
      expect(await analyzer.analyzeInstrument('BTCUSDT', NOW + HOUR_MS, held)).toBeNull();
    });

    it('should still gate a held grid whose range was broken', async () => {
      const analyzer = createAnalyzer(150);
      await analyzer.analyzeInstrument('BTCUSDT', NOW);

      // 101 is below 110 less the 1% buffer
      const held = makeEntry('LONG', { low: 110, high: 200 });
      expect(await analyzer.analyzeInstrument('BTCUSDT', NOW + HOUR_MS, held)).toBeNull();
    });
  });

  it('should skip instruments whose price data fails', async () => {
    series['ETHUSDT:1h'] = rangeSeries(200, SHORT_TAIL);
    getCloses.mockImplementation(async (symbol, interval) => {
      if (symbol === 'BTCUSDT') throw new Error('Network error');
      return series[`${symbol}:${interval}`] ?? [];
    });
    const analyzer = createAnalyzer(50);

    const signals = await analyzer.scan(['BTCUSDT', 'ETHUSDT', 'SOLUSDT'], NOW);

    expect([...signals.keys()]).toEqual(['ETHUSDT']);
    expect(signals.get('ETHUSDT')?.zone).toBe('SHORT');
  });
});
