/**
 * State Transition Engine
 *
 * Diffs the accepted signals of a scan against the previous state and
 * produces the next state plus operator alerts.
 *
 * - no entry                 → NEW
 * - zone changed             → FLIPPED (new lifetime)
 * - price left old range     → EXITED_RANGE (new lifetime from current plan)
 * - otherwise                → CONTINUING (lifetime kept, range refreshed)
 * - entry without signal     → EXITED (entry removed)
 */

import type {
  Alert,
  GridSignal,
  StateEntry,
  StateSnapshot,
  Transition,
} from '../types.js';
import { isRangeBreached } from '../strategy/gridCalculator.js';

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export interface StateTransitionConfig {
  stopBuffer: number;
  /** Lower bound of the cycle warning window */
  warningMinMs: number;
  /** Fraction of the cycle duration used as warning window */
  warningFraction: number;
}

export const DEFAULT_TRANSITION_CONFIG: StateTransitionConfig = {
  stopBuffer: 0.01,
  warningMinMs: HOUR_MS,
  warningFraction: 0.1,
};

export interface TransitionResult {
  next: StateSnapshot;
  transitions: Transition[];
  alerts: Alert[];
}

function startEntry(signal: GridSignal, now: number): StateEntry {
  return {
    zone: signal.zone,
    low: signal.plan.low,
    high: signal.plan.high,
    startTime: now,
    warned: false,
    cycleDays: signal.plan.cycleDays,
  };
}

export class StateTransitionEngine {
  private readonly config: StateTransitionConfig;

  constructor(config: Partial<StateTransitionConfig> = {}) {
    this.config = { ...DEFAULT_TRANSITION_CONFIG, ...config };
  }

  /**
   * Remaining ms of the estimated cycle (negative once overdue)
   */
  public getRemainingCycleMs(entry: StateEntry, now: number): number {
    return entry.startTime + entry.cycleDays * DAY_MS - now;
  }

  public getWarningWindowMs(entry: StateEntry): number {
    return Math.max(this.config.warningMinMs, this.config.warningFraction * entry.cycleDays * DAY_MS);
  }

  /**
   * Classify every instrument and build the replacement state
   *
   * @param universe - Instruments scanned this round, used to report STILL_ABSENT
   */
  public diff(
    previous: StateSnapshot,
    signals: ReadonlyMap<string, GridSignal>,
    now: number,
    universe: readonly string[] = []
  ): TransitionResult {
    const next: StateSnapshot = {};
    const transitions: Transition[] = [];
    const alerts: Alert[] = [];

    for (const [symbol, signal] of signals) {
      const prior = Object.hasOwn(previous, symbol) ? previous[symbol] : undefined;

      if (!prior) {
        next[symbol] = startEntry(signal, now);
        transitions.push({ symbol, kind: 'NEW' });
        alerts.push({ kind: 'NEW', symbol, signal });
        continue;
      }

      if (prior.zone !== signal.zone) {
        next[symbol] = startEntry(signal, now);
        transitions.push({ symbol, kind: 'FLIPPED' });
        alerts.push({ kind: 'FLIPPED', symbol, signal, previousZone: prior.zone });
        continue;
      }

      if (isRangeBreached(signal.price, prior.low, prior.high, this.config.stopBuffer)) {
        next[symbol] = startEntry(signal, now);
        transitions.push({ symbol, kind: 'EXITED_RANGE' });
        alerts.push({ kind: 'EXITED_RANGE', symbol, signal, previous: prior });
        continue;
      }

      const entry: StateEntry = {
        ...prior,
        zone: signal.zone,
        low: signal.plan.low,
        high: signal.plan.high,
        cycleDays: signal.plan.cycleDays,
      };
      transitions.push({ symbol, kind: 'CONTINUING' });

      const remainingMs = this.getRemainingCycleMs(entry, now);
      if (!entry.warned && remainingMs <= this.getWarningWindowMs(entry)) {
        entry.warned = true;
        alerts.push({ kind: 'CYCLE_WARNING', symbol, entry: { ...entry }, remainingMs });
      }
      next[symbol] = entry;
    }

    for (const [symbol, prior] of Object.entries(previous)) {
      if (signals.has(symbol)) {
        continue;
      }
      transitions.push({ symbol, kind: 'EXITED' });
      alerts.push({
        kind: 'EXITED',
        symbol,
        previous: prior,
        proxyPrice: (prior.low + prior.high) / 2,
      });
    }

    for (const symbol of universe) {
      if (!signals.has(symbol) && !Object.hasOwn(previous, symbol)) {
        transitions.push({ symbol, kind: 'STILL_ABSENT' });
      }
    }

    return { next, transitions, alerts };
  }
}
