/**
 * Common types for Grid Signal Scanner
 */

// ===========================================
// Market Data Types
// ===========================================

/**
 * Closing prices for one instrument, oldest first
 */
export type PriceSeries = readonly number[];

/**
 * Sampling resolution used for an analysis pass
 */
export type Resolution = 'coarse' | 'fine';

// ===========================================
// Strategy Types
// ===========================================

/**
 * Directional bias of a grid: LONG near the range bottom, SHORT near the top
 */
export type Zone = 'LONG' | 'SHORT';

/**
 * Indicator snapshot computed from one price series
 */
export interface IndicatorSet {
  rsi: number;
  bollingerLower: number | null;
  bollingerUpper: number | null;
  macdLine: number | null;
  macdSignal: number | null;
  macdHistogram: number | null;
  /** Rolling standard deviation relative to the latest price */
  stdDev: number;
  /** Grid range width as a percentage of the latest price */
  volatilityPct: number;
}

/**
 * Recommended grid parameters
 */
export interface GridPlan {
  low: number;
  high: number;
  spacingPct: number;
  gridCount: number;
  cycleDays: number;
}

/**
 * Per-indicator direction votes
 */
export interface IndicatorVotes {
  rsi: boolean;
  bollinger: boolean;
  macd: boolean;
}

/**
 * Accepted grid opportunity for one instrument in the current scan
 */
export interface GridSignal {
  symbol: string;
  zone: Zone;
  price: number;
  /** Price position within the historical range (0 = low, 1 = high) */
  position: number;
  indicators: IndicatorSet;
  plan: GridPlan;
  score: number;
  resolution: Resolution;
  votes: IndicatorVotes;
  timestamp: number;
}

// ===========================================
// State Types
// ===========================================

/**
 * Persisted per-instrument grid record
 */
export interface StateEntry {
  zone: Zone;
  low: number;
  high: number;
  /** Epoch ms when the current grid lifetime started */
  startTime: number;
  /** Set once the cycle-completion warning has fired */
  warned: boolean;
  /** Latest estimated cycle duration in days */
  cycleDays: number;
}

/**
 * Full persisted state, keyed by instrument
 */
export type StateSnapshot = Record<string, StateEntry>;

export type TransitionKind =
  | 'NEW'
  | 'CONTINUING'
  | 'FLIPPED'
  | 'EXITED_RANGE'
  | 'EXITED'
  | 'STILL_ABSENT';

export interface Transition {
  symbol: string;
  kind: TransitionKind;
}

// ===========================================
// Alert Types
// ===========================================

export type Alert =
  | { kind: 'NEW'; symbol: string; signal: GridSignal }
  | { kind: 'FLIPPED'; symbol: string; signal: GridSignal; previousZone: Zone }
  | { kind: 'EXITED_RANGE'; symbol: string; signal: GridSignal; previous: StateEntry }
  | { kind: 'EXITED'; symbol: string; previous: StateEntry; proxyPrice: number }
  | { kind: 'CYCLE_WARNING'; symbol: string; entry: StateEntry; remainingMs: number };

export type AlertKind = Alert['kind'];

/**
 * Outcome of one full scan
 */
export interface ScanReport {
  startedAt: number;
  finishedAt: number;
  scanned: number;
  signals: GridSignal[];
  transitions: Transition[];
  alerts: Alert[];
  activeCount: number;
}

/**
 * Error notification payload
 */
export interface ErrorNotification {
  errorType: string;
  message: string;
  timestamp: number;
}

// ===========================================
// Event Emitter Types
// ===========================================

export type ScannerEvents = {
  alert: [alert: Alert];
  scanCompleted: [report: ScanReport];
  error: [error: Error];
};
