/**
 * Types for the signal analysis pipeline
 */

import type { GridSignal, IndicatorVotes, Zone } from '../types.js';

/**
 * Indicator periods
 */
export interface IndicatorPeriods {
  rsiPeriod: number;
  bollingerPeriod: number;
  bollingerStdDev: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  stdDevPeriod: number;
}

export type VotingPolicyName = 'strict' | 'relaxed';

/**
 * Decides whether a set of indicator votes qualifies a direction
 */
export interface VotingPolicy {
  readonly name: string;
  qualifies(votes: IndicatorVotes): boolean;
}

/**
 * Configuration for the Zone Classifier
 */
export interface ZoneClassifierConfig {
  rsiOversold: number;
  rsiOverbought: number;
  positionThreshold: number;
  votingPolicy: VotingPolicy;
}

/**
 * Zone classification result
 */
export interface ZoneClassification {
  zone: Zone | null;
  position: number;
  longVotes: IndicatorVotes;
  shortVotes: IndicatorVotes;
  reason: string;
}

/**
 * Configuration for the Grid Parameter Calculator
 */
export interface GridCalculatorConfig {
  spacingTargetPct: number;
  spacingMinPct: number;
  spacingMaxPct: number;
  cycleMaxDays: number;
  stopBuffer: number;
}

/**
 * Configuration for the Signal Analyzer
 */
export interface SignalAnalyzerConfig {
  indicators: IndicatorPeriods;
  zone: ZoneClassifierConfig;
  grid: GridCalculatorConfig;
  minSamples: number;
  volThresholdPct: number;
  coarse: SeriesRequest;
  fine: SeriesRequest;
}

/**
 * Interval and sample count for one resolution
 */
export interface SeriesRequest {
  interval: string;
  limit: number;
}

/**
 * Result of analyzing one price series
 */
export interface SeriesAnalysis {
  signal: GridSignal | null;
  /** Range volatility in percent, null when the series was unusable */
  volatilityPct: number | null;
  reason: string;
}
