/**
 * Zone Classifier
 *
 * Combines the price position inside its range with RSI, Bollinger and MACD
 * votes to pick a grid direction.
 */

import type { IndicatorSet, IndicatorVotes } from '../types.js';
import type {
  VotingPolicy,
  VotingPolicyName,
  ZoneClassification,
  ZoneClassifierConfig,
} from './types.js';

function countVotes(votes: IndicatorVotes): number {
  return [votes.rsi, votes.bollinger, votes.macd].filter(Boolean).length;
}

/**
 * Requires every indicator to agree
 */
export const strictVoting: VotingPolicy = {
  name: 'strict',
  qualifies: (votes) => countVotes(votes) === 3,
};

/**
 * Requires at least two of three indicators to agree
 */
export const relaxedVoting: VotingPolicy = {
  name: 'relaxed',
  qualifies: (votes) => countVotes(votes) >= 2,
};

const VOTING_POLICIES: Record<VotingPolicyName, VotingPolicy> = {
  strict: strictVoting,
  relaxed: relaxedVoting,
};

export function getVotingPolicy(name: VotingPolicyName): VotingPolicy {
  return VOTING_POLICIES[name];
}

export interface ZoneInput {
  price: number;
  low: number;
  high: number;
  indicators: IndicatorSet;
}

export function computeLongVotes(price: number, indicators: IndicatorSet, rsiOversold: number): IndicatorVotes {
  return {
    rsi: indicators.rsi < rsiOversold,
    bollinger: indicators.bollingerLower !== null && price < indicators.bollingerLower,
    macd:
      indicators.macdLine !== null &&
      indicators.macdSignal !== null &&
      indicators.macdLine > indicators.macdSignal,
  };
}

export function computeShortVotes(price: number, indicators: IndicatorSet, rsiOverbought: number): IndicatorVotes {
  return {
    rsi: indicators.rsi > rsiOverbought,
    bollinger: indicators.bollingerUpper !== null && price > indicators.bollingerUpper,
    macd:
      indicators.macdLine !== null &&
      indicators.macdSignal !== null &&
      indicators.macdLine < indicators.macdSignal,
  };
}

/**
 * Classify an instrument into LONG, SHORT or no zone.
 *
 * LONG is only eligible below `positionThreshold`, SHORT only above
 * `1 - positionThreshold`. Both directions are evaluated independently and
 * LONG takes priority when both qualify.
 */
export function classifyZone(input: ZoneInput, config: ZoneClassifierConfig): ZoneClassification {
  const { price, low, high, indicators } = input;
  const range = high - low;
  const position = range > 0 ? (price - low) / range : 0.5;
  const longVotes = computeLongVotes(price, indicators, config.rsiOversold);
  const shortVotes = computeShortVotes(price, indicators, config.rsiOverbought);
  const threshold = config.positionThreshold;

  if (range <= 0) {
    return { zone: null, position, longVotes, shortVotes, reason: 'Non-positive range' };
  }

  if (position >= threshold && position <= 1 - threshold) {
    return {
      zone: null,
      position,
      longVotes,
      shortVotes,
      reason: `Price too centered (position ${position.toFixed(2)})`,
    };
  }

  const longQualifies = position < threshold && config.votingPolicy.qualifies(longVotes);
  const shortQualifies = position > 1 - threshold && config.votingPolicy.qualifies(shortVotes);

  if (longQualifies) {
    return {
      zone: 'LONG',
      position,
      longVotes,
      shortVotes,
      reason: `LONG votes ${countVotes(longVotes)}/3 (${config.votingPolicy.name})`,
    };
  }

  if (shortQualifies) {
    return {
      zone: 'SHORT',
      position,
      longVotes,
      shortVotes,
      reason: `SHORT votes ${countVotes(shortVotes)}/3 (${config.votingPolicy.name})`,
    };
  }

  return {
    zone: null,
    position,
    longVotes,
    shortVotes,
    reason: `Insufficient votes (long ${countVotes(longVotes)}/3, short ${countVotes(shortVotes)}/3)`,
  };
}
