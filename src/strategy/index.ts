export { SignalAnalyzer, analyzeSeries } from './SignalAnalyzer.js';
export {
  CooldownTracker,
  InMemoryCooldownStore,
  JsonFileCooldownStore,
  calculateCooldownSeconds,
} from './CooldownTracker.js';
export type { CooldownStore } from './CooldownTracker.js';
export {
  calculateRsi,
  calculateBollingerBands,
  calculateMacd,
  calculateRollingStdDev,
  buildIndicatorSet,
  DEFAULT_INDICATOR_PERIODS,
} from './indicators.js';
export {
  calculateGridPlan,
  scoreOpportunity,
  widenRange,
  isRangeBreached,
  DEFAULT_GRID_CONFIG,
} from './gridCalculator.js';
export { classifyZone, getVotingPolicy, strictVoting, relaxedVoting } from './zoneClassifier.js';
export type {
  IndicatorPeriods,
  VotingPolicy,
  VotingPolicyName,
  ZoneClassifierConfig,
  ZoneClassification,
  GridCalculatorConfig,
  SignalAnalyzerConfig,
  SeriesAnalysis,
} from './types.js';
