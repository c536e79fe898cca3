import { config as dotenvConfig } from 'dotenv';
import { KLINE_INTERVALS } from './market/types.js';
import type { VotingPolicyName } from './strategy/types.js';

// Load environment variables
dotenvConfig();

const VOTING_POLICIES: readonly VotingPolicyName[] = ['strict', 'relaxed'];

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

function getEnvList(key: string): string[] {
  const value = process.env[key];
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim().toUpperCase())
    .filter((item) => item.length > 0);
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = getEnvVar(key, defaultValue);
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new Error(`Environment variable ${key} must be one of: ${choices.join(', ')}`);
  }
  return match;
}

export const config = {
  // Binance Configuration (public market data only)
  binance: {
    testnet: getEnvBoolean('BINANCE_TESTNET', false),
  },

  // Telegram Configuration (empty values disable delivery)
  telegram: {
    botToken: getEnvVar('TELEGRAM_BOT_TOKEN', ''),
    chatId: getEnvVar('TELEGRAM_CHAT_ID', ''),
    retryAttempts: getEnvNumber('TELEGRAM_RETRY_ATTEMPTS', 3),
    retryDelayMs: getEnvNumber('TELEGRAM_RETRY_DELAY_MS', 1000),
    /** Also send the summary when a scan produced no alerts */
    notifyWhenIdle: getEnvBoolean('NOTIFY_WHEN_IDLE', false),
  },

  // Scan Configuration
  scan: {
    /** Minutes between scans; 0 runs a single scan and exits */
    intervalMinutes: getEnvNumber('SCAN_INTERVAL_MINUTES', 0),
    coarseInterval: getEnvChoice('SCAN_COARSE_INTERVAL', KLINE_INTERVALS, '1h'),
    coarseLimit: getEnvNumber('SCAN_COARSE_LIMIT', 200),
    fineInterval: getEnvChoice('SCAN_FINE_INTERVAL', KLINE_INTERVALS, '5m'),
    fineLimit: getEnvNumber('SCAN_FINE_LIMIT', 400),
    topCandidates: getEnvNumber('SCAN_TOP_CANDIDATES', 30),
    minNotionalUsdt: getEnvNumber('SCAN_MIN_NOTIONAL_USDT', 100_000),
    minPrice: getEnvNumber('SCAN_MIN_PRICE', 0.005),
    /** Skip near-stable instruments; 0 disables the filter */
    minPriceChangePct: getEnvNumber('SCAN_MIN_PRICE_CHANGE_PCT', 0),
    excludeSymbols: getEnvList('SCAN_EXCLUDE_SYMBOLS'),
  },

  // Indicator Configuration
  indicators: {
    rsiPeriod: getEnvNumber('RSI_PERIOD', 14),
    bollingerPeriod: getEnvNumber('BB_PERIOD', 20),
    bollingerStdDev: getEnvNumber('BB_STD_DEV', 2),
    macdFast: getEnvNumber('MACD_FAST', 12),
    macdSlow: getEnvNumber('MACD_SLOW', 26),
    macdSignal: getEnvNumber('MACD_SIGNAL', 9),
    stdDevPeriod: getEnvNumber('STD_DEV_PERIOD', 30),
  },

  // Zone Classifier Configuration
  zone: {
    rsiOversold: getEnvNumber('RSI_OVERSOLD', 30),
    rsiOverbought: getEnvNumber('RSI_OVERBOUGHT', 70),
    /** Outer fraction of the range where entries are considered */
    positionThreshold: getEnvNumber('POSITION_THRESHOLD', 0.4),
    votingPolicy: getEnvChoice('VOTING_POLICY', VOTING_POLICIES, 'relaxed'),
  },

  // Grid Plan Configuration
  grid: {
    spacingTargetPct: getEnvNumber('SPACING_TARGET', 0.75),
    spacingMinPct: getEnvNumber('SPACING_MIN', 0.35),
    spacingMaxPct: getEnvNumber('SPACING_MAX', 2),
    cycleMaxDays: getEnvNumber('CYCLE_MAX_DAYS', 2),
    /** Range breach tolerance (0.01 = 1%) */
    stopBuffer: getEnvNumber('STOP_BUFFER', 0.01),
  },

  // Signal Analyzer Configuration
  analyzer: {
    minSamples: getEnvNumber('MIN_SAMPLES', 60),
    /** Coarse volatility (%) at which the fine resolution is consulted */
    volThresholdPct: getEnvNumber('VOL_THRESHOLD', 10),
  },

  // Storage Configuration
  storage: {
    stateFile: getEnvVar('STATE_FILE', 'data/grid_state.json'),
    cooldownFile: getEnvVar('COOLDOWN_FILE', 'data/cooldowns.json'),
  },

  // Logging Configuration
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    toFile: getEnvBoolean('LOG_TO_FILE', true),
    silent: getEnvBoolean('LOG_SILENT', false),
  },
} as const;

export type Config = typeof config;
