/**
 * Application
 *
 * Orchestrates one scan:
 * Universe → Signal Analyzer → State Transition Engine → Notification Service
 *
 * State and cooldown records are read once before the scan and written once
 * after it. The cooldown only gates new triggers; held grids that still
 * qualify continue regardless. Instruments already holding a grid are always re-analysed, even
 * when they fall out of the ranked universe.
 */

import { EventEmitter } from 'eventemitter3';
import { logger, normalizeError } from './logger.js';
import { config } from './config.js';
import { BinanceMarketClient } from './market/index.js';
import type { InstrumentUniverseProvider, PriceDataProvider } from './market/index.js';
import {
  CooldownTracker,
  JsonFileCooldownStore,
  SignalAnalyzer,
  getVotingPolicy,
} from './strategy/index.js';
import type { CooldownStore, SignalAnalyzerConfig } from './strategy/index.js';
import { JsonFileStateStore, StateTransitionEngine } from './state/index.js';
import type { StateStore, StateTransitionConfig } from './state/index.js';
import { NotificationService, TELEGRAM_MESSAGE_LIMIT } from './notification/index.js';
import type { ScanReport, ScannerEvents } from './types.js';

export interface AppDependencies {
  universe: InstrumentUniverseProvider;
  prices: PriceDataProvider;
  stateStore: StateStore;
  cooldownStore: CooldownStore;
  notifications: NotificationService;
  now: () => number;
}

export interface AppSettings {
  analyzer: SignalAnalyzerConfig;
  transitions: Partial<StateTransitionConfig>;
  intervalMinutes: number;
  notifyWhenIdle: boolean;
}

/**
 * Settings derived from environment configuration
 */
export function settingsFromConfig(): AppSettings {
  return {
    analyzer: {
      indicators: { ...config.indicators },
      zone: {
        rsiOversold: config.zone.rsiOversold,
        rsiOverbought: config.zone.rsiOverbought,
        positionThreshold: config.zone.positionThreshold,
        votingPolicy: getVotingPolicy(config.zone.votingPolicy),
      },
      grid: { ...config.grid },
      minSamples: config.analyzer.minSamples,
      volThresholdPct: config.analyzer.volThresholdPct,
      coarse: { interval: config.scan.coarseInterval, limit: config.scan.coarseLimit },
      fine: { interval: config.scan.fineInterval, limit: config.scan.fineLimit },
    },
    transitions: { stopBuffer: config.grid.stopBuffer },
    intervalMinutes: config.scan.intervalMinutes,
    notifyWhenIdle: config.telegram.notifyWhenIdle,
  };
}

/**
 * Production collaborators: Binance, JSON files and Telegram
 */
export function dependenciesFromConfig(): AppDependencies {
  const market = new BinanceMarketClient({
    testnet: config.binance.testnet,
    universe: {
      quoteAsset: 'USDT',
      minNotional: config.scan.minNotionalUsdt,
      minPrice: config.scan.minPrice,
      minPriceChangePct: config.scan.minPriceChangePct,
      excludeSymbols: config.scan.excludeSymbols,
      topCandidates: config.scan.topCandidates,
    },
  });

  return {
    universe: market,
    prices: market,
    stateStore: new JsonFileStateStore(config.storage.stateFile),
    cooldownStore: new JsonFileCooldownStore(config.storage.cooldownFile),
    notifications: new NotificationService({
      botToken: config.telegram.botToken,
      chatId: config.telegram.chatId,
      retryAttempts: config.telegram.retryAttempts,
      retryDelayMs: config.telegram.retryDelayMs,
      maxMessageLength: TELEGRAM_MESSAGE_LIMIT,
    }),
    now: Date.now,
  };
}

export class App extends EventEmitter<ScannerEvents> {
  private readonly deps: AppDependencies;
  private readonly settings: AppSettings;
  private readonly analyzer: SignalAnalyzer;
  private readonly engine: StateTransitionEngine;
  private scanTimer: NodeJS.Timeout | null = null;
  private isScanning = false;
  private isRunning = false;
  private lastReport: ScanReport | null = null;

  constructor(deps: AppDependencies = dependenciesFromConfig(), settings: AppSettings = settingsFromConfig()) {
    super();
    this.deps = deps;
    this.settings = settings;

    const cooldown = new CooldownTracker(deps.cooldownStore, deps.now);
    this.analyzer = new SignalAnalyzer(settings.analyzer, deps.prices, cooldown);
    this.engine = new StateTransitionEngine(settings.transitions);

    this.setupEventPipeline();
  }

  private setupEventPipeline(): void {
    this.deps.notifications.on('error', (error) => {
      logger.error('Notification Service error', { error: error.message });
    });

    this.on('alert', (alert) => {
      logger.info('Grid alert raised', { kind: alert.kind, symbol: alert.symbol });
    });
  }

  /**
   * Run one full scan
   *
   * A single instrument's failure never aborts the scan; failures of the
   * universe provider or the stores do, leaving the stored state untouched.
   */
  public async runScan(): Promise<ScanReport> {
    if (this.isScanning) {
      throw new Error('A scan is already in progress');
    }
    this.isScanning = true;

    try {
      const startedAt = this.deps.now();

      await this.deps.cooldownStore.load();
      const previous = await this.deps.stateStore.load();
      const universe = await this.deps.universe.getUniverse();

      const tracked = Object.keys(previous).filter((symbol) => !universe.includes(symbol));
      const symbols = [...universe, ...tracked];

      logger.info('Scan started', {
        universe: universe.length,
        tracked: tracked.length,
        previousEntries: Object.keys(previous).length,
      });

      const signals = await this.analyzer.scan(symbols, startedAt, previous);
      const result = this.engine.diff(previous, signals, startedAt, symbols);

      await this.deps.stateStore.save(result.next);
      await this.deps.cooldownStore.save();

      const report: ScanReport = {
        startedAt,
        finishedAt: this.deps.now(),
        scanned: symbols.length,
        signals: [...signals.values()],
        transitions: result.transitions,
        alerts: result.alerts,
        activeCount: Object.keys(result.next).length,
      };
      this.lastReport = report;

      for (const alert of report.alerts) {
        this.emit('alert', alert);
      }

      if (report.alerts.length > 0 || this.settings.notifyWhenIdle) {
        await this.deps.notifications.sendScanReport(report);
      } else {
        logger.info('No grid changes this scan', { scanned: report.scanned, active: report.activeCount });
      }

      this.emit('scanCompleted', report);
      return report;
    } catch (error) {
      const normalizedError = error instanceof Error ? error : new Error(normalizeError(error));
      logger.error('Scan failed', { error: normalizedError.message });
      this.emit('error', normalizedError);
      await this.handleFatalError('Scan', normalizedError.message);
      throw normalizedError;
    } finally {
      this.isScanning = false;
    }
  }

  /**
   * Scan now and then every `intervalMinutes`
   */
  public async start(): Promise<void> {
    if (this.isRunning) return;

    const ok = await this.deps.notifications.verifyConnection();
    if (!ok) {
      throw new Error('Failed to verify notification channel');
    }

    this.isRunning = true;
    await this.deps.notifications.sendStartupNotification(
      this.settings.intervalMinutes,
      this.settings.analyzer.zone.votingPolicy.name
    );

    await this.scanSafely();

    if (this.settings.intervalMinutes > 0) {
      this.scanTimer = setInterval(() => {
        void this.scanSafely();
      }, this.settings.intervalMinutes * 60_000);
    }

    logger.info('Grid Scanner started', { intervalMinutes: this.settings.intervalMinutes });
  }

  /**
   * Stop the periodic scan
   */
  public async stop(reason: string = 'Manual shutdown'): Promise<void> {
    if (!this.isRunning) return;

    logger.info('Stopping Grid Scanner', { reason });
    this.isRunning = false;

    if (this.scanTimer) {
      clearInterval(this.scanTimer);
      this.scanTimer = null;
    }

    await this.deps.notifications.sendShutdownNotification(reason);
    logger.info('Grid Scanner stopped');
  }

  public getStatus(): {
    isRunning: boolean;
    isScanning: boolean;
    lastScanAt: number | null;
    activeCount: number;
  } {
    return {
      isRunning: this.isRunning,
      isScanning: this.isScanning,
      lastScanAt: this.lastReport?.finishedAt ?? null,
      activeCount: this.lastReport?.activeCount ?? 0,
    };
  }

  /**
   * Periodic scans log failures and keep the schedule alive
   */
  private async scanSafely(): Promise<void> {
    if (this.isScanning) {
      logger.warn('Previous scan still running, skipping this tick');
      return;
    }
    try {
      await this.runScan();
    } catch (error) {
      logger.error('Scheduled scan failed', { error: normalizeError(error) });
    }
  }

  private async handleFatalError(source: string, message: string): Promise<void> {
    try {
      await this.deps.notifications.sendErrorNotification(source, message);
    } catch (error) {
      logger.error('Failed to send error notification', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
