/**
 * Cooldown Tracker
 *
 * Gates how often an instrument may trigger. The window is 5 minutes plus
 * one minute per point of excess volatility and dispersion.
 */

import { logger } from '../logger.js';
import { isRecord, readJsonFile, writeJsonFile } from '../state/jsonFile.js';

const BASE_COOLDOWN_SECONDS = 300;

/**
 * Last-trigger timestamps keyed by instrument
 */
export interface CooldownStore {
  getLastTrigger(symbol: string): number | undefined;
  setLastTrigger(symbol: string, timestamp: number): void;
  /** Read persisted records, called once before a scan */
  load(): Promise<void>;
  /** Persist records, called once after a scan */
  save(): Promise<void>;
}

export class InMemoryCooldownStore implements CooldownStore {
  protected records = new Map<string, number>();

  getLastTrigger(symbol: string): number | undefined {
    return this.records.get(symbol);
  }

  setLastTrigger(symbol: string, timestamp: number): void {
    this.records.set(symbol, timestamp);
  }

  async load(): Promise<void> {}

  async save(): Promise<void> {}
}

/**
 * Cooldown records kept in a JSON file between process runs
 */
export class JsonFileCooldownStore extends InMemoryCooldownStore {
  constructor(private readonly filePath: string) {
    super();
  }

  override async load(): Promise<void> {
    const data = await readJsonFile(this.filePath);
    if (data === undefined) {
      return;
    }
    if (!isRecord(data)) {
      throw new Error(`Invalid cooldown file: ${this.filePath}`);
    }

    for (const [symbol, timestamp] of Object.entries(data)) {
      if (typeof timestamp === 'number') {
        this.setLastTrigger(symbol, timestamp);
      }
    }
    logger.debug('Cooldown records loaded', { file: this.filePath });
  }

  override async save(): Promise<void> {
    await writeJsonFile(this.filePath, this.toJSON());
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries(this.records);
  }
}

/**
 * Cooldown duration in seconds for the given volatility (%) and relative dispersion
 */
export function calculateCooldownSeconds(volatilityPct: number, stdDev: number): number {
  const excess = Math.max(0, volatilityPct - 1 + (stdDev - 0.01) * 100);
  return BASE_COOLDOWN_SECONDS + excess * 60;
}

export class CooldownTracker {
  constructor(
    private readonly store: CooldownStore,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Milliseconds until the instrument may trigger again (0 when allowed)
   */
  getRemainingMs(symbol: string, volatilityPct: number, stdDev: number, nowMs: number = this.now()): number {
    const last = this.store.getLastTrigger(symbol);
    if (last === undefined) {
      return 0;
    }
    const cooldownMs = calculateCooldownSeconds(volatilityPct, stdDev) * 1000;
    return Math.max(0, last + cooldownMs - nowMs);
  }

  canTrigger(symbol: string, volatilityPct: number, stdDev: number, nowMs: number = this.now()): boolean {
    return this.getRemainingMs(symbol, volatilityPct, stdDev, nowMs) === 0;
  }

  /**
   * Record a trigger if the cooldown has elapsed
   *
   * @returns true when the trigger was accepted
   */
  tryTrigger(symbol: string, volatilityPct: number, stdDev: number, nowMs: number = this.now()): boolean {
    const remainingMs = this.getRemainingMs(symbol, volatilityPct, stdDev, nowMs);
    if (remainingMs > 0) {
      logger.debug('Trigger suppressed by cooldown', { symbol, remainingMs });
      return false;
    }

    this.store.setLastTrigger(symbol, nowMs);
    return true;
  }
}
