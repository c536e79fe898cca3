/**
 * State Store
 *
 * Persists the per-instrument grid state between scans. A scan loads the
 * snapshot once and saves the full replacement once.
 */

import { logger } from '../logger.js';
import type { StateEntry, StateSnapshot } from '../types.js';
import { isRecord, readJsonFile, writeJsonFile } from './jsonFile.js';

export interface StateStore {
  load(): Promise<StateSnapshot>;
  /** Replace the stored snapshot */
  save(snapshot: StateSnapshot): Promise<void>;
}

export class InMemoryStateStore implements StateStore {
  private snapshot: StateSnapshot;

  constructor(initial: StateSnapshot = {}) {
    this.snapshot = { ...initial };
  }

  async load(): Promise<StateSnapshot> {
    return { ...this.snapshot };
  }

  async save(snapshot: StateSnapshot): Promise<void> {
    this.snapshot = { ...snapshot };
  }
}

export function isStateEntry(value: unknown): value is StateEntry {
  return (
    isRecord(value) &&
    (value.zone === 'LONG' || value.zone === 'SHORT') &&
    typeof value.low === 'number' &&
    typeof value.high === 'number' &&
    typeof value.startTime === 'number' &&
    typeof value.warned === 'boolean' &&
    typeof value.cycleDays === 'number'
  );
}

export class JsonFileStateStore implements StateStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<StateSnapshot> {
    const data = await readJsonFile(this.filePath);
    if (data === undefined) {
      logger.info('No state file found, starting with empty state', { file: this.filePath });
      return {};
    }
    if (!isRecord(data)) {
      throw new Error(`Invalid state file: ${this.filePath}`);
    }

    const snapshot: StateSnapshot = {};
    for (const [symbol, entry] of Object.entries(data)) {
      if (isStateEntry(entry)) {
        snapshot[symbol] = entry;
      } else {
        logger.warn('Dropping malformed state entry', { symbol });
      }
    }
    return snapshot;
  }

  async save(snapshot: StateSnapshot): Promise<void> {
    await writeJsonFile(this.filePath, snapshot);
    logger.debug('State saved', { file: this.filePath, entries: Object.keys(snapshot).length });
  }
}
