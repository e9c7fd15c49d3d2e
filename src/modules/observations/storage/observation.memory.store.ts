/**
 * In-process observation store. Used by tests and by STORAGE_DRIVER=memory
 * for local runs without MongoDB; contents are lost on restart.
 */

import { defaultClock, type Clock } from '../../../common/runtime.js';
import type { Observation, ObservationCandidate } from '../contracts/observation.types.js';
import { AppendLock } from './append.lock.js';
import {
  compareNewestFirst,
  nextTimestamp,
  normalizeLimit,
  type ObservationStore,
} from './observation.store.js';

export interface MemoryStoreOptions {
  lockTimeoutMs?: number;
  clock?: Clock;
}

export class MemoryObservationStore implements ObservationStore {
  private rows: Observation[] = [];
  private seq = 0;
  private lastTimestamp: number | null = null;
  private readonly lock: AppendLock;
  private readonly clock: Clock;

  constructor(options: MemoryStoreOptions = {}) {
    this.lock = new AppendLock(options.lockTimeoutMs ?? 5000);
    this.clock = options.clock ?? defaultClock;
  }

  async append(candidate: ObservationCandidate): Promise<Observation> {
    return this.lock.runExclusive(async () => {
      const timestamp = nextTimestamp(this.clock.now(), this.lastTimestamp);
      const row: Observation = {
        id: this.seq + 1,
        symbol: candidate.symbol,
        price: candidate.price,
        atr: candidate.atr,
        timestamp,
      };

      // Publish in one step so readers never see a partial row
      this.rows = [...this.rows, row];
      this.seq = row.id;
      this.lastTimestamp = timestamp.getTime();

      return copy(row);
    });
  }

  async latestPerSymbol(): Promise<Observation[]> {
    const latest = new Map<string, Observation>();

    for (const row of this.rows) {
      const current = latest.get(row.symbol);
      if (!current || compareNewestFirst(row, current) < 0) {
        latest.set(row.symbol, row);
      }
    }

    return [...latest.values()].sort(compareNewestFirst).map(copy);
  }

  async all(limit?: number): Promise<Observation[]> {
    const sorted = [...this.rows].sort(compareNewestFirst);
    const max = normalizeLimit(limit);
    return (max > 0 ? sorted.slice(0, max) : sorted).map(copy);
  }

  async count(): Promise<number> {
    return this.rows.length;
  }

  async close(): Promise<void> {
    this.rows = [];
  }
}

function copy(row: Observation): Observation {
  return { ...row, timestamp: new Date(row.timestamp.getTime()) };
}
