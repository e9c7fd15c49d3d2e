/**
 * OBSERVATIONS MODULE — Store contract
 */

import type { Observation, ObservationCandidate } from '../contracts/observation.types.js';

/**
 * Append-only log of observations.
 *
 * All methods reject with `StorageError` on medium failure; an empty
 * store is never an error.
 */
export interface ObservationStore {
  /** Assigns id and timestamp, commits atomically, returns the stored row. */
  append(candidate: ObservationCandidate): Promise<Observation>;

  /**
   * One row per symbol: max (timestamp, id). Ordered by timestamp desc,
   * then id desc.
   */
  latestPerSymbol(): Promise<Observation[]>;

  /** Newest first. `limit` <= 0 or absent means unbounded. */
  all(limit?: number): Promise<Observation[]>;

  count(): Promise<number>;

  close(): Promise<void>;
}

/** Newest first: timestamp desc, then id desc. */
export function compareNewestFirst(a: Observation, b: Observation): number {
  const byTime = b.timestamp.getTime() - a.timestamp.getTime();
  return byTime !== 0 ? byTime : b.id - a.id;
}

/** Timestamps never go backwards, even if the wall clock does. */
export function nextTimestamp(now: number, last: number | null): Date {
  return new Date(last === null ? now : Math.max(now, last));
}

export function normalizeLimit(limit?: number): number {
  return limit !== undefined && limit > 0 ? Math.floor(limit) : 0;
}
