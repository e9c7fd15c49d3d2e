/**
 * OBSERVATIONS MODULE — MongoDB Store
 * ===================================
 *
 * Collection: investment_data
 * Document:   { _id: <seq>, symbol, price, atr, timestamp }
 * NO TTL — observations are retained indefinitely
 *
 * `_id` is an integer taken from an atomic counter, so it doubles as the
 * surrogate key used for tie-breaks.
 */

import type { Collection, Document, MongoClient } from 'mongodb';
import { StorageError, errorMessage } from '../../../common/errors.js';
import { defaultClock, defaultLogger, type Clock, type Logger } from '../../../common/runtime.js';
import { ensureIndexes } from '../../../db/indexes.js';
import {
  COUNTERS_COLLECTION,
  OBSERVATIONS_COLLECTION,
  type Observation,
  type ObservationCandidate,
} from '../contracts/observation.types.js';
import { AppendLock } from './append.lock.js';
import { nextTimestamp, normalizeLimit, type ObservationStore } from './observation.store.js';

interface ObservationDocument {
  _id: number;
  symbol: string;
  price: number;
  atr: number;
  timestamp: Date;
}

interface CounterDocument {
  _id: string;
  seq: number;
}

export interface MongoStoreOptions {
  dbName: string;
  timeoutMs: number;
  lockTimeoutMs: number;
  clock?: Clock;
  logger?: Logger;
}

const NEWEST_FIRST = { timestamp: -1, _id: -1 } as const;

export const LATEST_PER_SYMBOL_PIPELINE: Document[] = [
  { $sort: { symbol: 1, ...NEWEST_FIRST } },
  { $group: { _id: '$symbol', doc: { $first: '$$ROOT' } } },
  { $replaceRoot: { newRoot: '$doc' } },
  { $sort: NEWEST_FIRST },
];

export class MongoObservationStore implements ObservationStore {
  private readonly col: Collection<ObservationDocument>;
  private readonly counters: Collection<CounterDocument>;
  private readonly lock: AppendLock;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private lastTimestamp: number | null | undefined;

  private constructor(
    private readonly client: MongoClient,
    private readonly options: MongoStoreOptions,
  ) {
    const db = client.db(options.dbName);
    this.col = db.collection<ObservationDocument>(OBSERVATIONS_COLLECTION);
    this.counters = db.collection<CounterDocument>(COUNTERS_COLLECTION);
    this.lock = new AppendLock(options.lockTimeoutMs);
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? defaultLogger;
  }

  /** Takes ownership of `client`; `close()` closes it. */
  static async open(client: MongoClient, options: MongoStoreOptions): Promise<MongoObservationStore> {
    const store = new MongoObservationStore(client, options);
    await store.guard('ensure indexes', () => ensureIndexes(client.db(options.dbName)));
    return store;
  }

  async append(candidate: ObservationCandidate): Promise<Observation> {
    return this.lock.runExclusive(() =>
      this.guard('append', async () => {
        const last = await this.loadLastTimestamp();
        const timestamp = nextTimestamp(this.clock.now(), last);
        const id = await this.nextId();

        const doc: ObservationDocument = {
          _id: id,
          symbol: candidate.symbol,
          price: candidate.price,
          atr: candidate.atr,
          timestamp,
        };
        await this.col.insertOne(doc);
        this.lastTimestamp = timestamp.getTime();

        return toObservation(doc);
      }),
    );
  }

  async latestPerSymbol(): Promise<Observation[]> {
    return this.guard('latest per symbol', async () => {
      const docs = await this.col
        .aggregate<ObservationDocument>(LATEST_PER_SYMBOL_PIPELINE, { maxTimeMS: this.options.timeoutMs })
        .toArray();
      return docs.map(toObservation);
    });
  }

  async all(limit?: number): Promise<Observation[]> {
    return this.guard('read all', async () => {
      const cursor = this.col
        .find({}, { maxTimeMS: this.options.timeoutMs })
        .sort(NEWEST_FIRST);

      const max = normalizeLimit(limit);
      if (max > 0) cursor.limit(max);

      const docs = await cursor.toArray();
      return docs.map(toObservation);
    });
  }

  async count(): Promise<number> {
    return this.guard('count', () =>
      this.col.countDocuments({}, { maxTimeMS: this.options.timeoutMs }),
    );
  }

  async close(): Promise<void> {
    await this.client.close();
    this.logger.info({ db: this.options.dbName }, '[ObservationStore] MongoDB connection closed');
  }

  // Only called under the append lock
  private async loadLastTimestamp(): Promise<number | null> {
    if (this.lastTimestamp !== undefined) return this.lastTimestamp;

    const newest = await this.col.findOne({}, {
      sort: NEWEST_FIRST,
      projection: { timestamp: 1 },
      maxTimeMS: this.options.timeoutMs,
    });
    this.lastTimestamp = newest ? newest.timestamp.getTime() : null;
    return this.lastTimestamp;
  }

  private async nextId(): Promise<number> {
    const counter = await this.counters.findOneAndUpdate(
      { _id: OBSERVATIONS_COLLECTION },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: 'after', maxTimeMS: this.options.timeoutMs },
    );

    if (!counter) {
      throw new StorageError('id counter returned no document');
    }
    return counter.seq;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StorageError) throw err;

      this.logger.error({ operation, error: errorMessage(err) }, '[ObservationStore] MongoDB operation failed');
      throw new StorageError(`${operation} failed: ${errorMessage(err)}`, err);
    }
  }
}

function toObservation(doc: ObservationDocument): Observation {
  return {
    id: doc._id,
    symbol: doc.symbol,
    price: doc.price,
    atr: doc.atr,
    timestamp: doc.timestamp,
  };
}
