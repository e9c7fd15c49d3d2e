/**
 * Database Indexes
 * Run on startup, before the store accepts traffic.
 */

import type { Db } from 'mongodb';
import { OBSERVATIONS_COLLECTION } from '../modules/observations/contracts/observation.types.js';

export async function ensureIndexes(db: Db): Promise<void> {
  const observations = db.collection(OBSERVATIONS_COLLECTION);

  // Latest per symbol
  await observations.createIndex(
    { symbol: 1, timestamp: -1, _id: -1 },
    { name: 'idx_symbol_timestamp' },
  );
  // History, newest first
  await observations.createIndex(
    { timestamp: -1, _id: -1 },
    { name: 'idx_timestamp' },
  );

  console.log(`[DB] ${OBSERVATIONS_COLLECTION} indexes ensured`);
}
