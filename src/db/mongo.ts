/**
 * MongoDB connection
 */

import { MongoClient } from 'mongodb';

export interface MongoConfig {
  url: string;
  timeoutMs: number;
}

export async function connectMongo(config: MongoConfig): Promise<MongoClient> {
  const client = new MongoClient(config.url, {
    serverSelectionTimeoutMS: config.timeoutMs,
    connectTimeoutMS: config.timeoutMs,
    socketTimeoutMS: config.timeoutMs * 2,
    // Failed appends are reported to the caller, never retried here
    retryWrites: false,
  });

  await client.connect();
  console.log('[DB] Connected to MongoDB');
  return client;
}
