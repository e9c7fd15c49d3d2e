/**
 * OBSERVATION SERVICE
 * ===================
 *
 * Ingestion and read models over an ObservationStore.
 * Storage errors propagate; "no data" and "storage failure" stay distinct.
 */

import { errorMessage } from '../../../common/errors.js';
import type {
  HealthReport,
  IngestedObservation,
  Observation,
  ObservationSummary,
  ObservationView,
} from '../contracts/observation.types.js';
import type { ObservationStore } from '../storage/observation.store.js';
import { exitPrice, validateObservation } from './observation.validator.js';

export interface WebhookPayload {
  symbol?: unknown;
  price?: unknown;
  atr?: unknown;
}

export class ObservationService {
  constructor(private readonly store: ObservationStore) {}

  /**
   * Validate, then append. Throws ValidationError before any write,
   * StorageError if the store did not confirm the write.
   */
  async ingest(payload: WebhookPayload): Promise<IngestedObservation> {
    const candidate = validateObservation(payload.symbol, payload.price, payload.atr);
    const stored = await this.store.append(candidate);

    return {
      symbol: stored.symbol,
      price: stored.price,
      atr: stored.atr,
      exit_price: exitPrice(stored),
    };
  }

  async getLatest(): Promise<ObservationView[]> {
    const rows = await this.store.latestPerSymbol();
    return rows.map(toView);
  }

  async getHistory(limit?: number): Promise<ObservationView[]> {
    const rows = await this.store.all(limit);
    return rows.map(toView);
  }

  async getSummary(): Promise<ObservationSummary> {
    const [rows, totalRecords] = await Promise.all([
      this.store.latestPerSymbol(),
      this.store.count(),
    ]);

    if (rows.length === 0) {
      return { total_symbols: 0, total_records: totalRecords, avg_price: null, avg_atr: null, last_update: null };
    }

    const avg = (pick: (row: Observation) => number) =>
      rows.reduce((sum, row) => sum + pick(row), 0) / rows.length;

    return {
      total_symbols: rows.length,
      total_records: totalRecords,
      avg_price: avg(row => row.price),
      avg_atr: avg(row => row.atr),
      // Rows arrive newest first
      last_update: rows[0].timestamp.toISOString(),
    };
  }

  /** Never throws: a failing store is reported as unhealthy. */
  async checkHealth(): Promise<HealthReport> {
    try {
      const rows = await this.store.latestPerSymbol();
      return { status: 'healthy', database: 'connected', records_count: rows.length };
    } catch (err) {
      return { status: 'unhealthy', database: 'error', error: errorMessage(err) };
    }
  }
}

export function toView(row: Observation): ObservationView {
  return {
    symbol: row.symbol,
    price: row.price,
    atr: row.atr,
    timestamp: row.timestamp.toISOString(),
  };
}
