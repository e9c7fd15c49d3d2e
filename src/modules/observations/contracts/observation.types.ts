/**
 * OBSERVATIONS MODULE — Types
 * ===========================
 *
 * Price/ATR observations pushed by TradingView alerts.
 * Append-only: an observation is never updated or deleted.
 */

// ═══════════════════════════════════════════════════════════════
// STORED RECORD
// ═══════════════════════════════════════════════════════════════

export interface ObservationCandidate {
  symbol: string;
  price: number;
  atr: number;
}

export interface Observation extends ObservationCandidate {
  // Surrogate key, strictly increasing. Tie-break only, never exposed.
  id: number;
  // Assigned by the store, non-decreasing in insertion order
  timestamp: Date;
}

// ═══════════════════════════════════════════════════════════════
// API SHAPES
// ═══════════════════════════════════════════════════════════════

export interface ObservationView {
  symbol: string;
  price: number;
  atr: number;
  timestamp: string; // ISO-8601
}

export interface IngestedObservation {
  symbol: string;
  price: number;
  atr: number;
  exit_price: number;
}

export interface WebhookResponse {
  status: 'success';
  message: string;
  data: IngestedObservation;
}

export interface ObservationListResponse {
  ok: true;
  count: number;
  data: ObservationView[];
}

export interface ObservationSummary {
  total_symbols: number;
  total_records: number;
  avg_price: number | null;
  avg_atr: number | null;
  last_update: string | null;
}

export type HealthReport =
  | { status: 'healthy'; database: 'connected'; records_count: number }
  | { status: 'unhealthy'; database: 'error'; error: string };

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const OBSERVATIONS_COLLECTION = 'investment_data';
export const COUNTERS_COLLECTION = 'counters';
export const CSV_COLUMNS = ['symbol', 'price', 'atr', 'exit_price', 'timestamp'] as const;
