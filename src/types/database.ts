/**
 * Database row types. Mirror the Supabase table and SQL function result shapes.
 * Column names use snake_case to match PostgreSQL conventions.
 * Byte columns are hex-encoded by the SQL functions before they reach us.
 */

// ── Graphix tables (read through SQL functions) ──

/** Row of poi_monitor_current_pois(deployment, block). */
export interface CurrentPoiRow {
  poi: string;
  indexer_address: string;
}

/** Row of poi_monitor_poi_occurrences(pois). */
export interface PoiOccurrenceRow {
  poi: string;
  deployment_id: string;
  block_number: number;
  indexer_address: string;
  network_name: string;
  submitted_at: string;
}

// ── Ledger ──

export interface PoiNotificationRow {
  id: number;
  deployment_id: string;
  block_number: number;
  poi_set: string[];
  message: string;
  sent_at: string;
}
