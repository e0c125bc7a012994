/**
 * RiverGauge-MCP: Canonical Data Types
 *
 * These types define the readings extracted from gauge bulletins and the
 * sensor state published to consumers.
 */

// ============================================================================
// GaugeRecord - One parsed station reading from a table row
// ============================================================================

export interface GaugeRecord {
  readonly station_name: string;   // Column 1, trimmed, non-empty
  readonly timestamp: string;      // Column 2, kept verbatim (never parsed as a date)
  readonly height: number;         // Column 3 with separators and unit suffix removed
  readonly trend: string;          // Column 4
  readonly status: string;         // Column 6 (column 5 is not part of the record)
  readonly annotation?: string;    // First row comment containing METADATA
}

/**
 * Ordered readings from one document, in (table, row) document order.
 */
export type RecordSet = readonly GaugeRecord[];

/**
 * Raw cell text of one row, before record construction.
 */
export interface ExtractedRow {
  cells: string[];
  annotation?: string;
}

/**
 * Per-station entry of the consolidated `all_stations` attribute
 */
export interface StationSummary {
  station_name: string;
  height: number;
  timestamp: string;
  trend: string;
  status: string;
}

// ============================================================================
// Selection
// ============================================================================

export type SelectionOutcome =
  | { kind: "selected"; record: GaugeRecord; index: number }
  | { kind: "no_match"; filter: string }
  | { kind: "empty" };

// ============================================================================
// Sensor State - What the polling host publishes
// ============================================================================

export type RefreshOutcome = SelectionOutcome["kind"] | "fetch_failed" | "pending";

export interface SensorState {
  available: boolean;
  selected: GaugeRecord | null;
  records: RecordSet;
  outcome: RefreshOutcome;
  poll_id: string | null;        // UUID v7 of the refresh that produced this state
  updated_at: string | null;     // ISO8601
  content_hash?: string;         // SHA256 of the fetched document
  error?: string;
}

export type SensorView =
  | "consolidated"
  | "height"
  | "station"
  | "timestamp"
  | "trend"
  | "status";

export interface SensorAttributes {
  station_name?: string;
  timestamp?: string;
  trend?: string;
  status?: string;
  annotation?: string;
  all_stations?: StationSummary[];
}

// ============================================================================
// Error Types
// ============================================================================

export type ErrorCode =
  | "FETCH_FAILED"
  | "FETCH_TIMEOUT"
  | "UNSUPPORTED_SOURCE"
  | "READ_FAILED"
  | "EMPTY_CONTENT"
  | "CONFIG_INVALID"
  | "SENSOR_NOT_FOUND"
  | "INVALID_INPUT";

export interface ToolError {
  success: false;
  isError: true;
  code: ErrorCode;
  message: string;
  details?: unknown;
  recoverable: boolean;
  suggestion?: string;
}

// ============================================================================
// Event Types (for logging)
// ============================================================================

export interface EventLogEntry {
  timestamp: string;
  level: "info" | "warn" | "error" | "debug";
  sensor: string;
  tool: string;
  message: string;
  data?: unknown;
}
