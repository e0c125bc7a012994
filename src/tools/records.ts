/**
 * RiverGauge-MCP: Record Parsing
 *
 * Converts one table row's cell text into a typed GaugeRecord.
 *
 * Column layout of a bulletin row:
 *   0 station name | 1 timestamp | 2 height | 3 trend | 4 (unused) | 5 status
 *
 * @module tools/records
 * @see tests/records.test.ts
 */

import type { GaugeRecord } from '../types.js';

/** Minimum number of cells a row needs to become a record */
export const MIN_RECORD_CELLS = 6;

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Normalize a height cell to a number.
 * Strips thousands separators and every literal `m`, then accepts only a
 * plain decimal literal.
 *
 * @returns The finite height, or null when the cell is not numeric
 *
 * @example
 * normalizeHeight("1,234.5m") // 1234.5
 * normalizeHeight("12.3")     // 12.3
 * normalizeHeight("abc")      // null
 */
export function normalizeHeight(text: string): number | null {
  const stripped = text.trim().replace(/,/g, '').replace(/m/g, '').trim();
  if (!DECIMAL_PATTERN.test(stripped)) return null;

  const value = Number.parseFloat(stripped);
  return Number.isFinite(value) ? value : null;
}

/**
 * Build a record from one row. Returns null when the row has fewer than
 * six cells, an empty station name, or a height that does not normalize.
 * The whole row is rejected; nothing is partially salvaged.
 *
 * @example
 * parseGaugeRecord(["Coomera R at Oxenford Weir", "10:00 Mon", "1.23", "steady", "-", "below minor"])
 * // { station_name: "Coomera R at Oxenford Weir", ..., height: 1.23, status: "below minor" }
 */
export function parseGaugeRecord(cells: readonly string[], annotation?: string): GaugeRecord | null {
  if (cells.length < MIN_RECORD_CELLS) return null;

  const stationName = cells[0].trim();
  if (!stationName) return null;

  const height = normalizeHeight(cells[2]);
  if (height === null) return null;

  const record: GaugeRecord = {
    station_name: stationName,
    timestamp: cells[1].trim(),
    height,
    trend: cells[3].trim(),
    status: cells[5].trim(),
    ...(annotation !== undefined ? { annotation } : {}),
  };

  return Object.freeze(record);
}
