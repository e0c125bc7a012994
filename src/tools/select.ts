/**
 * RiverGauge-MCP: Station Selection
 *
 * Resolves a station filter against an extracted RecordSet. The first
 * record in document order wins; ambiguous or duplicate names are not
 * reported.
 *
 * @module tools/select
 */

import type { GaugeRecord, RecordSet, SelectionOutcome } from '../types.js';

/**
 * Case-insensitive substring match of a filter against a station name.
 * An empty filter matches every station.
 */
export function titleMatches(record: GaugeRecord, filter: string): boolean {
  return record.station_name.toLowerCase().includes(filter.toLowerCase());
}

/**
 * Pick the active record.
 *
 * - No filter: the first record
 * - Filter (including ""): the first record whose name contains it
 * - Empty set: always `empty`, with or without a filter
 *
 * @example
 * selectStation(records, "weir")
 * // { kind: "selected", record: <Oxenford Weir>, index: 1 }
 */
export function selectStation(records: RecordSet, filter?: string): SelectionOutcome {
  if (records.length === 0) {
    return { kind: 'empty' };
  }

  if (filter === undefined) {
    return { kind: 'selected', record: records[0], index: 0 };
  }

  const index = records.findIndex(record => titleMatches(record, filter));
  if (index < 0) {
    return { kind: 'no_match', filter };
  }

  return { kind: 'selected', record: records[index], index };
}
