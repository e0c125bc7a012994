/**
 * Standalone Check Tests
 *
 * The implementation lives in: src/check.ts
 */

import { describe, it, expect } from 'vitest';
import { formatCheckReport, runCheck } from '../src/check.js';
import type { FetchFunction } from '../src/tools/connect.js';
import type { GaugeRecord, SensorState } from '../src/types.js';

const BULLETIN = [
  '<table>',
  '<tr><td>Alpha Creek</td><td>09:00 Mon</td><td>1.25</td><td>steady</td><td>-</td><td>below minor</td></tr>',
  '<tr><!-- METADATA: gauge recalibrated --><td>Oxenford Weir</td><td>09:15 Mon</td><td>2.45m</td><td>rising</td><td>-</td><td>minor</td></tr>',
  '</table>',
].join('');

const serveBulletin: FetchFunction = async () => new Response(BULLETIN);

const alpha: GaugeRecord = {
  station_name: 'Alpha Creek',
  timestamp: '09:00 Mon',
  height: 1.25,
  trend: 'steady',
  status: 'below minor',
};

function unavailableState(overrides: Partial<SensorState> = {}): SensorState {
  return {
    available: false,
    selected: null,
    records: [],
    outcome: 'empty',
    poll_id: 'poll-1',
    updated_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('formatCheckReport', () => {
  it('prints every field of the selected station', () => {
    const state: SensorState = { ...unavailableState(), available: true, selected: alpha, records: [alpha], outcome: 'selected' };

    expect(formatCheckReport(state, 'm')).toEqual([
      'Found matching river station:',
      'Station: Alpha Creek',
      'Height: 1.25 m',
      'Timestamp: 09:00 Mon',
      'Trend: steady',
      'Status: below minor',
    ]);
  });

  it('lists the available stations when nothing matched', () => {
    const state = unavailableState({ records: [alpha], outcome: 'no_match' });

    expect(formatCheckReport(state, 'm', 'Logan')).toEqual([
      'No data found for Logan',
      'All available stations:',
      '1. Alpha Creek - Height: 1.25m',
    ]);
  });

  it('prints the fetch error', () => {
    const state = unavailableState({ outcome: 'fetch_failed', error: 'HTTP 503: Service Unavailable' });
    expect(formatCheckReport(state, 'm')).toEqual(['Error: HTTP 503: Service Unavailable']);
  });
});

describe('runCheck', () => {
  it('prints usage and exits 2 without a source', async () => {
    const result = await runCheck([]);
    expect(result.exitCode).toBe(2);
    expect(result.lines).toEqual(['Usage: rivergauge-check <url-or-path> [station filter]']);
  });

  it('joins the remaining arguments into the station filter', async () => {
    const result = await runCheck(['https://example.com/bulletin.html', 'oxenford', 'weir'], {
      _fetch: serveBulletin,
    });

    expect(result.exitCode).toBe(0);
    expect(result.lines).toEqual([
      'Fetching river height data from https://example.com/bulletin.html',
      'Looking for station: oxenford weir',
      '',
      'Found matching river station:',
      'Station: Oxenford Weir',
      'Height: 2.45 m',
      'Timestamp: 09:15 Mon',
      'Trend: rising',
      'Status: minor',
      'Annotation: METADATA: gauge recalibrated',
    ]);
  });

  it('exits 1 and lists stations when the filter matches nothing', async () => {
    const result = await runCheck(['https://example.com/bulletin.html', 'Logan'], { _fetch: serveBulletin });

    expect(result.exitCode).toBe(1);
    expect(result.lines.slice(3)).toEqual([
      'No data found for Logan',
      'All available stations:',
      '1. Alpha Creek - Height: 1.25m',
      '2. Oxenford Weir - Height: 2.45m',
    ]);
  });
});
