/**
 * Gauge Table Extraction Tests
 *
 * Contract for walking bulletin tables and producing the ordered RecordSet:
 * - Every table, every row that belongs to that table
 * - METADATA comments recovered per row (first match wins)
 * - Malformed rows dropped without affecting others
 *
 * The implementation lives in: src/tools/tables.ts
 */

import { describe, it, expect } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import {
  ANNOTATION_MARKER,
  extractGaugeRecords,
  extractGaugeRecordsFromHtml,
  extractGaugeTable,
  extractRawRows,
  loadDocument,
} from '../src/tools/tables.js';

const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');

// ============================================================================
// Test Helpers
// ============================================================================

/**
 * Build a <tr> with one <td> per cell
 */
function row(cells: string[], extra: string = ''): string {
  return `<tr>${extra}${cells.map(c => `<td>${c}</td>`).join('')}</tr>`;
}

function table(...rows: string[]): string {
  return `<table>${rows.join('')}</table>`;
}

// ============================================================================
// Documents without usable tables
// ============================================================================

describe('Empty documents', () => {
  it('returns an empty RecordSet when there are no tables', () => {
    expect(extractGaugeRecordsFromHtml('<html><body><p>No data today</p></body></html>')).toEqual([]);
  });

  it('returns an empty RecordSet for an empty string', () => {
    expect(extractGaugeRecordsFromHtml('')).toEqual([]);
  });

  it('skips rows that contain only header cells', () => {
    const html = table('<tr><th>Station</th><th>Time</th><th>Height</th></tr>');
    const $ = loadDocument(html);
    expect(extractRawRows($)).toEqual([]);
    expect(extractGaugeTable($).stats).toEqual({
      tables_found: 1,
      rows_with_cells: 0,
      records_parsed: 0,
      rows_rejected: 0,
    });
  });

  it('does not throw on badly broken markup', () => {
    expect(() => extractGaugeRecordsFromHtml('<table><tr><td>A<td>B</tr></tr></table><td>')).not.toThrow();
  });
});

// ============================================================================
// Fixture Bulletin
// ============================================================================

describe('Fixture bulletin', () => {
  it('extracts the three valid rows in document order', async () => {
    const html = await fs.readFile(path.join(FIXTURES_DIR, 'river-bulletin.html'), 'utf-8');
    const { records, stats } = extractGaugeTable(loadDocument(html));

    expect(records.map(r => r.station_name)).toEqual([
      'Alpha Creek at Mill Road',
      'Oxenford Weir #',
      'Beta Weir',
    ]);
    expect(stats).toEqual({
      tables_found: 1,
      rows_with_cells: 5,
      records_parsed: 3,
      rows_rejected: 2,
    });
  });

  it('parses every field of a row', async () => {
    const html = await fs.readFile(path.join(FIXTURES_DIR, 'river-bulletin.html'), 'utf-8');
    const records = extractGaugeRecordsFromHtml(html);

    expect(records[1]).toEqual({
      station_name: 'Oxenford Weir #',
      timestamp: '09:15 Mon',
      height: 2310.5,
      trend: 'rising',
      status: 'minor',
    });
  });

  it('recovers the METADATA comment and ignores other comments', async () => {
    const html = await fs.readFile(path.join(FIXTURES_DIR, 'river-bulletin.html'), 'utf-8');
    const records = extractGaugeRecordsFromHtml(html);

    expect(records[0].annotation).toBe('METADATA: gauge recalibrated');
    expect(records[2].annotation).toBeUndefined();
  });

  it('yields equal RecordSets when extracting the same text twice', async () => {
    const html = await fs.readFile(path.join(FIXTURES_DIR, 'river-bulletin.html'), 'utf-8');
    expect(extractGaugeRecordsFromHtml(html)).toEqual(extractGaugeRecordsFromHtml(html));
  });
});

// ============================================================================
// Row Handling
// ============================================================================

describe('Row handling', () => {
  it('drops a four-cell row and keeps the other three rows in order', () => {
    const html = table(
      row(['One', 't1', '1.0', 'steady', '-', 'ok']),
      row(['Two', 't2', '2.0', 'steady']),
      row(['Three', 't3', '3.0', 'rising', '-', 'ok']),
      row(['Four', 't4', '4.0', 'falling', '-', 'ok']),
    );
    const records = extractGaugeRecordsFromHtml(html);

    expect(records).toHaveLength(3);
    expect(records.map(r => r.station_name)).toEqual(['One', 'Three', 'Four']);
  });

  it('keeps duplicate station names', () => {
    const html = table(
      row(['Same', 't1', '1.0', 'steady', '-', 'ok']),
      row(['Same', 't2', '1.5', 'rising', '-', 'ok']),
    );
    expect(extractGaugeRecordsFromHtml(html).map(r => r.height)).toEqual([1, 1.5]);
  });

  it('continues across tables in document order', () => {
    const html =
      table(row(['First', 't', '1', 's', '-', 'ok'])) +
      '<p>between</p>' +
      table(row(['Second', 't', '2', 's', '-', 'ok']));

    expect(extractGaugeRecordsFromHtml(html).map(r => r.station_name)).toEqual(['First', 'Second']);
  });

  it('concatenates trimmed text fragments of a cell without separators', () => {
    const html = table(row(['<b> Coomera R </b>\n  <i>at Weir</i>', 't', '1', 's', '-', 'ok']));
    expect(extractGaugeRecordsFromHtml(html)[0].station_name).toBe('Coomera Rat Weir');
  });

  it('does not treat comment text as cell text', () => {
    const html = table(row(['Station<!-- hidden -->', 't', '1', 's', '-', 'ok']));
    expect(extractGaugeRecordsFromHtml(html)[0].station_name).toBe('Station');
  });

  it('decodes entities in cell text', () => {
    const html = table(row(['Creek &amp; Weir', 't', '1', 's', '-', 'ok']));
    expect(extractGaugeRecordsFromHtml(html)[0].station_name).toBe('Creek & Weir');
  });

  it('reports raw cells for rows the parser rejects', () => {
    const html = table(row(['Gauge', 't', 'n/a', 's', '-', 'ok']));
    expect(extractRawRows(loadDocument(html))).toEqual([
      { cells: ['Gauge', 't', 'n/a', 's', '-', 'ok'] },
    ]);
    expect(extractGaugeRecordsFromHtml(html)).toEqual([]);
  });
});

// ============================================================================
// Annotation Recovery
// ============================================================================

describe('Annotation recovery', () => {
  const cells = ['Gauge', 't', '1', 's', '-', 'ok'];

  it('uses METADATA as the marker', () => {
    expect(ANNOTATION_MARKER).toBe('METADATA');
  });

  it('accepts the marker anywhere in the comment', () => {
    const html = table(row(cells, `<!-- recalibrated, see ${ANNOTATION_MARKER} log -->`));
    expect(extractGaugeRecordsFromHtml(html)[0].annotation).toBe(`recalibrated, see ${ANNOTATION_MARKER} log`);
  });

  it('trims the comment text', () => {
    const html = table(row(cells, '<!-- METADATA: gauge recalibrated -->'));
    expect(extractGaugeRecordsFromHtml(html)[0].annotation).toBe('METADATA: gauge recalibrated');
  });

  it('ignores comments without the marker', () => {
    const html = table(row(cells, '<!-- maintenance note -->'));
    expect(extractGaugeRecordsFromHtml(html)[0].annotation).toBeUndefined();
  });

  it('matches the marker case-sensitively', () => {
    const html = table(row(cells, `<!-- ${ANNOTATION_MARKER.toLowerCase()}: lower case -->`));
    expect(extractGaugeRecordsFromHtml(html)[0].annotation).toBeUndefined();
  });

  it('uses the first METADATA comment when there are several', () => {
    const html = table(row(cells, '<!-- METADATA: first --><!-- METADATA: second -->'));
    expect(extractGaugeRecordsFromHtml(html)[0].annotation).toBe('METADATA: first');
  });

  it('finds comments nested inside a cell', () => {
    const html = table(row(['Gauge<!-- METADATA: in cell -->', 't', '1', 's', '-', 'ok']));
    expect(extractGaugeRecordsFromHtml(html)[0].annotation).toBe('METADATA: in cell');
  });

  it('does not carry an annotation over to the next row', () => {
    const html = table(
      row(cells, '<!-- METADATA: only here -->'),
      row(['Other', 't', '2', 's', '-', 'ok']),
    );
    const records = extractGaugeRecordsFromHtml(html);
    expect(records[0].annotation).toBe('METADATA: only here');
    expect(records[1].annotation).toBeUndefined();
  });
});

// ============================================================================
// Nested Tables
// ============================================================================

describe('Nested tables', () => {
  const inner = table(row(['Inner', 'ti', '9', 'si', '-', 'inner ok']));
  const html = table(
    row([`Outer ${inner}`, 'to', '1', 'so', '-', 'outer ok']),
    row(['Second', 't2', '2', 's2', '-', 'ok']),
  );

  it('does not mix nested rows into the outer row cells', () => {
    const rows = extractRawRows(loadDocument(html));
    expect(rows[0].cells).toHaveLength(6);
    expect(rows[0].cells.slice(1)).toEqual(['to', '1', 'so', '-', 'outer ok']);
  });

  it('includes nested table text in the containing cell', () => {
    const rows = extractRawRows(loadDocument(html));
    expect(rows[0].cells[0]).toBe('OuterInnerti9si-inner ok');
  });

  it('visits the nested table after its parent table', () => {
    const records = extractGaugeRecords(loadDocument(html));
    expect(records.map(r => r.status)).toEqual(['outer ok', 'ok', 'inner ok']);
  });

  it('keeps nested METADATA comments with the nested row', () => {
    const nested = table(row(['Inner', 'ti', '9', 'si', '-', 'ok'], '<!-- METADATA: inner -->'));
    const doc = table(row([`Outer ${nested}`, 'to', '1', 'so', '-', 'ok']));
    const records = extractGaugeRecordsFromHtml(doc);

    expect(records[0].station_name).toBe('OuterInnerti9si-ok');
    expect(records[0].annotation).toBeUndefined();
    expect(records[1].annotation).toBe('METADATA: inner');
  });
});
