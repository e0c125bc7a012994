/**
 * 📊 Gauge Table Extraction - RiverGauge-MCP
 *
 * Walks every HTML table of a bulletin, recovers per-row METADATA comments,
 * collects cell text and turns each row into a GaugeRecord.
 *
 * Traversal:
 * - Tables in document order (nested tables included, visited after their parent)
 * - Rows whose nearest enclosing <table> is the current table
 * - <td> cells whose nearest enclosing <tr> is the current row
 *
 * Extraction never fails: rows that do not parse are dropped and a document
 * without tables yields an empty RecordSet.
 *
 * @module tools/tables
 * @see tests/table-extraction.test.ts for the test contract
 */

import * as cheerio from 'cheerio';
import { hasChildren, isComment, isTag, isText } from 'domhandler';
import type { AnyNode, Comment, Element } from 'domhandler';
import type { ExtractedRow, GaugeRecord, RecordSet } from '../types.js';
import { parseGaugeRecord } from './records.js';

// ============================================================================
// Type Definitions
// ============================================================================

/** Marker a row comment must contain to become the row's annotation */
export const ANNOTATION_MARKER = 'METADATA';

/**
 * Statistics from one extraction pass
 */
export interface ExtractGaugeStats {
  /** Number of <table> elements found */
  tables_found: number;
  /** Rows with at least one <td> cell */
  rows_with_cells: number;
  /** Rows that became records */
  records_parsed: number;
  /** Rows dropped by the record parser */
  rows_rejected: number;
}

export interface ExtractGaugeResult {
  records: RecordSet;
  stats: ExtractGaugeStats;
}

// ============================================================================
// Tree Helpers
// ============================================================================

function nearestAncestor(node: AnyNode, tagName: string): Element | null {
  let current = node.parent;
  while (current) {
    if (isTag(current) && current.name === tagName) return current;
    current = current.parent;
  }
  return null;
}

/**
 * Concatenate every descendant text fragment, each trimmed, empties dropped.
 * Text of a table nested inside the node is included in document order.
 */
function strippedText(node: AnyNode): string {
  const fragments: string[] = [];

  const visit = (current: AnyNode): void => {
    if (isText(current)) {
      const fragment = current.data.trim();
      if (fragment) fragments.push(fragment);
      return;
    }
    if (hasChildren(current)) {
      current.children.forEach(visit);
    }
  };

  visit(node);
  return fragments.join('');
}

/**
 * Comments of a row in document order, not descending into nested tables
 * (those belong to the nested table's own rows).
 */
function rowComments(row: Element): Comment[] {
  const comments: Comment[] = [];

  const visit = (current: AnyNode): void => {
    if (isComment(current)) {
      comments.push(current);
      return;
    }
    if (isTag(current) && current.name === 'table') return;
    if (hasChildren(current)) {
      current.children.forEach(visit);
    }
  };

  row.children.forEach(visit);
  return comments;
}

/**
 * First-match policy: later METADATA comments in the same row are ignored.
 */
function findAnnotation(row: Element): string | undefined {
  const comment = rowComments(row).find(c => c.data.includes(ANNOTATION_MARKER));
  return comment?.data.trim();
}

function tableRows($: cheerio.CheerioAPI, table: Element): Element[] {
  return $(table)
    .find('tr')
    .toArray()
    .filter(tr => nearestAncestor(tr, 'table') === table);
}

function rowCells($: cheerio.CheerioAPI, row: Element): string[] {
  return $(row)
    .find('td')
    .toArray()
    .filter(td => nearestAncestor(td, 'tr') === row)
    .map(td => strippedText(td));
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse bulletin markup into a queryable tree.
 */
export function loadDocument(html: string): cheerio.CheerioAPI {
  return cheerio.load(html);
}

/**
 * Collect the raw cell text and annotation of every row that has cells.
 */
export function extractRawRows($: cheerio.CheerioAPI): ExtractedRow[] {
  const rows: ExtractedRow[] = [];

  $('table').each((_, table) => {
    for (const tr of tableRows($, table)) {
      const cells = rowCells($, tr);
      if (cells.length === 0) continue;

      const annotation = findAnnotation(tr);
      rows.push(annotation !== undefined ? { cells, annotation } : { cells });
    }
  });

  return rows;
}

/**
 * Extract gauge records and pass statistics from a parsed document.
 */
export function extractGaugeTable($: cheerio.CheerioAPI): ExtractGaugeResult {
  const rows = extractRawRows($);
  const records: GaugeRecord[] = [];

  for (const row of rows) {
    const record = parseGaugeRecord(row.cells, row.annotation);
    if (record) records.push(record);
  }

  return {
    records,
    stats: {
      tables_found: $('table').length,
      rows_with_cells: rows.length,
      records_parsed: records.length,
      rows_rejected: rows.length - records.length,
    },
  };
}

/**
 * Extract the ordered RecordSet of a parsed document.
 *
 * @example
 * const records = extractGaugeRecords(loadDocument(html));
 * // records[0].station_name === "Coomera R at Oxenford Weir"
 */
export function extractGaugeRecords($: cheerio.CheerioAPI): RecordSet {
  return extractGaugeTable($).records;
}

/**
 * Load and extract in one step.
 */
export function extractGaugeRecordsFromHtml(html: string): RecordSet {
  return extractGaugeRecords(loadDocument(html));
}
