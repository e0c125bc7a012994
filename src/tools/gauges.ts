/**
 * RiverGauge-MCP: Gauge Tools
 *
 * Tool implementations behind the MCP server: one-off extraction from
 * inline HTML or a URL, and access to the configured polling sensors.
 */

import type { ExtractedRow, GaugeRecord, SelectionOutcome, SensorState, ToolError } from "../types.js";
import {
  FetchStationsInputSchema,
  ParseHtmlInputSchema,
  SensorRefreshInputSchema,
  SensorStateInputSchema,
  type FetchStationsInput,
  type ParseHtmlInput,
  type SensorRefreshInput,
  type SensorStateInput,
} from "../schemas.js";
import { createToolError, isToolError } from "../utils.js";
import { getSensorManager } from "../sensor-manager.js";
import { fetchDocument, type FetchFunction, type FtpClientFactory } from "./connect.js";
import { extractGaugeTable, extractRawRows, loadDocument, type ExtractGaugeStats } from "./tables.js";
import { selectStation } from "./select.js";
import { fieldView, type SensorViewResult } from "./views.js";
import type { GaugeCoordinator } from "./coordinator.js";

// ============================================================================
// Shared Result Shapes
// ============================================================================

/**
 * Selection as returned to MCP clients (record copied inline, no index
 * when nothing was selected)
 */
export type SelectionSummary =
  | { outcome: "selected"; index: number; record: GaugeRecord }
  | { outcome: "no_match"; filter: string }
  | { outcome: "empty" };

export interface ExtractStationsResult {
  success: true;
  records: GaugeRecord[];
  selection: SelectionSummary;
  stats: ExtractGaugeStats;
  raw_rows?: ExtractedRow[];
}

function summarizeSelection(outcome: SelectionOutcome): SelectionSummary {
  switch (outcome.kind) {
    case "selected":
      return { outcome: "selected", index: outcome.index, record: outcome.record };
    case "no_match":
      return { outcome: "no_match", filter: outcome.filter };
    case "empty":
      return { outcome: "empty" };
  }
}

// ============================================================================
// Parse HTML
// ============================================================================

export function gaugeParseHtml(input: ParseHtmlInput): ExtractStationsResult {
  const parsed = ParseHtmlInputSchema.parse(input);
  const $ = loadDocument(parsed.html);
  const { records, stats } = extractGaugeTable($);

  return {
    success: true,
    records: [...records],
    selection: summarizeSelection(selectStation(records, parsed.station_filter)),
    stats,
    ...(parsed.include_raw_rows ? { raw_rows: extractRawRows($) } : {}),
  };
}

// ============================================================================
// Fetch Stations
// ============================================================================

export interface FetchStationsResult extends ExtractStationsResult {
  source: {
    url: string;
    sha256: string;
    size_bytes: number;
    fetched_at: string;
  };
}

export interface FetchStationsOptions {
  /** Sent as the User-Agent of http(s) requests (the server passes its configured one) */
  user_agent?: string;
  /** @internal Inject a custom fetch (for testing) */
  _fetch?: FetchFunction;
  /** @internal Inject a custom FTP client (for testing) */
  _ftpClient?: FtpClientFactory;
}

export async function gaugeFetchStations(
  input: FetchStationsInput,
  options: FetchStationsOptions = {}
): Promise<FetchStationsResult | ToolError> {
  const parsed = FetchStationsInputSchema.parse(input);
  const fetched = await fetchDocument({
    url: parsed.url,
    timeout_ms: parsed.timeout_ms,
    user_agent: options.user_agent,
    _fetch: options._fetch,
    _ftpClient: options._ftpClient,
  });
  if (isToolError(fetched)) {
    return fetched;
  }

  const { records, stats } = extractGaugeTable(loadDocument(fetched.content));

  return {
    success: true,
    source: {
      url: parsed.url,
      sha256: fetched.sha256,
      size_bytes: fetched.size_bytes,
      fetched_at: fetched.fetched_at,
    },
    records: [...records],
    selection: summarizeSelection(selectStation(records, parsed.station_filter)),
    stats,
  };
}

// ============================================================================
// Sensors
// ============================================================================

export interface SensorListResult {
  sensors: Array<{
    sensor_id: string;
    name: string;
    url: string;
    station_filter?: string;
    scan_interval_minutes: number;
    polling: boolean;
    available: boolean;
    outcome: SensorState["outcome"];
    updated_at: string | null;
  }>;
  total: number;
}

export function sensorList(): SensorListResult {
  const sensors = getSensorManager().listSensors().map(sensor => {
    const state = sensor.getState();
    return {
      sensor_id: sensor.id,
      name: sensor.config.name,
      url: sensor.config.url,
      station_filter: sensor.config.station_filter,
      scan_interval_minutes: sensor.config.scan_interval_minutes,
      polling: sensor.isPolling(),
      available: state.available,
      outcome: state.outcome,
      updated_at: state.updated_at,
    };
  });

  return { sensors, total: sensors.length };
}

function findSensor(sensorId: string): GaugeCoordinator | ToolError {
  const sensor = getSensorManager().getSensor(sensorId);
  if (!sensor) {
    return createToolError("SENSOR_NOT_FOUND", `Sensor not found: ${sensorId}`, {
      recoverable: false,
      suggestion: "Use rivergauge_sensor_list to see configured sensors",
    });
  }
  return sensor;
}

export function sensorState(input: SensorStateInput): SensorViewResult | ToolError {
  const parsed = SensorStateInputSchema.parse(input);
  const sensor = findSensor(parsed.sensor_id);
  if (isToolError(sensor)) return sensor;

  return fieldView(parsed.view, sensor.config, sensor.getState());
}

export interface SensorRefreshResult {
  sensor_id: string;
  throttled: boolean;
  duration_ms: number;
  available: boolean;
  outcome: SensorState["outcome"];
  error?: string;
  stats?: ExtractGaugeStats;
  view: SensorViewResult;
}

export async function sensorRefresh(input: SensorRefreshInput): Promise<SensorRefreshResult | ToolError> {
  const parsed = SensorRefreshInputSchema.parse(input);
  const sensor = findSensor(parsed.sensor_id);
  if (isToolError(sensor)) return sensor;

  const { state, throttled, duration_ms, stats } = await sensor.refresh({ force: parsed.force });

  return {
    sensor_id: sensor.id,
    throttled,
    duration_ms,
    available: state.available,
    outcome: state.outcome,
    error: state.error,
    stats,
    view: fieldView("consolidated", sensor.config, state),
  };
}
