/**
 * RiverGauge-MCP: Sensor Views
 *
 * Read-only projections of a sensor state. Each view exposes one facet of
 * the selected record; the consolidated view carries every field plus the
 * whole station list.
 */

import type {
  RecordSet,
  SensorAttributes,
  SensorState,
  SensorView,
  StationSummary,
} from "../types.js";
import type { SensorConfig } from "../schemas.js";

export interface SensorViewResult {
  sensor_id: string;
  name: string;
  view: SensorView;
  available: boolean;
  value: number | string | null;
  unit_of_measurement?: string;
  attributes?: SensorAttributes;
  updated_at: string | null;
}

/**
 * Stable sensor id: lower-cased name, spaces replaced by underscores
 *
 * @example
 * sensorIdFromName("River Height") // "river_height"
 */
export function sensorIdFromName(name: string): string {
  return name.toLowerCase().replace(/ /g, "_");
}

// ============================================================================
// Field Projections
// ============================================================================

export const heightValue = (state: SensorState): number | null => state.selected?.height ?? null;
export const stationValue = (state: SensorState): string | null => state.selected?.station_name ?? null;
export const timestampValue = (state: SensorState): string | null => state.selected?.timestamp ?? null;
export const trendValue = (state: SensorState): string | null => state.selected?.trend ?? null;
export const statusValue = (state: SensorState): string | null => state.selected?.status ?? null;

const FIELD_VIEWS: Record<Exclude<SensorView, "consolidated">, (state: SensorState) => number | string | null> = {
  height: heightValue,
  station: stationValue,
  timestamp: timestampValue,
  trend: trendValue,
  status: statusValue,
};

/**
 * Attributes of the selected record; empty when nothing is selected.
 */
export function sensorAttributes(state: SensorState): SensorAttributes {
  const record = state.selected;
  if (!record) return {};

  const attrs: SensorAttributes = {
    station_name: record.station_name,
    timestamp: record.timestamp,
    trend: record.trend,
    status: record.status,
  };
  if (record.annotation) {
    attrs.annotation = record.annotation;
  }
  return attrs;
}

export function summarizeStations(records: RecordSet): StationSummary[] {
  return records.map(record => ({
    station_name: record.station_name,
    height: record.height,
    timestamp: record.timestamp,
    trend: record.trend,
    status: record.status,
  }));
}

// ============================================================================
// Views
// ============================================================================

/**
 * Height as the value, every field plus `all_stations` as attributes.
 */
export function consolidatedView(config: SensorConfig, state: SensorState): SensorViewResult {
  const attributes: SensorAttributes = state.selected
    ? { ...sensorAttributes(state), all_stations: summarizeStations(state.records) }
    : {};

  return {
    sensor_id: sensorIdFromName(config.name),
    name: config.name,
    view: "consolidated",
    available: state.available,
    value: heightValue(state),
    unit_of_measurement: config.unit_of_measurement,
    attributes,
    updated_at: state.updated_at,
  };
}

export function fieldView(view: SensorView, config: SensorConfig, state: SensorState): SensorViewResult {
  if (view === "consolidated") {
    return consolidatedView(config, state);
  }

  const result: SensorViewResult = {
    sensor_id: sensorIdFromName(config.name),
    name: config.name,
    view,
    available: state.available,
    value: FIELD_VIEWS[view](state),
    updated_at: state.updated_at,
  };

  if (view === "height") {
    result.unit_of_measurement = config.unit_of_measurement;
    result.attributes = sensorAttributes(state);
  }
  return result;
}
