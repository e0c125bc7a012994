/**
 * RiverGauge-MCP: Zod Schemas for Configuration and Tool Input Validation
 *
 * Every tool has a strict schema that enforces type safety and provides
 * clear error messages for invalid inputs.
 */

import { z } from "zod";

// ============================================================================
// Common Schemas
// ============================================================================

export const SourceSchema = z.string().min(1)
  .describe("http(s) URL, file:// URL or local path of the gauge bulletin");
export const StationFilterSchema = z.string()
  .describe("Case-insensitive substring of the station name; first match wins");
export const SensorIdSchema = z.string().min(1)
  .describe("Sensor identifier (lower-cased name with spaces as underscores)");

// ============================================================================
// Configuration Schemas
// ============================================================================

export const SensorConfigSchema = z.object({
  url: SourceSchema,
  name: z.string().min(1).default("River Height")
    .describe("Display name of the sensor"),
  unit_of_measurement: z.string().default("m")
    .describe("Unit label published with the height"),
  station_filter: StationFilterSchema.optional(),
  scan_interval_minutes: z.number().min(1).max(1440).default(30)
    .describe("Minimum minutes between fetches"),
  timeout_ms: z.number().int().min(1000).max(60000).default(10000)
    .describe("Fetch timeout in milliseconds"),
}).strict();

export const ServerConfigSchema = z.object({
  sensors: z.array(SensorConfigSchema).default([])
    .refine(
      sensors => new Set(sensors.map(s => s.name.toLowerCase().replace(/ /g, "_"))).size === sensors.length,
      { message: "Sensor names must be unique" }
    ),
  logs_dir: z.string().default("logs")
    .describe("Directory for events.ndjson / errors.ndjson (relative to the server base dir)"),
  user_agent: z.string().default("RiverGauge/1.0"),
  autostart: z.boolean().default(true)
    .describe("Start polling every sensor when the server starts"),
}).strict();

// ============================================================================
// Tool Input Schemas
// ============================================================================

export const ParseHtmlInputSchema = z.object({
  html: z.string().describe("Bulletin HTML to extract readings from"),
  station_filter: StationFilterSchema.optional(),
  include_raw_rows: z.boolean().default(false)
    .describe("Also return the raw cell text of every row (diagnostics)"),
}).strict();

export const FetchStationsInputSchema = z.object({
  url: SourceSchema,
  station_filter: StationFilterSchema.optional(),
  timeout_ms: z.number().int().min(1000).max(60000).default(10000)
    .describe("Request timeout in milliseconds"),
}).strict();

export const SensorListInputSchema = z.object({}).strict();

export const SensorStateInputSchema = z.object({
  sensor_id: SensorIdSchema,
  view: z.enum(["consolidated", "height", "station", "timestamp", "trend", "status"])
    .default("consolidated")
    .describe("Which projection of the sensor state to return"),
}).strict();

export const SensorRefreshInputSchema = z.object({
  sensor_id: SensorIdSchema,
  force: z.boolean().default(false)
    .describe("Fetch even if the scan interval has not elapsed"),
}).strict();

// ============================================================================
// Export type inference helpers
// ============================================================================

export type SensorConfig = z.infer<typeof SensorConfigSchema>;
export type SensorConfigInput = z.input<typeof SensorConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ServerConfigInput = z.input<typeof ServerConfigSchema>;
export type ParseHtmlInput = z.input<typeof ParseHtmlInputSchema>;
export type FetchStationsInput = z.input<typeof FetchStationsInputSchema>;
export type SensorStateInput = z.input<typeof SensorStateInputSchema>;
export type SensorRefreshInput = z.input<typeof SensorRefreshInputSchema>;

// ============================================================================
// Schema Aliases (for MCP tool registration)
// ============================================================================

export const ParseHtmlSchema = ParseHtmlInputSchema;
export const FetchStationsSchema = FetchStationsInputSchema;
export const SensorListSchema = SensorListInputSchema;
export const SensorStateSchema = SensorStateInputSchema;
export const SensorRefreshSchema = SensorRefreshInputSchema;
