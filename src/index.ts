#!/usr/bin/env node
/**
 * RiverGauge-MCP: Main Server Entry Point
 *
 * Publishes river gauge readings extracted from HTML bulletins over MCP.
 * Each configured sensor polls its bulletin on a fixed interval and exposes
 * the selected station's height plus every extracted station.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { fileURLToPath } from "url";
import * as path from "path";

import {
  gaugeParseHtml,
  gaugeFetchStations,
  sensorList,
  sensorState,
  sensorRefresh,
} from "./tools/gauges.js";

import {
  ParseHtmlSchema,
  FetchStationsSchema,
  SensorListSchema,
  SensorStateSchema,
  SensorRefreshSchema,
} from "./schemas.js";

import { CONFIG_FILENAME, getSensorManager, initSensorManager, loadServerConfig } from "./sensor-manager.js";
import { formatErrorResponse, isToolError } from "./utils.js";

// Get the directory where the MCP server is installed
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const SERVER_BASE_DIR = path.resolve(__dirname, "..");

function toolResponse(result: unknown) {
  if (isToolError(result)) {
    return formatErrorResponse(result);
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}

// Initialize the MCP server
const server = new McpServer({
  name: "rivergauge-mcp",
  version: "0.1.0",
});

// ============================================================================
// EXTRACTION TOOLS
// ============================================================================

server.tool(
  "rivergauge_parse_html",
  "Extract river gauge readings from bulletin HTML passed inline. Every table row with at least six cells and a numeric height becomes a record (station, timestamp, height, trend, status, optional METADATA annotation). Optionally selects the first station matching a filter.",
  ParseHtmlSchema.shape,
  async (args) => toolResponse(gaugeParseHtml(args))
);

server.tool(
  "rivergauge_fetch_stations",
  "Fetch a gauge bulletin from an http(s) or ftp URL or a local file once, extract every station reading and select the first station matching the optional filter.",
  FetchStationsSchema.shape,
  async (args) => toolResponse(await gaugeFetchStations(args, {
    user_agent: getSensorManager().getConfig().user_agent,
  }))
);

// ============================================================================
// SENSOR TOOLS
// ============================================================================

server.tool(
  "rivergauge_sensor_list",
  "List configured river gauge sensors with their source, filter, polling interval and availability.",
  SensorListSchema.shape,
  async () => toolResponse(sensorList())
);

server.tool(
  "rivergauge_sensor_state",
  "Read the current state of a sensor. The consolidated view returns the height with station, timestamp, trend, status, annotation and all_stations as attributes; the other views return a single field.",
  SensorStateSchema.shape,
  async (args) => toolResponse(sensorState(args))
);

server.tool(
  "rivergauge_sensor_refresh",
  "Refresh a sensor now. Calls within the scan interval return the current state unless force is set. A failed fetch marks the sensor unavailable.",
  SensorRefreshSchema.shape,
  async (args) => toolResponse(await sensorRefresh(args))
);

// ============================================================================
// SERVER STARTUP
// ============================================================================

async function main() {
  const configPath = process.env.RIVERGAUGE_CONFIG ?? path.join(SERVER_BASE_DIR, CONFIG_FILENAME);
  const config = await loadServerConfig(configPath);

  const manager = initSensorManager(SERVER_BASE_DIR, config);
  await manager.init();
  if (config.autostart) {
    manager.startAll();
  }

  const shutdown = (signal: string) => {
    console.error(`Received ${signal}, stopping sensors`);
    manager.stopAll().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("Error while stopping sensors:", error);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  // Connect via stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error("RiverGauge-MCP server started");
  console.error(`  Config: ${configPath}`);
  console.error(`  Sensors: ${manager.listSensors().map(s => s.id).join(", ") || "(none)"}`);
  console.error(`  Logs directory: ${manager.getLogsDir()}`);
}

main().catch((error: unknown) => {
  if (isToolError(error)) {
    console.error(formatErrorResponse(error).content[0].text);
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
});
