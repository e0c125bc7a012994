#!/usr/bin/env node
/**
 * RiverGauge-MCP: Standalone Check CLI
 *
 *   rivergauge-check <url-or-path> [station filter]
 */

import { runCheck } from "./check.js";

runCheck(process.argv.slice(2)).then(
  ({ exitCode, lines }) => {
    for (const line of lines) console.log(line);
    process.exit(exitCode);
  },
  (error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  }
);
