/**
 * RiverGauge-MCP: Standalone Check
 *
 * One fetch-extract-select cycle outside the MCP server, rendered as
 * console lines. Entry point: src/cli.ts.
 */

import { SensorConfigSchema } from "./schemas.js";
import { GaugeCoordinator, type GaugeCoordinatorOptions } from "./tools/coordinator.js";
import type { SensorState } from "./types.js";

/**
 * Render the outcome of a single refresh as console lines.
 */
export function formatCheckReport(state: SensorState, unit: string, filter?: string): string[] {
  const lines: string[] = [];
  const record = state.selected;

  if (record) {
    lines.push("Found matching river station:");
    lines.push(`Station: ${record.station_name}`);
    lines.push(`Height: ${record.height} ${unit}`);
    lines.push(`Timestamp: ${record.timestamp}`);
    lines.push(`Trend: ${record.trend}`);
    lines.push(`Status: ${record.status}`);
    if (record.annotation) {
      lines.push(`Annotation: ${record.annotation}`);
    }
    return lines;
  }

  lines.push(state.error ? `Error: ${state.error}` : `No data found for ${filter ?? "(first station)"}`);
  if (state.records.length > 0) {
    lines.push("All available stations:");
    state.records.forEach((river, i) => {
      lines.push(`${i + 1}. ${river.station_name} - Height: ${river.height}${unit}`);
    });
  }
  return lines;
}

export async function runCheck(
  argv: string[],
  options: Pick<GaugeCoordinatorOptions, "_fetch"> = {}
): Promise<{ exitCode: number; lines: string[] }> {
  const [url, ...filterWords] = argv;
  if (!url) {
    return { exitCode: 2, lines: ["Usage: rivergauge-check <url-or-path> [station filter]"] };
  }

  const filter = filterWords.length > 0 ? filterWords.join(" ") : undefined;
  const config = SensorConfigSchema.parse({
    url,
    name: "River Height Check",
    ...(filter !== undefined ? { station_filter: filter } : {}),
  });

  const coordinator = new GaugeCoordinator({ config, _fetch: options._fetch });
  const { state } = await coordinator.refresh();

  return {
    exitCode: state.available ? 0 : 1,
    lines: [
      `Fetching river height data from ${url}`,
      ...(filter !== undefined ? [`Looking for station: ${filter}`] : []),
      "",
      ...formatCheckReport(state, config.unit_of_measurement, filter),
    ],
  };
}
