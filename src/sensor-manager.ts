/**
 * RiverGauge-MCP: Sensor Manager
 *
 * Loads the server configuration, builds one GaugeCoordinator per
 * configured sensor and owns their polling lifecycle.
 */

import * as path from "path";
import { ServerConfigSchema, type ServerConfig, type ServerConfigInput } from "./schemas.js";
import { GaugeCoordinator } from "./tools/coordinator.js";
import type { FetchFunction } from "./tools/connect.js";
import { createToolError, EventLogger, pathExists, readJson } from "./utils.js";

// ============================================================================
// Default Configuration
// ============================================================================

export const CONFIG_FILENAME = "rivergauge.config.json";

const DEFAULT_CONFIG: ServerConfig = ServerConfigSchema.parse({});

/**
 * Read and validate a configuration file. A missing file yields the
 * defaults (no sensors); an invalid one throws a CONFIG_INVALID ToolError.
 */
export async function loadServerConfig(configPath: string): Promise<ServerConfig> {
  if (!await pathExists(configPath)) {
    return DEFAULT_CONFIG;
  }

  let raw: unknown;
  try {
    raw = await readJson(configPath);
  } catch (err) {
    throw createToolError("CONFIG_INVALID", `Config is not valid JSON: ${configPath}`, {
      details: { path: configPath, error: String(err) },
      recoverable: false,
    });
  }

  const parsed = ServerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw createToolError("CONFIG_INVALID", `Invalid config: ${configPath}`, {
      details: parsed.error.issues,
      recoverable: false,
      suggestion: "Each sensor needs a url; names must be unique",
    });
  }
  return parsed.data;
}

// ============================================================================
// Sensor Manager Class
// ============================================================================

export interface SensorManagerOptions {
  /** @internal Inject a custom fetch (for testing) */
  _fetch?: FetchFunction;
}

export class SensorManager {
  private baseDir: string;
  private config: ServerConfig;
  private logger: EventLogger;
  private sensors = new Map<string, GaugeCoordinator>();

  constructor(baseDir: string, config?: ServerConfigInput, options: SensorManagerOptions = {}) {
    this.baseDir = baseDir;
    this.config = config ? ServerConfigSchema.parse(config) : DEFAULT_CONFIG;
    this.logger = new EventLogger(this.getLogsDir());

    for (const sensorConfig of this.config.sensors) {
      const coordinator = new GaugeCoordinator({
        config: sensorConfig,
        logger: this.logger,
        user_agent: this.config.user_agent,
        _fetch: options._fetch,
      });
      this.sensors.set(coordinator.id, coordinator);
    }
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  async init(): Promise<void> {
    await this.logger.init();
  }

  startAll(): void {
    for (const sensor of this.sensors.values()) {
      sensor.start();
    }
  }

  async stopAll(): Promise<void> {
    await Promise.all([...this.sensors.values()].map(sensor => sensor.stop()));
  }

  // --------------------------------------------------------------------------
  // Access
  // --------------------------------------------------------------------------

  getSensor(id: string): GaugeCoordinator | undefined {
    return this.sensors.get(id);
  }

  listSensors(): GaugeCoordinator[] {
    return [...this.sensors.values()];
  }

  getLogsDir(): string {
    return path.resolve(this.baseDir, this.config.logs_dir);
  }

  getConfig(): ServerConfig {
    return this.config;
  }
}

// ============================================================================
// Singleton Instance
// ============================================================================

let globalManager: SensorManager | null = null;

export function initSensorManager(
  baseDir: string,
  config?: ServerConfigInput,
  options?: SensorManagerOptions
): SensorManager {
  globalManager = new SensorManager(baseDir, config, options);
  return globalManager;
}

export function getSensorManager(): SensorManager {
  if (!globalManager) {
    throw new Error("SensorManager not initialized. Call initSensorManager first.");
  }
  return globalManager;
}
