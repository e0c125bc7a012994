/**
 * RiverGauge-MCP: Gauge Coordinator
 *
 * Owns the state of one sensor: fetches its bulletin, extracts the RecordSet,
 * selects the active station and publishes the result as a single state
 * object. A refresh either replaces the whole state or, on failure, replaces
 * it with an unavailable one; data from an earlier cycle is never reused.
 *
 * @module tools/coordinator
 * @see tests/coordinator.test.ts
 */

import type { GaugeRecord, RecordSet, RefreshOutcome, SensorState } from "../types.js";
import type { SensorConfig } from "../schemas.js";
import { fetchDocument, type FetchFunction } from "./connect.js";
import { extractGaugeTable, loadDocument, type ExtractGaugeStats } from "./tables.js";
import { selectStation } from "./select.js";
import { PollScheduler } from "./scheduler.js";
import { sensorIdFromName } from "./views.js";
import {
  createLogEntry,
  generatePollId,
  isToolError,
  now,
  timed,
  type GaugeLogger,
} from "../utils.js";

// ============================================================================
// Types
// ============================================================================

export interface GaugeCoordinatorOptions {
  config: SensorConfig;
  logger?: GaugeLogger;
  user_agent?: string;
  /** @internal Inject a custom fetch (for testing) */
  _fetch?: FetchFunction;
  /** @internal Clock in epoch milliseconds (for testing) */
  _now?: () => number;
}

export interface RefreshResult {
  state: SensorState;
  /** True when the call was skipped because the scan interval had not elapsed */
  throttled: boolean;
  duration_ms: number;
  stats?: ExtractGaugeStats;
}

const PENDING_STATE: SensorState = Object.freeze<SensorState>({
  available: false,
  selected: null,
  records: [],
  outcome: "pending",
  poll_id: null,
  updated_at: null,
});

// ============================================================================
// Coordinator
// ============================================================================

export class GaugeCoordinator {
  readonly id: string;
  readonly config: SensorConfig;

  private state: SensorState = PENDING_STATE;
  private lastAttemptAt: number | null = null;
  private inFlight: Promise<RefreshResult> | null = null;
  private readonly scheduler: PollScheduler;
  private readonly logger?: GaugeLogger;
  private readonly userAgent?: string;
  private readonly fetchFn?: FetchFunction;
  private readonly clock: () => number;

  constructor(options: GaugeCoordinatorOptions) {
    this.config = options.config;
    this.id = sensorIdFromName(options.config.name);
    this.logger = options.logger;
    this.userAgent = options.user_agent;
    this.fetchFn = options._fetch;
    this.clock = options._now ?? Date.now;
    this.scheduler = new PollScheduler({
      interval_ms: this.intervalMs,
      // The scheduler already spaces runs by the interval
      task: () => this.refresh({ force: true }),
      onError: (error) => {
        console.error(`Sensor ${this.id} refresh failed:`, error);
      },
    });
  }

  get intervalMs(): number {
    return this.config.scan_interval_minutes * 60_000;
  }

  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  getState(): SensorState {
    return this.state;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  start(): void {
    this.scheduler.start();
  }

  async stop(): Promise<void> {
    this.scheduler.stop();
    await this.scheduler.idle();
  }

  isPolling(): boolean {
    return this.scheduler.isRunning();
  }

  // --------------------------------------------------------------------------
  // Refresh
  // --------------------------------------------------------------------------

  /**
   * Fetch, extract and select. Calls within the scan interval of the last
   * attempt return the current state unless `force` is set; concurrent
   * callers share the refresh in progress.
   */
  async refresh(options: { force?: boolean } = {}): Promise<RefreshResult> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const started = this.clock();
    if (!options.force && this.lastAttemptAt !== null && started - this.lastAttemptAt < this.intervalMs) {
      return { state: this.state, throttled: true, duration_ms: 0 };
    }

    this.lastAttemptAt = started;
    this.inFlight = this.runRefresh().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async runRefresh(): Promise<RefreshResult> {
    const pollId = generatePollId();
    const { url, station_filter: filter, timeout_ms } = this.config;

    const { result, duration_ms } = await timed(() => fetchDocument({
      url,
      timeout_ms,
      user_agent: this.userAgent,
      _fetch: this.fetchFn,
    }));

    if (isToolError(result)) {
      this.publish(unavailable(pollId, "fetch_failed", [], result.message));
      await this.log("error", `Error fetching river height data from ${url}`, {
        poll_id: pollId,
        code: result.code,
        error: result.message,
      });
      return { state: this.state, throttled: false, duration_ms };
    }

    const { records, stats } = extractGaugeTable(loadDocument(result.content));
    const outcome = selectStation(records, filter);

    switch (outcome.kind) {
      case "empty":
        this.publish(unavailable(pollId, "empty", records, undefined, result.sha256));
        await this.log("warn", `No river data found at ${url}`, { poll_id: pollId, stats });
        break;

      case "no_match":
        this.publish(unavailable(pollId, "no_match", records, undefined, result.sha256));
        await this.log("warn", `Could not find river matching filter: ${outcome.filter}`, {
          poll_id: pollId,
          stations: records.length,
        });
        break;

      case "selected":
        this.publish(available(pollId, outcome.record, records, result.sha256));
        await this.log("info", `Selected ${outcome.record.station_name}`, {
          poll_id: pollId,
          height: outcome.record.height,
          index: outcome.index,
          stations: records.length,
        });
        break;
    }

    return { state: this.state, throttled: false, duration_ms, stats };
  }

  private publish(next: SensorState): void {
    this.state = Object.freeze(next);
  }

  /**
   * Event log failures go to stderr; the state is already published.
   */
  private async log(level: "info" | "warn" | "error", message: string, data: unknown): Promise<void> {
    if (!this.logger) return;
    try {
      await this.logger.log(createLogEntry(level, this.id, "refresh", message, data));
    } catch (error) {
      console.error(`Sensor ${this.id} could not write event log:`, error);
    }
  }
}

// ============================================================================
// State Builders
// ============================================================================

function available(pollId: string, selected: GaugeRecord, records: RecordSet, contentHash: string): SensorState {
  return {
    available: true,
    selected,
    records,
    outcome: "selected",
    poll_id: pollId,
    updated_at: now(),
    content_hash: contentHash,
  };
}

function unavailable(
  pollId: string,
  outcome: Exclude<RefreshOutcome, "selected" | "pending">,
  records: RecordSet,
  error?: string,
  contentHash?: string
): SensorState {
  return {
    available: false,
    selected: null,
    records,
    outcome,
    poll_id: pollId,
    updated_at: now(),
    ...(contentHash !== undefined ? { content_hash: contentHash } : {}),
    ...(error !== undefined ? { error } : {}),
  };
}
