/**
 * RiverGauge-MCP: Poll Scheduler
 *
 * Runs one task repeatedly, waiting `interval_ms` after each run completes
 * before starting the next. Runs never overlap.
 */

export interface PollSchedulerOptions {
  interval_ms: number;
  task: () => Promise<unknown>;
  /** Receives the error of a rejected run (default: stderr); the schedule continues */
  onError?: (error: unknown) => void;
}

export class PollScheduler {
  private readonly intervalMs: number;
  private readonly task: () => Promise<unknown>;
  private readonly onError: (error: unknown) => void;

  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private inFlight: Promise<void> | null = null;

  constructor(options: PollSchedulerOptions) {
    if (!(options.interval_ms > 0)) {
      throw new RangeError(`interval_ms must be positive, got ${options.interval_ms}`);
    }
    this.intervalMs = options.interval_ms;
    this.task = options.task;
    this.onError = options.onError ?? ((error) => console.error("Poll task failed:", error));
  }

  /**
   * Start polling. The first run happens immediately.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    // Restarted while the previous run is still going: its completion reschedules
    if (!this.inFlight) this.runOnce();
  }

  /**
   * Cancel the pending run. A run already in progress finishes but does not
   * reschedule; await `idle()` to wait for it.
   */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Resolves once no run is in progress.
   */
  async idle(): Promise<void> {
    await this.inFlight;
  }

  private runOnce(): void {
    this.timer = null;
    this.inFlight = this.task()
      .then(
        () => undefined,
        (error: unknown) => {
          this.onError(error);
        }
      )
      .finally(() => {
        this.inFlight = null;
        if (this.running) {
          this.timer = setTimeout(() => this.runOnce(), this.intervalMs);
        }
      });
  }
}
