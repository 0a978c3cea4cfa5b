/**
 * PeriodicTask — runs a tick function on a fixed interval.
 *
 * The first tick runs as soon as the task is started. A tick that is still
 * in flight when the next one is due causes that next one to be skipped, so
 * a slow tick never queues up behind itself.
 */

import type { FastifyBaseLogger } from "fastify";

/** Longest delay Node's timers honour; anything larger fires after 1ms */
export const MAX_TIMER_MS = 2 ** 31 - 1;

export type TickFn = () => Promise<unknown> | unknown;

export interface PeriodicTaskOptions {
  /** Name used in log output */
  name: string;
  intervalMs: number;
  logger: FastifyBaseLogger;
}

export class PeriodicTask {
  readonly name: string;
  readonly intervalMs: number;
  private tick: TickFn;
  private logger: FastifyBaseLogger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(tick: TickFn, options: PeriodicTaskOptions) {
    const { intervalMs } = options;
    if (!Number.isInteger(intervalMs) || intervalMs < 1 || intervalMs > MAX_TIMER_MS) {
      throw new RangeError(
        `${options.name}: interval must be a whole number of ms between 1 and ${MAX_TIMER_MS}, got ${intervalMs}`,
      );
    }
    this.tick = tick;
    this.name = options.name;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger;
  }

  /** Start the loop */
  start(): void {
    if (this.timer) return; // already running
    this.timer = setInterval(() => void this.run(), this.intervalMs);
    // Run an initial tick immediately
    void this.run();
  }

  /** Stop the loop. A tick already in flight is allowed to finish. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Whether the loop is scheduled */
  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Run a single tick now. If a tick is already in flight, returns that
   * tick's promise instead of starting another one. Never rejects.
   */
  run(): Promise<void> {
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.execute().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async execute(): Promise<void> {
    try {
      await this.tick();
    } catch (err) {
      this.logger.error({ err, task: this.name }, "periodic task tick failed");
    }
  }
}
