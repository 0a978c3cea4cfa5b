/**
 * SubExporter — the fetch/update double loop shared by every exporter.
 *
 *  - The fetch loop pulls from upstream on `fetchIntervalMs` and swaps in a
 *    new snapshot only when the whole fetch succeeded.
 *  - The update loop writes the latest snapshot into gauges on
 *    `updateIntervalMs`. It never does I/O, so a slow or failing upstream
 *    leaves the last good values in place instead of zeroing them.
 *
 * Subclasses provide `fetchSnapshot()` (I/O + decoding + derivation) and
 * `publish()` (snapshot → gauges), and register their gauges in their
 * constructor via `createGauge()`.
 */

import type { FastifyBaseLogger } from "fastify";
import { Gauge, type Registry } from "prom-client";
import type { Static, TSchema } from "@sinclair/typebox";
import type { ISubExporter, SubExporterName } from "@livepeer-exporter/shared";
import { MAX_TIMER_MS, PeriodicTask } from "../lib/periodic-task.js";
import { fetchJson } from "./fetch-json.js";

export interface SubExporterOptions {
  /** Orchestrator address the exporter reports on */
  address: string;
  fetchIntervalMs: number;
  updateIntervalMs: number;
  /** Registry the exporter's gauges are registered on */
  registry: Registry;
  logger: FastifyBaseLogger;
  /** Upstream request timeout in ms (default: the fetch interval) */
  requestTimeoutMs?: number;
}

export abstract class SubExporter<TSnapshot> implements ISubExporter<TSnapshot> {
  readonly name: SubExporterName;
  readonly address: string;
  protected readonly registry: Registry;
  protected readonly logger: FastifyBaseLogger;
  protected readonly requestTimeoutMs: number;
  private readonly fetchTask: PeriodicTask;
  private readonly updateTask: PeriodicTask;

  /** Latest published snapshot; replaced as a whole, never mutated */
  private latest: TSnapshot | null = null;

  protected constructor(name: SubExporterName, options: SubExporterOptions) {
    this.name = name;
    this.address = options.address;
    this.registry = options.registry;
    this.logger = options.logger.child({ exporter: name });
    // AbortSignal.timeout takes a whole number of ms
    const timeout = Math.round(options.requestTimeoutMs ?? options.fetchIntervalMs);
    this.requestTimeoutMs = Math.min(Math.max(timeout, 1), MAX_TIMER_MS);

    this.fetchTask = new PeriodicTask(() => this.fetch(), {
      name: `${name}:fetch`,
      intervalMs: options.fetchIntervalMs,
      logger: this.logger,
    });
    this.updateTask = new PeriodicTask(() => this.update(), {
      name: `${name}:update`,
      intervalMs: options.updateIntervalMs,
      logger: this.logger,
    });
  }

  /** Start the fetch and update loops */
  start(): void {
    this.fetchTask.start();
    this.updateTask.start();
  }

  /** Stop both loops */
  stop(): void {
    this.fetchTask.stop();
    this.updateTask.stop();
  }

  get isRunning(): boolean {
    return this.fetchTask.isRunning && this.updateTask.isRunning;
  }

  get snapshot(): TSnapshot | null {
    return this.latest;
  }

  async fetch(): Promise<boolean> {
    try {
      this.latest = await this.fetchSnapshot();
      return true;
    } catch (err) {
      this.logger.error({ err }, "fetch failed, keeping previous snapshot");
      return false;
    }
  }

  update(): boolean {
    const snapshot = this.latest;
    if (!snapshot) return false;

    try {
      this.publish(snapshot);
      return true;
    } catch (err) {
      this.logger.error({ err }, "update failed, skipping tick");
      return false;
    }
  }

  // -----------------------------------------------------------------------
  // Subclass hooks
  // -----------------------------------------------------------------------

  /** Fetch and decode a complete snapshot; throw on any failure */
  protected abstract fetchSnapshot(): Promise<TSnapshot>;

  /** Write a snapshot into the exporter's gauges */
  protected abstract publish(snapshot: TSnapshot): void;

  // -----------------------------------------------------------------------
  // Helpers for subclasses
  // -----------------------------------------------------------------------

  protected createGauge<T extends string = string>(
    name: string,
    help: string,
    labelNames: readonly T[] = [],
  ): Gauge<T> {
    return new Gauge<T>({ name, help, labelNames, registers: [this.registry] });
  }

  protected getJson<T extends TSchema>(url: string, schema: T): Promise<Static<T>> {
    return fetchJson(url, schema, { timeoutMs: this.requestTimeoutMs });
  }
}
