/**
 * Scan Scheduler
 *
 * Sweeps the universe on a fixed delay: resolve candles for every symbol not
 * cooling down, run the spike detector, and send one alert batch with the
 * strongest signals. Scans never queue; the next delay starts when a scan ends.
 * A manual trigger may overlap a scheduled scan.
 */

import { EventEmitter } from "eventemitter3";
import { DEFAULT_SPIKE_OPTIONS, detectSpike, type SpikeDetectorOptions } from "../detect/spike-detector.js";
import type { FallbackResolver } from "../sources/resolver.js";
import type { Interval } from "../types/candle.js";
import type {
  AlertCandidate,
  ScanReport,
  ScanTrigger,
  SchedulerState,
} from "../types/internal.js";
import type { Notifier } from "../notify/telegram.js";
import { logger } from "../utils/logger.js";
import { formatAlertMessage } from "./alert-format.js";
import type { CooldownTracker } from "./cooldown.js";
import type { UniverseManager } from "./universe.js";
import { runPool } from "./worker-pool.js";

const log = logger.child({ component: "scheduler" });

export interface ScanSchedulerOptions {
  scanIntervalMs: number;
  startupDelayMs: number;
  universeRefreshIntervalMs: number;
  concurrency: number;
  maxAlerts: number;
  interval: Interval;
  candleLimit: number;
  requestTimeoutMs: number;
  /** Record cooldowns even when the batch could not be delivered */
  cooldownOnFailedDelivery: boolean;
  detector?: Partial<SpikeDetectorOptions>;
}

export interface ScanSchedulerDeps {
  resolver: Pick<FallbackResolver, "resolve" | "displayName">;
  universe: UniverseManager;
  cooldown: CooldownTracker;
  notifier: Notifier;
  now?: () => number;
}

export interface ScanSchedulerEvents {
  scan: (report: ScanReport) => void;
  alert: (alerts: AlertCandidate[]) => void;
}

export interface SchedulerStatus {
  running: boolean;
  state: SchedulerState;
  lastScan: ScanReport | null;
}

export class ScanScheduler extends EventEmitter<ScanSchedulerEvents> {
  private readonly resolver: ScanSchedulerDeps["resolver"];
  private readonly universe: UniverseManager;
  private readonly cooldown: CooldownTracker;
  private readonly notifier: Notifier;
  private readonly now: () => number;

  private options: ScanSchedulerOptions;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  /** Bumped by start(); loops from an earlier start stop rescheduling */
  private generation = 0;
  private activeScans = 0;
  private lastReport: ScanReport | null = null;

  constructor(deps: ScanSchedulerDeps, options: ScanSchedulerOptions) {
    super();
    this.resolver = deps.resolver;
    this.universe = deps.universe;
    this.cooldown = deps.cooldown;
    this.notifier = deps.notifier;
    this.now = deps.now ?? Date.now;
    this.options = { ...options };
  }

  // ══════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ══════════════════════════════════════════════════════════════════════

  /**
   * Begin the background loop: delay, universe refresh, delay, then scans.
   */
  start(): void {
    if (this.running) {
      log.warn("Scheduler already running");
      return;
    }
    this.running = true;
    const generation = ++this.generation;

    log.info("Scheduler started", {
      scanIntervalMinutes: Math.floor(this.options.scanIntervalMs / 60_000),
      startupDelayMs: this.options.startupDelayMs,
    });

    this.schedule(generation, this.options.startupDelayMs, async () => {
      await this.universe.refresh();
      this.schedule(generation, this.options.startupDelayMs, () => this.loop(generation));
    });
  }

  /**
   * Cancel the pending timer. A scan already in flight runs to completion.
   */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    log.info("Scheduler stopped");
  }

  get isRunning(): boolean {
    return this.running;
  }

  get state(): SchedulerState {
    return this.activeScans > 0 ? "scanning" : "idle";
  }

  status(): SchedulerStatus {
    return {
      running: this.running,
      state: this.state,
      lastScan: this.lastReport,
    };
  }

  private schedule(generation: number, delayMs: number, task: () => Promise<void>): void {
    if (!this.running || generation !== this.generation) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      task().catch((error) => {
        log.error("Scheduled task failed", error instanceof Error ? error : new Error(String(error)));
      });
    }, delayMs);
  }

  private async loop(generation: number): Promise<void> {
    try {
      await this.runScan("schedule");
    } catch (error) {
      log.error("Scan failed", error instanceof Error ? error : new Error(String(error)));
    }

    if (this.refreshDue()) {
      await this.universe.refresh();
    }

    this.schedule(generation, this.options.scanIntervalMs, () => this.loop(generation));
  }

  private refreshDue(): boolean {
    const last = this.universe.refreshedAt;
    return last === null || this.now() - last >= this.options.universeRefreshIntervalMs;
  }

  // ══════════════════════════════════════════════════════════════════════
  // SCANNING
  // ══════════════════════════════════════════════════════════════════════

  /**
   * Start a scan in the background and return immediately.
   */
  scanNow(): void {
    this.runScan("manual").catch((error) => {
      log.error("Manual scan failed", error instanceof Error ? error : new Error(String(error)));
    });
  }

  async runScan(trigger: ScanTrigger = "schedule"): Promise<ScanReport> {
    this.activeScans++;
    const startedAt = this.now();
    const nowSec = Math.floor(startedAt / 1000);

    try {
      const universe = this.universe.symbols();
      const due = universe.filter((symbol) => !this.cooldown.shouldSkip(symbol, nowSec));
      let unavailable = 0;

      log.info("Scan started", { trigger, symbols: due.length, cooling: universe.length - due.length });

      const results = await runPool(due, this.options.concurrency, async (symbol) => {
        const resolved = await this.resolver.resolve(symbol, "crypto", this.options.interval, {
          limit: this.options.candleLimit,
          timeoutMs: this.options.requestTimeoutMs,
        });
        if (resolved.status === "unavailable") {
          unavailable++;
          return undefined;
        }

        const candles = resolved.series.candles;
        const signal = detectSpike(candles, this.options.detector);
        if (!signal) {
          return undefined;
        }

        const candidate: AlertCandidate = {
          symbol,
          volumeRatio: signal.volumeRatio,
          percentAboveLow: signal.percentAboveLow,
          price: candles[candles.length - 1].close,
          source: resolved.source,
        };
        return candidate;
      });

      const signals = results
        .filter((r): r is AlertCandidate => r !== undefined)
        .sort((a, b) => b.volumeRatio - a.volumeRatio);
      const alerted = signals.slice(0, this.options.maxAlerts);

      let delivered: boolean | null = null;
      if (alerted.length > 0) {
        delivered = await this.deliver(alerted, nowSec);
      }

      const finishedAt = this.now();
      const report: ScanReport = {
        trigger,
        startedAt,
        finishedAt,
        durationMs: finishedAt - startedAt,
        scanned: due.length,
        cooling: universe.length - due.length,
        unavailable,
        signals,
        alerted,
        delivered,
      };

      this.lastReport = report;
      this.emit("scan", report);

      if (alerted.length === 0) {
        log.info("Scan complete, no volume spikes detected", { trigger, durationMs: report.durationMs });
      }

      return report;
    } finally {
      this.activeScans--;
    }
  }

  private async deliver(alerted: AlertCandidate[], nowSec: number): Promise<boolean> {
    const message = formatAlertMessage(alerted, {
      now: this.now(),
      sourceName: (source) => this.resolver.displayName(source),
    });

    const delivered = await this.notifier.send(message);

    if (delivered || this.options.cooldownOnFailedDelivery) {
      for (const alert of alerted) {
        this.cooldown.record(alert.symbol, nowSec);
      }
    }

    log.info("Alert batch processed", {
      delivered,
      symbols: alerted.map((a) => a.symbol),
    });

    this.emit("alert", alerted);
    return delivered;
  }

  // ══════════════════════════════════════════════════════════════════════
  // SETTINGS
  // ══════════════════════════════════════════════════════════════════════

  getOptions(): Readonly<ScanSchedulerOptions> {
    return this.options;
  }

  get spikeMultiplier(): number {
    return this.options.detector?.spikeMultiplier ?? DEFAULT_SPIKE_OPTIONS.spikeMultiplier;
  }
}
