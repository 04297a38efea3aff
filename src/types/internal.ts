/**
 * Internal types shared by the monitor, notifier and API layers.
 */

import type { SourceId, ListingExchange } from "./candle.js";

// ══════════════════════════════════════════════════════════════════════
// ALERTS
// ══════════════════════════════════════════════════════════════════════

export interface AlertCandidate {
  symbol: string;
  volumeRatio: number;
  percentAboveLow: number;
  /** Close of the most recent candle */
  price: number;
  source: SourceId;
}

export interface TelegramCredentials {
  token: string;
  chatId: string;
}

// ══════════════════════════════════════════════════════════════════════
// SCANNING
// ══════════════════════════════════════════════════════════════════════

export type SchedulerState = "idle" | "scanning";

export type ScanTrigger = "schedule" | "manual";

export interface ScanReport {
  trigger: ScanTrigger;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
  /** Symbols the pipeline ran for */
  scanned: number;
  /** Symbols skipped because they are still cooling down */
  cooling: number;
  /** Symbols no source could serve */
  unavailable: number;
  /** Every signal found, sorted by volume ratio descending */
  signals: AlertCandidate[];
  /** Signals included in the notification batch */
  alerted: AlertCandidate[];
  /** null when nothing was sent */
  delivered: boolean | null;
}

export type UniverseSource = ListingExchange | "builtin";

export interface MonitorStatus {
  running: boolean;
  state: SchedulerState;
  scan_interval_minutes: number;
  alert_cooldown_hours: number;
  spike_threshold: number;
  coins_monitored: number;
  universe_source: UniverseSource;
  recent_alerts: number;
  telegram_configured: boolean;
  last_scan: Pick<ScanReport, "trigger" | "finishedAt" | "scanned" | "alerted" | "delivered"> | null;
}
