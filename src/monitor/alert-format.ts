/**
 * Telegram HTML rendering for a scan's alert batch.
 */

import type { AlertCandidate } from "../types/internal.js";

const PRICE_FORMAT = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 4,
  maximumFractionDigits: 4,
});

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** "2025-03-07 14:05 UTC" */
export function formatUtcMinute(timestampMs: number): string {
  const iso = new Date(timestampMs).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

export function formatPrice(price: number): string {
  return PRICE_FORMAT.format(price);
}

/** At least one decimal: 2 → "2.0", 2.35 → "2.35" */
export function formatRatio(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export interface AlertFormatOptions {
  /** Send time */
  now: number;
  /** Resolves a source id to the name shown in the message */
  sourceName?: (source: AlertCandidate["source"]) => string;
}

/**
 * Render alerts in the given order. Callers pass them already sorted and capped.
 */
export function formatAlertMessage(alerts: readonly AlertCandidate[], options: AlertFormatOptions): string {
  const sourceName = options.sourceName ?? ((source: AlertCandidate["source"]): string => source);

  const lines = [
    "🚨 <b>VOLUME SPIKE ALERT</b>",
    `⏰ ${formatUtcMinute(options.now)}`,
    "✅ Filtered: price below 10-bar avg &amp; within 40% of 30d low",
    "",
  ];

  for (const alert of alerts) {
    lines.push(`<b>${escapeHtml(alert.symbol)}</b>  ${formatRatio(alert.volumeRatio)}x avg volume`);
    lines.push(
      `   Price: $${formatPrice(alert.price)}  |  ${formatRatio(alert.percentAboveLow)}% above 30d low  |  ${escapeHtml(sourceName(alert.source))}`
    );
    lines.push("");
  }

  return lines.join("\n");
}

export function formatTestMessage(coinsMonitored: number, spikeMultiplier: number): string {
  return [
    "✅ <b>Volume spike scanner</b>: test notification",
    "Alerts are working correctly!",
    `Monitoring <b>${coinsMonitored}</b> coins for volume spikes (${spikeMultiplier}× threshold).`,
  ].join("\n");
}
