/**
 * Provider rows → Candle Normalizer
 *
 * Turns each provider's native candle layout into the canonical Candle shape
 * and enforces the series invariants: strictly ascending timestamps, positive
 * prices, non-negative volume, and at least MIN_SERIES_LENGTH bars.
 */

import { parse } from "csv-parse/sync";
import {
  MIN_SERIES_LENGTH,
  type Candle,
  type CandleSeries,
  type FetchOutcome,
  type Interval,
  type KlineRow,
  type SourceId,
} from "../types/candle.js";
import type { YahooChartResult } from "../types/providers.js";

// ══════════════════════════════════════════════════════════════════════
// COLUMN LAYOUTS
// ══════════════════════════════════════════════════════════════════════

export type RowOrder = "oldest-first" | "newest-first";

export interface ColumnLayout {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  /** Multiplier turning the provider timestamp into milliseconds */
  timestampScale: number;
  order: RowOrder;
}

/** [time(s), open, close, high, low, volume, turnover], newest first */
export const KUCOIN_LAYOUT: ColumnLayout = {
  timestamp: 0, open: 1, close: 2, high: 3, low: 4, volume: 5,
  timestampScale: 1000,
  order: "newest-first",
};

/** [ts(ms), open, high, low, close, vol, ...], newest first */
export const OKX_LAYOUT: ColumnLayout = {
  timestamp: 0, open: 1, high: 2, low: 3, close: 4, volume: 5,
  timestampScale: 1,
  order: "newest-first",
};

/** [openTime(ms), open, high, low, close, volume, ...], oldest first */
export const BINANCE_LAYOUT: ColumnLayout = {
  timestamp: 0, open: 1, high: 2, low: 3, close: 4, volume: 5,
  timestampScale: 1,
  order: "oldest-first",
};

// ══════════════════════════════════════════════════════════════════════
// FIELD COERCION
// ══════════════════════════════════════════════════════════════════════

/**
 * Coerce a provider value to a finite number.
 * Empty strings, null and the literal "null" count as missing.
 */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "" || trimmed === "null") {
      return undefined;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Build one candle, or nothing when a price field is missing or not positive.
 */
export function toCandle(
  timestamp: number | undefined,
  open: unknown,
  high: unknown,
  low: unknown,
  close: unknown,
  volume: unknown
): Candle | undefined {
  const o = toNumber(open);
  const h = toNumber(high);
  const l = toNumber(low);
  const c = toNumber(close);

  if (timestamp === undefined || !Number.isFinite(timestamp) || timestamp <= 0) {
    return undefined;
  }
  if (o === undefined || h === undefined || l === undefined || c === undefined) {
    return undefined;
  }
  if (o <= 0 || h <= 0 || l <= 0 || c <= 0) {
    return undefined;
  }

  const v = toNumber(volume);

  return {
    timestamp,
    open: o,
    high: h,
    low: l,
    close: c,
    volume: v !== undefined && v >= 0 ? v : 0,
  };
}

// ══════════════════════════════════════════════════════════════════════
// ORDERING
// ══════════════════════════════════════════════════════════════════════

/**
 * Put candles oldest first with strictly ascending timestamps.
 * When two rows share a timestamp the last one read wins.
 */
export function orderCandles(candles: Candle[], order: RowOrder): Candle[] {
  const ascending = order === "newest-first" ? [...candles].reverse() : [...candles];

  let sorted = true;
  for (let i = 1; i < ascending.length; i++) {
    if (ascending[i].timestamp <= ascending[i - 1].timestamp) {
      sorted = false;
      break;
    }
  }
  if (sorted) {
    return ascending;
  }

  const byTime = new Map<number, Candle>();
  for (const candle of ascending) {
    byTime.set(candle.timestamp, candle);
  }
  return Array.from(byTime.values()).sort((a, b) => a.timestamp - b.timestamp);
}

// ══════════════════════════════════════════════════════════════════════
// PROVIDER ROW MAPPERS
// ══════════════════════════════════════════════════════════════════════

/**
 * Map an array-of-arrays payload using a column layout.
 * Returns undefined when the payload is not an array at all.
 */
export function normalizeRows(rows: unknown, layout: ColumnLayout): Candle[] | undefined {
  if (!Array.isArray(rows)) {
    return undefined;
  }

  const candles: Candle[] = [];
  for (const row of rows) {
    if (!Array.isArray(row) || row.length <= Math.max(layout.open, layout.high, layout.low, layout.close)) {
      continue;
    }
    const rawTime = toNumber(row[layout.timestamp]);
    const candle = toCandle(
      rawTime !== undefined ? Math.trunc(rawTime * layout.timestampScale) : undefined,
      row[layout.open],
      row[layout.high],
      row[layout.low],
      row[layout.close],
      row[layout.volume]
    );
    if (candle) {
      candles.push(candle);
    }
  }

  return orderCandles(candles, layout.order);
}

/**
 * Map a Yahoo chart result (parallel arrays, timestamps in seconds).
 */
export function normalizeYahooChart(result: YahooChartResult): Candle[] | undefined {
  const timestamps = result.timestamp;
  const quote = result.indicators?.quote?.[0];
  if (!Array.isArray(timestamps) || !quote) {
    return undefined;
  }

  const candles: Candle[] = [];
  timestamps.forEach((ts, i) => {
    const candle = toCandle(
      ts * 1000,
      quote.open?.[i],
      quote.high?.[i],
      quote.low?.[i],
      quote.close?.[i],
      quote.volume?.[i]
    );
    if (candle) {
      candles.push(candle);
    }
  });

  return orderCandles(candles, "oldest-first");
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2}))?$/;

/**
 * Parse "YYYY-MM-DD" or "YYYY-MM-DD HH:mm:ss" as UTC milliseconds.
 */
export function parseCsvDate(value: string): number | undefined {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, y, mo, d, h = "0", mi = "0", s = "0"] = match;
  const ms = Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s));
  return Number.isFinite(ms) ? ms : undefined;
}

/**
 * Map a Date,Open,High,Low,Close,Volume CSV document.
 */
export function normalizeOhlcvCsv(text: string): Candle[] | undefined {
  let records: unknown;
  try {
    records = parse(text, {
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch {
    return undefined;
  }
  if (!Array.isArray(records) || records.length < 2) {
    return undefined;
  }

  const candles: Candle[] = [];
  // First record is the header
  for (const record of records.slice(1)) {
    if (!Array.isArray(record) || record.length < 5 || typeof record[0] !== "string") {
      continue;
    }
    const candle = toCandle(parseCsvDate(record[0]), record[1], record[2], record[3], record[4], record[5]);
    if (candle) {
      candles.push(candle);
    }
  }

  return orderCandles(candles, "oldest-first");
}

// ══════════════════════════════════════════════════════════════════════
// SERIES
// ══════════════════════════════════════════════════════════════════════

export interface SeriesMeta {
  symbol: string;
  interval: Interval;
  source: SourceId;
  marketCap?: number | null;
}

/**
 * Wrap normalized candles into a series, rejecting short or unparseable payloads.
 */
export function toSeries(meta: SeriesMeta, candles: Candle[] | undefined): FetchOutcome<CandleSeries> {
  if (!candles) {
    return { ok: false, reason: "malformed", detail: "unexpected payload shape" };
  }
  if (candles.length < MIN_SERIES_LENGTH) {
    return {
      ok: false,
      reason: "insufficient",
      detail: `${candles.length} candles, need ${MIN_SERIES_LENGTH}`,
    };
  }
  return {
    ok: true,
    value: { ...meta, candles },
  };
}

/**
 * Serialize candles to the [timestamp, open, high, low, close, volume] wire rows.
 */
export function toKlineRows(candles: readonly Candle[]): KlineRow[] {
  return candles.map((c) => [c.timestamp, c.open, c.high, c.low, c.close, c.volume]);
}
