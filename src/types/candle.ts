/**
 * Canonical candle schemas.
 *
 * Every provider payload MUST be transformed into these shapes before it
 * reaches the detector or the API. No provider-specific fields leak past the
 * source adapters.
 */

// ══════════════════════════════════════════════════════════════════════
// SOURCE & INTERVAL TYPES
// ══════════════════════════════════════════════════════════════════════

export type AssetClass = "crypto" | "equity";

export type CryptoSourceId = "kucoin" | "okx" | "binance_spot" | "binance_futures";

export type EquitySourceId = "yahoo" | "stooq";

export type SourceId = CryptoSourceId | EquitySourceId;

export type ListingExchange = "binance" | "kucoin" | "okx";

/** Canonical bar width. Provider-specific codes are derived per adapter. */
export type Interval = "1h" | "4h" | "1d" | "1w";

/** Minimum number of candles an adapter must deliver to be accepted. */
export const MIN_SERIES_LENGTH = 20;

// ══════════════════════════════════════════════════════════════════════
// CANDLES
// ══════════════════════════════════════════════════════════════════════

/**
 * One time bucket of trading activity.
 */
export interface Candle {
  /** Bucket time in milliseconds since epoch */
  readonly timestamp: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  /** Base-asset (or share) volume, never negative */
  readonly volume: number;
}

/** Wire form used by the batch endpoints: [timestamp, open, high, low, close, volume] */
export type KlineRow = [number, number, number, number, number, number];

/**
 * Ordered candles for one symbol, one interval, one source.
 * Candles are strictly ascending by timestamp, oldest first.
 */
export interface CandleSeries {
  symbol: string;
  interval: Interval;
  source: SourceId;
  candles: readonly Candle[];
  /** Market capitalisation reported alongside equity charts */
  marketCap?: number | null;
}

// ══════════════════════════════════════════════════════════════════════
// OUTCOMES
// ══════════════════════════════════════════════════════════════════════

export type FetchFailureReason = "transport" | "http" | "malformed" | "insufficient" | "unsupported";

export interface FetchFailure {
  ok: false;
  reason: FetchFailureReason;
  detail?: string;
}

/** Result of one adapter call or one normalization pass. */
export type FetchOutcome<T> = { ok: true; value: T } | FetchFailure;

export type ResolveResult =
  | { status: "resolved"; symbol: string; source: SourceId; series: CandleSeries }
  | { status: "unavailable"; symbol: string };

// ══════════════════════════════════════════════════════════════════════
// SIGNALS
// ══════════════════════════════════════════════════════════════════════

/**
 * Volume spike entry signal. Only produced when every detection rule passes.
 */
export interface SpikeSignal {
  /** Current volume over trailing 20-bar average, 2 decimals */
  volumeRatio: number;
  /** Percent the current close sits above the recent low, 1 decimal */
  percentAboveLow: number;
}
