/**
 * Interface that every candle source adapter implements.
 * Adapters never throw for expected failures: transport errors, bad payloads
 * and short histories come back as tagged FetchOutcome failures.
 */

import type {
  AssetClass,
  CandleSeries,
  FetchOutcome,
  Interval,
  SourceId,
} from "../types/candle.js";

export interface CandleRequest {
  /** Base symbol, e.g. "BTC" or "AAPL" */
  symbol: string;
  interval: Interval;
  /** Number of bars wanted; adapters may cap it to the provider maximum */
  limit: number;
  /** Per-call timeout */
  timeoutMs: number;
}

export interface SourceAdapter {
  // ══════════════════════════════════════════════════════════════════════
  // IDENTIFICATION
  // ══════════════════════════════════════════════════════════════════════

  /** Unique source identifier */
  readonly id: SourceId;

  /** Human-readable name, used in alerts */
  readonly displayName: string;

  readonly assetClass: AssetClass;

  // ══════════════════════════════════════════════════════════════════════
  // CANDLES
  // ══════════════════════════════════════════════════════════════════════

  /** Whether the provider can serve this bar width reliably */
  supports(interval: Interval): boolean;

  /** Fetch and normalize candles for one symbol */
  fetchCandles(request: CandleRequest): Promise<FetchOutcome<CandleSeries>>;
}
