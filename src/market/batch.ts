/**
 * Batched candle fetches behind /crypto and /stocks.
 */

import type { FallbackResolver } from "../sources/resolver.js";
import { toKlineRows } from "../sources/normalizer.js";
import type { AssetClass, Interval, KlineRow, SourceId } from "../types/candle.js";
import { runPool } from "../monitor/worker-pool.js";
import { logger } from "../utils/logger.js";

const log = logger.child({ component: "batch" });

export interface CryptoBatchEntry {
  klines: KlineRow[];
  type: "crypto";
  source: SourceId;
}

export interface StockBatchEntry {
  klines: KlineRow[];
  marketCap: number | null;
  type: "stock";
}

export interface BatchOptions {
  maxSymbols: number;
  cryptoConcurrency: number;
  stockConcurrency: number;
  defaultLimit: number;
  requestTimeoutMs: number;
}

const INTERVAL_ALIASES: Record<string, Interval> = {
  "1w": "1w",
  "1wk": "1w",
  "1week": "1w",
  "4h": "4h",
  "4hour": "4h",
  "1h": "1h",
  "60m": "1h",
  "1d": "1d",
  "1day": "1d",
};

const DEFAULT_INTERVAL: Record<AssetClass, Interval> = {
  crypto: "1d",
  equity: "1w",
};

/**
 * Map a query-string interval onto a canonical one; unknown values fall back
 * to the asset class default.
 */
export function parseInterval(raw: string | null | undefined, assetClass: AssetClass): Interval {
  const key = raw?.trim().toLowerCase() ?? "";
  return INTERVAL_ALIASES[key] ?? DEFAULT_INTERVAL[assetClass];
}

/**
 * "btc, eth,,BTC" → ["BTC", "ETH"], capped at `max`.
 */
export function parseSymbols(raw: string | null | undefined, max: number): string[] {
  if (!raw) {
    return [];
  }
  const symbols = new Set<string>();
  for (const part of raw.split(",")) {
    const symbol = part.trim().toUpperCase();
    if (symbol) {
      symbols.add(symbol);
    }
  }
  return Array.from(symbols).slice(0, max);
}

/** Parse a positive integer, or fall back */
export function parseLimit(raw: string | null | undefined, fallback: number): number {
  const value = raw ? Number.parseInt(raw, 10) : NaN;
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export class BatchFetcher {
  constructor(
    private readonly resolver: Pick<FallbackResolver, "resolve">,
    private readonly options: BatchOptions
  ) {}

  get maxSymbols(): number {
    return this.options.maxSymbols;
  }

  get defaultLimit(): number {
    return this.options.defaultLimit;
  }

  async fetchCrypto(
    symbols: readonly string[],
    interval: Interval,
    limit: number = this.options.defaultLimit
  ): Promise<Record<string, CryptoBatchEntry>> {
    const results: Record<string, CryptoBatchEntry> = {};
    const tally: Record<string, number> = {};

    await runPool(symbols, this.options.cryptoConcurrency, async (symbol) => {
      const resolved = await this.resolver.resolve(symbol, "crypto", interval, {
        limit,
        timeoutMs: this.options.requestTimeoutMs,
      });
      if (resolved.status === "unavailable") {
        log.debug("All sources failed", { symbol });
        return;
      }
      results[symbol] = {
        klines: toKlineRows(resolved.series.candles),
        type: "crypto",
        source: resolved.source,
      };
      tally[resolved.source] = (tally[resolved.source] ?? 0) + 1;
    });

    log.info("Crypto batch done", {
      interval,
      fetched: Object.keys(results).length,
      requested: symbols.length,
      sources: tally,
    });

    return results;
  }

  async fetchStocks(
    symbols: readonly string[],
    interval: Interval
  ): Promise<Record<string, StockBatchEntry>> {
    const results: Record<string, StockBatchEntry> = {};
    const tally: Record<string, number> = {};

    await runPool(symbols, this.options.stockConcurrency, async (symbol) => {
      const resolved = await this.resolver.resolve(symbol, "equity", interval, {
        limit: this.options.defaultLimit,
        timeoutMs: this.options.requestTimeoutMs,
      });
      if (resolved.status === "unavailable") {
        return;
      }
      results[symbol] = {
        klines: toKlineRows(resolved.series.candles),
        marketCap: resolved.series.marketCap ?? null,
        type: "stock",
      };
      tally[resolved.source] = (tally[resolved.source] ?? 0) + 1;
    });

    log.info("Stock batch done", {
      interval,
      fetched: Object.keys(results).length,
      requested: symbols.length,
      sources: tally,
    });

    return results;
  }
}
