/**
 * Exchange listings: USDT-quoted spot base assets from Binance, KuCoin and OKX.
 */

import type { AxiosInstance } from "axios";
import type { ListingExchange } from "../types/candle.js";
import { createHttpClient, describeError } from "../utils/http.js";
import { logger } from "../utils/logger.js";
import { isRecord } from "./rest-adapter.js";

const log = logger.child({ component: "listings" });

/** Stablecoins and wrapped tickers that never make sense to scan */
export const EXCLUDED_BASES: ReadonlySet<string> = new Set([
  "USDT", "USDC", "BUSD", "TUSD", "USDD", "USDP", "FDUSD", "DAI", "FRAX",
  "LUSD", "PYUSD", "GUSD", "SUSD", "USDB", "USDX", "EURC", "WBTC", "WETH",
  "WBNB", "STETH", "WSTETH", "CBETH", "RETH", "BETH", "BTCB", "HBTC",
]);

export const LISTING_URLS: Record<ListingExchange, string> = {
  binance: "https://api.binance.com/api/v3/exchangeInfo",
  kucoin: "https://api.kucoin.com/api/v2/symbols",
  okx: "https://www.okx.com/api/v5/public/instruments",
};

export interface ListingResult {
  symbols: string[];
  source: ListingExchange;
}

/**
 * Drop excluded and repeated bases, keeping first-seen order.
 */
export function filterBases(bases: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const base of bases) {
    if (!base || seen.has(base) || EXCLUDED_BASES.has(base)) {
      continue;
    }
    seen.add(base);
    out.push(base);
  }
  return out;
}

// ══════════════════════════════════════════════════════════════════════
// PER-EXCHANGE EXTRACTORS
// ══════════════════════════════════════════════════════════════════════

function arrayField(body: unknown, key: string): unknown[] {
  if (!isRecord(body)) {
    return [];
  }
  const value = body[key];
  return Array.isArray(value) ? value : [];
}

export function binanceBases(body: unknown): string[] {
  const bases: string[] = [];
  for (const entry of arrayField(body, "symbols")) {
    if (!isRecord(entry)) continue;
    if (entry.quoteAsset === "USDT" && entry.status === "TRADING" && entry.isSpotTradingAllowed === true
      && typeof entry.baseAsset === "string") {
      bases.push(entry.baseAsset);
    }
  }
  return filterBases(bases);
}

export function kucoinBases(body: unknown): string[] {
  const bases: string[] = [];
  for (const entry of arrayField(body, "data")) {
    if (!isRecord(entry)) continue;
    if (entry.quoteCurrency === "USDT" && entry.enableTrading === true && typeof entry.baseCurrency === "string") {
      bases.push(entry.baseCurrency);
    }
  }
  return filterBases(bases);
}

export function okxBases(body: unknown): string[] {
  const bases: string[] = [];
  for (const entry of arrayField(body, "data")) {
    if (!isRecord(entry)) continue;
    if (entry.quoteCcy === "USDT" && entry.state === "live" && typeof entry.baseCcy === "string") {
      bases.push(entry.baseCcy);
    }
  }
  return filterBases(bases);
}

const EXTRACTORS: Record<ListingExchange, (body: unknown) => string[]> = {
  binance: binanceBases,
  kucoin: kucoinBases,
  okx: okxBases,
};

// ══════════════════════════════════════════════════════════════════════
// CLIENT
// ══════════════════════════════════════════════════════════════════════

export class ListingClient {
  private readonly http: AxiosInstance;

  constructor(http: AxiosInstance = createHttpClient(), private readonly timeoutMs = 10_000) {
    this.http = http;
  }

  /**
   * Fetch one exchange's listing. Failures come back as an empty list.
   */
  async fetch(exchange: ListingExchange): Promise<string[]> {
    try {
      const response = await this.http.get<unknown>(LISTING_URLS[exchange], {
        params: exchange === "okx" ? { instType: "SPOT" } : undefined,
        timeout: this.timeoutMs,
      });
      return EXTRACTORS[exchange](response.data);
    } catch (error) {
      const { detail } = describeError(error);
      log.warn("Listing fetch failed", { exchange, detail });
      return [];
    }
  }

  /**
   * First exchange in `order` that yields a non-empty listing, or null.
   */
  async resolve(order: readonly ListingExchange[]): Promise<ListingResult | null> {
    for (const exchange of order) {
      const symbols = await this.fetch(exchange);
      if (symbols.length > 0) {
        log.info("Listing loaded", { exchange, count: symbols.length });
        return { symbols, source: exchange };
      }
    }
    return null;
  }
}
