/**
 * Fallback Resolver
 *
 * Tries the adapters registered for an asset class in priority order and
 * returns the first series that satisfies the minimum length. Every failure
 * along the way is soft: the caller only ever sees "resolved" or "unavailable".
 */

import type { AxiosInstance } from "axios";
import type { SourceAdapter } from "./interface.js";
import { KucoinAdapter } from "./crypto/kucoin.js";
import { OkxAdapter } from "./crypto/okx.js";
import { BinanceKlinesAdapter } from "./crypto/binance.js";
import { YahooChartAdapter } from "./equity/yahoo.js";
import { StooqCsvAdapter } from "./equity/stooq.js";
import type { AssetClass, Interval, ResolveResult, SourceId } from "../types/candle.js";
import { logger } from "../utils/logger.js";

const log = logger.child({ component: "resolver" });

export interface ResolveOptions {
  /** Bars requested from each adapter */
  limit?: number;
  /** Per-adapter-call timeout */
  timeoutMs?: number;
}

export interface FallbackResolverOptions {
  defaultLimit?: number;
  defaultTimeoutMs?: number;
}

export class FallbackResolver {
  private chains: Map<AssetClass, SourceAdapter[]> = new Map();
  private defaultLimit: number;
  private defaultTimeoutMs: number;

  constructor(options: FallbackResolverOptions = {}) {
    this.defaultLimit = options.defaultLimit ?? 30;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 8000;
  }

  /**
   * Append an adapter to its asset class chain. Registration order is priority order.
   */
  register(adapter: SourceAdapter): this {
    const chain = this.chains.get(adapter.assetClass) ?? [];
    chain.push(adapter);
    this.chains.set(adapter.assetClass, chain);
    return this;
  }

  /**
   * Source ids for an asset class, highest priority first.
   */
  chain(assetClass: AssetClass): SourceId[] {
    return (this.chains.get(assetClass) ?? []).map((adapter) => adapter.id);
  }

  /** Human-readable name for a registered source */
  displayName(source: SourceId): string {
    for (const chain of this.chains.values()) {
      const adapter = chain.find((a) => a.id === source);
      if (adapter) {
        return adapter.displayName;
      }
    }
    return source;
  }

  async resolve(
    symbol: string,
    assetClass: AssetClass,
    interval: Interval,
    options: ResolveOptions = {}
  ): Promise<ResolveResult> {
    const limit = options.limit ?? this.defaultLimit;
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    for (const adapter of this.chains.get(assetClass) ?? []) {
      if (!adapter.supports(interval)) {
        continue;
      }

      try {
        const outcome = await adapter.fetchCandles({ symbol, interval, limit, timeoutMs });

        if (outcome.ok) {
          return { status: "resolved", symbol, source: adapter.id, series: outcome.value };
        }

        const context = { symbol, source: adapter.id, reason: outcome.reason, detail: outcome.detail };
        if (outcome.reason === "malformed") {
          log.warn("Source returned an unusable payload", context);
        } else {
          log.debug("Source skipped", context);
        }
      } catch (error) {
        log.error(
          "Source adapter threw",
          error instanceof Error ? error : new Error(String(error)),
          { symbol, source: adapter.id }
        );
      }
    }

    log.debug("All sources exhausted", { symbol, assetClass, interval });
    return { status: "unavailable", symbol };
  }
}

/**
 * Resolver with the production chains:
 * crypto KuCoin → OKX → Binance spot → Binance futures, equity Yahoo → Stooq.
 */
export function createDefaultResolver(
  http?: AxiosInstance,
  options: FallbackResolverOptions = {}
): FallbackResolver {
  return new FallbackResolver(options)
    .register(new KucoinAdapter(http))
    .register(new OkxAdapter(http))
    .register(new BinanceKlinesAdapter("spot", http))
    .register(new BinanceKlinesAdapter("futures", http))
    .register(new YahooChartAdapter(http))
    .register(new StooqCsvAdapter(http));
}
