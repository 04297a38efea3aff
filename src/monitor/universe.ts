/**
 * Monitored universe: the base symbols the scanner sweeps.
 *
 * Starts from the built-in list and is replaced wholesale by a successful
 * listing refresh. A failed refresh leaves the current set in place.
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import type { ListingExchange } from "../types/candle.js";
import type { UniverseSource } from "../types/internal.js";
import type { ListingResult } from "../sources/listings.js";
import { logger } from "../utils/logger.js";

const log = logger.child({ component: "universe" });

const BUILTIN_PATH = fileURLToPath(new URL("../../data/builtin-universe.json", import.meta.url));

export interface ListingProvider {
  resolve(order: readonly ListingExchange[]): Promise<ListingResult | null>;
}

/**
 * Read the built-in symbol list shipped in data/.
 */
export function loadBuiltinUniverse(path: string = BUILTIN_PATH): string[] {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`Built-in universe at ${path} is not an array`);
  }
  return dedupe(parsed.filter((s): s is string => typeof s === "string"));
}

function dedupe(symbols: Iterable<string>): string[] {
  return Array.from(new Set(symbols));
}

export class UniverseManager {
  private current: readonly string[];
  private currentSource: UniverseSource = "builtin";
  private lastRefresh: number | null = null;

  constructor(
    private readonly listings: ListingProvider,
    private readonly order: readonly ListingExchange[],
    builtin: readonly string[] = loadBuiltinUniverse(),
    private readonly now: () => number = Date.now
  ) {
    if (builtin.length === 0) {
      throw new Error("Built-in universe must not be empty");
    }
    this.current = dedupe(builtin);
  }

  symbols(): readonly string[] {
    return this.current;
  }

  get size(): number {
    return this.current.length;
  }

  get source(): UniverseSource {
    return this.currentSource;
  }

  /** Time of the last refresh attempt, successful or not */
  get refreshedAt(): number | null {
    return this.lastRefresh;
  }

  async refresh(): Promise<void> {
    this.lastRefresh = this.now();

    let result: ListingResult | null = null;
    try {
      result = await this.listings.resolve(this.order);
    } catch (error) {
      log.error("Listing refresh threw", error instanceof Error ? error : new Error(String(error)));
    }

    if (!result || result.symbols.length === 0) {
      log.warn("All listing sources failed, keeping current universe", {
        source: this.currentSource,
        count: this.current.length,
      });
      return;
    }

    this.current = dedupe(result.symbols);
    this.currentSource = result.source;
    log.info("Universe refreshed", { source: result.source, count: this.current.length });
  }
}
