/**
 * Index constituents from iShares ETF holdings CSVs:
 * IWM for the Russell 2000, IVV for the S&P 500.
 *
 * The files open with a fund preamble and close with cash and derivative
 * rows, so parsing looks for the first ticker-shaped row and stops once the
 * equity section runs out.
 */

import type { AxiosInstance } from "axios";
import { parse } from "csv-parse/sync";
import { createHttpClient, describeError } from "../utils/http.js";
import { logger } from "../utils/logger.js";

const log = logger.child({ component: "constituents" });

export const RUSSELL_2000_URL =
  "https://www.ishares.com/us/products/239707/ishares-russell-2000-etf/" +
  "1467271812596.ajax?fileType=csv&fileName=IWM_holdings&dataType=fund";

export const SP_500_URL =
  "https://www.ishares.com/us/products/239726/ishares-core-sp-500-etf/" +
  "1467271812596.ajax?fileType=csv&fileName=IVV_holdings&dataType=fund";

/** Fewer parsed tickers than this means the file layout changed */
const MIN_RUSSELL_TICKERS = 100;
const SP_500_MAX_TICKERS = 505;
/** Consecutive non-ticker rows that end the equity section */
const MAX_CONSECUTIVE_INVALID = 10;

const SECTION_BREAKS = new Set(["TICKER", "NAME", "CASH", "USD", "EUR", "GBP", "-", "", "TOTAL"]);
const NON_EQUITY = new Set(["CASH", "USD", "EUR", "GBP", "CHF", "JPY", "XTSLA", "PUT", "CALL"]);

export class ConstituentsUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConstituentsUnavailableError";
  }
}

export interface ConstituentsResult {
  tickers: string[];
  count: number;
  source?: "ishares" | "cache";
}

export interface ConstituentsOptions {
  cacheTtlMs: number;
  timeoutMs: number;
}

// ══════════════════════════════════════════════════════════════════════
// CSV PARSING
// ══════════════════════════════════════════════════════════════════════

/**
 * First column of every CSV record, unquoted and trimmed.
 */
export function firstColumn(text: string): string[] {
  const records: unknown = parse(text, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });
  if (!Array.isArray(records)) {
    return [];
  }

  const cells: string[] = [];
  for (const record of records) {
    if (Array.isArray(record) && record.length > 0) {
      const cell: unknown = record[0];
      cells.push(typeof cell === "string" ? cell.trim().replace(/^"+|"+$/g, "") : "");
    }
  }
  return cells;
}

const LETTERS = /^[A-Z]+$/;

function stripClassSeparators(ticker: string): string {
  return ticker.replace(/[-.]/g, "");
}

/**
 * Russell 2000 holdings: upper-cased tickers of 1-6 characters, letters with
 * optional "-" or "." class separators, deduplicated.
 */
export function parseRussellHoldings(text: string): string[] {
  const tickers: string[] = [];
  const seen = new Set<string>();
  let started = false;
  let consecutiveInvalid = 0;

  for (const raw of firstColumn(text)) {
    const ticker = raw.toUpperCase();
    const clean = stripClassSeparators(ticker);

    if (!started) {
      if (ticker.length >= 1 && ticker.length <= 5 && LETTERS.test(clean)) {
        started = true;
      } else {
        continue;
      }
    }

    if (SECTION_BREAKS.has(ticker)) {
      consecutiveInvalid++;
      if (consecutiveInvalid > MAX_CONSECUTIVE_INVALID) {
        break;
      }
      continue;
    }
    consecutiveInvalid = 0;

    if (ticker.length > 6 || !LETTERS.test(clean) || NON_EQUITY.has(ticker)) {
      continue;
    }

    if (!seen.has(ticker)) {
      seen.add(ticker);
      tickers.push(ticker);
    }
  }

  return tickers;
}

/**
 * S&P 500 holdings: all-letter upper-case tickers, excluding cash lines,
 * capped at 505.
 */
export function parseSp500Holdings(text: string): string[] {
  const tickers: string[] = [];
  let started = false;

  for (const ticker of firstColumn(text)) {
    if (!started) {
      if (ticker.length >= 1 && ticker.length <= 5 && LETTERS.test(ticker)) {
        started = true;
      } else {
        continue;
      }
    }
    if (LETTERS.test(ticker) && ticker !== "CASH" && ticker !== "USD") {
      tickers.push(ticker);
    }
  }

  return tickers.slice(0, SP_500_MAX_TICKERS);
}

// ══════════════════════════════════════════════════════════════════════
// CLIENT
// ══════════════════════════════════════════════════════════════════════

export class ConstituentsClient {
  private readonly http: AxiosInstance;
  private russellCache: { tickers: string[]; fetchedAt: number } | null = null;

  constructor(
    private readonly options: ConstituentsOptions,
    http: AxiosInstance = createHttpClient(),
    private readonly now: () => number = Date.now
  ) {
    this.http = http;
  }

  private async download(url: string): Promise<string> {
    try {
      const response = await this.http.get<string>(url, {
        responseType: "text",
        timeout: this.options.timeoutMs,
        headers: {
          "Referer": "https://www.ishares.com/",
          "Accept": "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        },
      });
      if (typeof response.data !== "string") {
        throw new ConstituentsUnavailableError("iShares returned a non-text body");
      }
      return response.data;
    } catch (error) {
      if (error instanceof ConstituentsUnavailableError) {
        throw error;
      }
      throw new ConstituentsUnavailableError(`iShares request failed: ${describeError(error).detail}`);
    }
  }

  /**
   * Russell 2000 tickers, served from a cache for `cacheTtlMs`.
   */
  async russell2000(): Promise<ConstituentsResult> {
    const cached = this.russellCache;
    if (cached && this.now() - cached.fetchedAt < this.options.cacheTtlMs) {
      return { tickers: cached.tickers, count: cached.tickers.length, source: "cache" };
    }

    const tickers = parseRussellHoldings(await this.download(RUSSELL_2000_URL));
    if (tickers.length <= MIN_RUSSELL_TICKERS) {
      log.warn("Russell 2000 holdings look truncated", { count: tickers.length });
      throw new ConstituentsUnavailableError(
        `Only parsed ${tickers.length} tickers, possible format change`
      );
    }

    this.russellCache = { tickers, fetchedAt: this.now() };
    log.info("Russell 2000 holdings fetched", { count: tickers.length });
    return { tickers, count: tickers.length, source: "ishares" };
  }

  async sp500(): Promise<ConstituentsResult> {
    const tickers = parseSp500Holdings(await this.download(SP_500_URL));
    log.info("S&P 500 holdings fetched", { count: tickers.length });
    return { tickers, count: tickers.length };
  }
}
