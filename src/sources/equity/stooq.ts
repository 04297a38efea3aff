/**
 * Stooq daily/weekly CSV, the equity fallback.
 * Stooq has no reliable intraday history, so hourly requests are not served.
 */

import { RestSourceAdapter } from "../rest-adapter.js";
import type { CandleRequest } from "../interface.js";
import { normalizeOhlcvCsv, toSeries } from "../normalizer.js";
import type { CandleSeries, FetchOutcome, Interval } from "../../types/candle.js";

const CSV_URL = "https://stooq.com/q/d/l/";

const STOOQ_INTERVALS: Partial<Record<Interval, string>> = {
  "1d": "d",
  "1w": "w",
};

/**
 * "BRK-B" → "brk.b.us"
 */
export function toStooqSymbol(symbol: string): string {
  return `${symbol.toLowerCase().replace(/-/g, ".")}.us`;
}

export class StooqCsvAdapter extends RestSourceAdapter {
  readonly id = "stooq" as const;
  readonly displayName = "Stooq";
  readonly assetClass = "equity" as const;

  supports(interval: Interval): boolean {
    return STOOQ_INTERVALS[interval] !== undefined;
  }

  protected async request(request: CandleRequest): Promise<unknown> {
    const response = await this.http.get<string>(CSV_URL, {
      params: {
        s: toStooqSymbol(request.symbol),
        i: STOOQ_INTERVALS[request.interval],
      },
      responseType: "text",
      headers: {
        "Accept": "text/html,application/xhtml+xml,*/*",
        "Referer": "https://stooq.com/",
      },
      timeout: request.timeoutMs,
    });
    return response.data;
  }

  protected normalize(body: unknown, request: CandleRequest): FetchOutcome<CandleSeries> {
    if (typeof body !== "string") {
      return { ok: false, reason: "malformed", detail: "expected CSV text" };
    }
    if (body.includes("No data") || body.length < 50) {
      return { ok: false, reason: "insufficient", detail: "no data" };
    }

    return toSeries(
      { symbol: request.symbol, interval: request.interval, source: this.id },
      normalizeOhlcvCsv(body)
    );
  }
}
