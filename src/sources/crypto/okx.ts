/**
 * OKX spot candles.
 */

import { RestSourceAdapter, isRecord } from "../rest-adapter.js";
import type { CandleRequest } from "../interface.js";
import { OKX_LAYOUT, normalizeRows, toSeries } from "../normalizer.js";
import type { CandleSeries, FetchOutcome, Interval } from "../../types/candle.js";

const REST_BASE_URL = "https://www.okx.com";

const OKX_BARS: Record<Interval, string> = {
  "1h": "1H",
  "4h": "4H",
  "1d": "1D",
  "1w": "1W",
};

/** history-candles returns at most this many rows per call */
const OKX_MAX_LIMIT = 100;

export class OkxAdapter extends RestSourceAdapter {
  readonly id = "okx" as const;
  readonly displayName = "OKX";
  readonly assetClass = "crypto" as const;

  supports(interval: Interval): boolean {
    return interval in OKX_BARS;
  }

  protected async request(request: CandleRequest): Promise<unknown> {
    const response = await this.http.get<unknown>(`${REST_BASE_URL}/api/v5/market/history-candles`, {
      params: {
        instId: `${request.symbol}-USDT`,
        bar: OKX_BARS[request.interval],
        limit: Math.min(request.limit, OKX_MAX_LIMIT),
      },
      timeout: request.timeoutMs,
    });
    return response.data;
  }

  protected normalize(body: unknown, request: CandleRequest): FetchOutcome<CandleSeries> {
    if (!isRecord(body) || body.code !== "0") {
      const message = isRecord(body) ? String(body.msg ?? body.code) : "none";
      return { ok: false, reason: "malformed", detail: `OKX error ${message}` };
    }

    return toSeries(
      { symbol: request.symbol, interval: request.interval, source: this.id },
      normalizeRows(body.data, OKX_LAYOUT)
    );
  }
}
