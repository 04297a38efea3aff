/**
 * KuCoin spot candles.
 */

import type { AxiosInstance } from "axios";
import { RestSourceAdapter, isRecord } from "../rest-adapter.js";
import type { CandleRequest } from "../interface.js";
import { KUCOIN_LAYOUT, normalizeRows, toSeries } from "../normalizer.js";
import type { CandleSeries, FetchOutcome, Interval } from "../../types/candle.js";

const REST_BASE_URL = "https://api.kucoin.com";

const KUCOIN_INTERVALS: Record<Interval, { type: string; seconds: number }> = {
  "1h": { type: "1hour", seconds: 3600 },
  "4h": { type: "4hour", seconds: 14_400 },
  "1d": { type: "1day", seconds: 86_400 },
  "1w": { type: "1week", seconds: 604_800 },
};

/** KuCoin success code */
const KUCOIN_OK = "200000";

export class KucoinAdapter extends RestSourceAdapter {
  readonly id = "kucoin" as const;
  readonly displayName = "KuCoin";
  readonly assetClass = "crypto" as const;

  constructor(http?: AxiosInstance, private readonly now: () => number = Date.now) {
    super(http);
  }

  supports(interval: Interval): boolean {
    return interval in KUCOIN_INTERVALS;
  }

  protected async request(request: CandleRequest): Promise<unknown> {
    const { type, seconds } = KUCOIN_INTERVALS[request.interval];
    // The endpoint is windowed by time, not by count
    const endAt = Math.floor(this.now() / 1000);
    const startAt = endAt - request.limit * seconds;

    const response = await this.http.get<unknown>(`${REST_BASE_URL}/api/v1/market/candles`, {
      params: {
        symbol: `${request.symbol}-USDT`,
        type,
        startAt,
        endAt,
      },
      timeout: request.timeoutMs,
    });
    return response.data;
  }

  protected normalize(body: unknown, request: CandleRequest): FetchOutcome<CandleSeries> {
    if (!isRecord(body) || body.code !== KUCOIN_OK) {
      const code = isRecord(body) ? String(body.code) : "none";
      return { ok: false, reason: "malformed", detail: `KuCoin code ${code}` };
    }

    return toSeries(
      { symbol: request.symbol, interval: request.interval, source: this.id },
      normalizeRows(body.data, KUCOIN_LAYOUT)
    );
  }
}
