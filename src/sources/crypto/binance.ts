/**
 * Binance spot and USDT-M futures klines.
 *
 * Both markets share the kline row layout; only the host and path differ.
 */

import type { AxiosInstance } from "axios";
import { RestSourceAdapter } from "../rest-adapter.js";
import type { CandleRequest } from "../interface.js";
import { BINANCE_LAYOUT, normalizeRows, toSeries } from "../normalizer.js";
import type { CandleSeries, CryptoSourceId, FetchOutcome, Interval } from "../../types/candle.js";

export type BinanceMarket = "spot" | "futures";

const MARKETS: Record<BinanceMarket, { id: CryptoSourceId; displayName: string; url: string }> = {
  spot: {
    id: "binance_spot",
    displayName: "Binance Spot",
    url: "https://api.binance.com/api/v3/klines",
  },
  futures: {
    id: "binance_futures",
    displayName: "Binance Futures",
    url: "https://fapi.binance.com/fapi/v1/klines",
  },
};

const BINANCE_INTERVALS: Record<Interval, string> = {
  "1h": "1h",
  "4h": "4h",
  "1d": "1d",
  "1w": "1w",
};

const BINANCE_MAX_LIMIT = 1000;

export class BinanceKlinesAdapter extends RestSourceAdapter {
  readonly id: CryptoSourceId;
  readonly displayName: string;
  readonly assetClass = "crypto" as const;

  private readonly url: string;

  constructor(market: BinanceMarket, http?: AxiosInstance) {
    super(http);
    const { id, displayName, url } = MARKETS[market];
    this.id = id;
    this.displayName = displayName;
    this.url = url;
  }

  supports(interval: Interval): boolean {
    return interval in BINANCE_INTERVALS;
  }

  protected async request(request: CandleRequest): Promise<unknown> {
    const response = await this.http.get<unknown>(this.url, {
      params: {
        symbol: `${request.symbol}USDT`,
        interval: BINANCE_INTERVALS[request.interval],
        limit: Math.min(request.limit, BINANCE_MAX_LIMIT),
      },
      timeout: request.timeoutMs,
    });
    return response.data;
  }

  protected normalize(body: unknown, request: CandleRequest): FetchOutcome<CandleSeries> {
    // Errors come back as { code, msg } objects
    return toSeries(
      { symbol: request.symbol, interval: request.interval, source: this.id },
      normalizeRows(body, BINANCE_LAYOUT)
    );
  }
}
