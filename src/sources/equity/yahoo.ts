/**
 * Yahoo Finance chart endpoint, the primary equity source.
 */

import { RestSourceAdapter, isRecord } from "../rest-adapter.js";
import type { CandleRequest } from "../interface.js";
import { normalizeYahooChart, toSeries } from "../normalizer.js";
import type { CandleSeries, FetchOutcome, Interval } from "../../types/candle.js";
import type { YahooChartResponse } from "../../types/providers.js";

const REST_BASE_URL = "https://query1.finance.yahoo.com/v8/finance/chart";

type YahooInterval = "60m" | "1d" | "1wk";

// No native 4h bars; hourly bars are served instead
const YAHOO_INTERVALS: Record<Interval, YahooInterval> = {
  "1h": "60m",
  "4h": "60m",
  "1d": "1d",
  "1w": "1wk",
};

const YAHOO_RANGES: Record<YahooInterval, string> = {
  "60m": "730d",
  "1d": "2y",
  "1wk": "4y",
};

function isChartResponse(body: unknown): body is YahooChartResponse {
  return isRecord(body) && isRecord(body.chart);
}

export class YahooChartAdapter extends RestSourceAdapter {
  readonly id = "yahoo" as const;
  readonly displayName = "Yahoo Finance";
  readonly assetClass = "equity" as const;

  supports(interval: Interval): boolean {
    return interval in YAHOO_INTERVALS;
  }

  protected async request(request: CandleRequest): Promise<unknown> {
    const interval = YAHOO_INTERVALS[request.interval];
    const response = await this.http.get<unknown>(`${REST_BASE_URL}/${encodeURIComponent(request.symbol)}`, {
      params: {
        interval,
        range: YAHOO_RANGES[interval],
      },
      timeout: request.timeoutMs,
    });
    return response.data;
  }

  protected normalize(body: unknown, request: CandleRequest): FetchOutcome<CandleSeries> {
    if (!isChartResponse(body)) {
      return { ok: false, reason: "malformed", detail: "missing chart" };
    }

    const result = body.chart.result?.[0];
    if (!result) {
      const description = body.chart.error?.description ?? "empty result";
      return { ok: false, reason: "malformed", detail: description };
    }

    const served: Interval = YAHOO_INTERVALS[request.interval] === "60m" ? "1h" : request.interval;
    const marketCap = typeof result.meta?.marketCap === "number" ? result.meta.marketCap : null;

    return toSeries(
      { symbol: request.symbol, interval: served, source: this.id, marketCap },
      normalizeYahooChart(result)
    );
  }
}
