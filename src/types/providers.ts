/**
 * Provider API Types
 *
 * Raw response shapes for the Yahoo chart endpoint. Exchange payloads are
 * row arrays and are described by the column layouts in sources/normalizer.ts.
 */

/**
 * Yahoo /v8/finance/chart/{symbol}
 */
export interface YahooChartResponse {
  chart: {
    result: YahooChartResult[] | null;
    error: { code: string; description: string } | null;
  };
}

export interface YahooChartResult {
  meta?: {
    symbol?: string;
    marketCap?: number;
  };
  timestamp?: number[];
  indicators?: {
    quote?: Array<{
      open?: Array<number | null>;
      high?: Array<number | null>;
      low?: Array<number | null>;
      close?: Array<number | null>;
      volume?: Array<number | null>;
    }>;
  };
}
