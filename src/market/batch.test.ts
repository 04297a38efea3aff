import { describe, it, expect, vi } from "vitest";
import { BatchFetcher, parseInterval, parseLimit, parseSymbols, type BatchOptions } from "./batch.js";
import type { AssetClass, Interval, ResolveResult } from "../types/candle.js";
import { flatCandles } from "../testing/candles.js";

const OPTIONS: BatchOptions = {
  maxSymbols: 200,
  cryptoConcurrency: 4,
  stockConcurrency: 4,
  defaultLimit: 210,
  requestTimeoutMs: 10_000,
};

describe("query parsing", () => {
  it("maps interval aliases and falls back per asset class", () => {
    expect(parseInterval("1WK", "equity")).toBe("1w");
    expect(parseInterval("60m", "crypto")).toBe("1h");
    expect(parseInterval("4hour", "crypto")).toBe("4h");
    expect(parseInterval(undefined, "crypto")).toBe("1d");
    expect(parseInterval("5m", "equity")).toBe("1w");
  });

  it("normalizes and caps symbol lists", () => {
    expect(parseSymbols(" btc, eth,,BTC ", 200)).toEqual(["BTC", "ETH"]);
    expect(parseSymbols("a,b,c", 2)).toEqual(["A", "B"]);
    expect(parseSymbols(null, 200)).toEqual([]);
  });

  it("parses positive limits", () => {
    expect(parseLimit("50", 210)).toBe(50);
    expect(parseLimit("abc", 210)).toBe(210);
    expect(parseLimit("-3", 210)).toBe(210);
    expect(parseLimit(undefined, 210)).toBe(210);
  });
});

describe("BatchFetcher", () => {
  const candles = flatCandles(2);

  function resolver() {
    return {
      resolve: vi.fn(async (symbol: string, assetClass: AssetClass, interval: Interval): Promise<ResolveResult> => {
        if (symbol === "NOPE") {
          return { status: "unavailable", symbol };
        }
        return {
          status: "resolved",
          symbol,
          source: assetClass === "crypto" ? "okx" : "yahoo",
          series: {
            symbol,
            interval,
            source: assetClass === "crypto" ? "okx" : "yahoo",
            candles,
            marketCap: symbol === "AAPL" ? 3_000_000_000_000 : undefined,
          },
        };
      }),
    };
  }

  it("returns kline rows for resolved crypto symbols only", async () => {
    const stub = resolver();
    const result = await new BatchFetcher(stub, OPTIONS).fetchCrypto(["BTC", "NOPE"], "4h", 60);

    expect(result).toEqual({
      BTC: {
        klines: [
          [candles[0].timestamp, 100, 101, 99, 100, 1000],
          [candles[1].timestamp, 100, 101, 99, 100, 1000],
        ],
        type: "crypto",
        source: "okx",
      },
    });
    expect(stub.resolve).toHaveBeenCalledWith("BTC", "crypto", "4h", { limit: 60, timeoutMs: 10_000 });
  });

  it("returns market caps for stocks, null when absent", async () => {
    const stub = resolver();
    const result = await new BatchFetcher(stub, OPTIONS).fetchStocks(["AAPL", "IWM", "NOPE"], "1w");

    expect(Object.keys(result).sort()).toEqual(["AAPL", "IWM"]);
    expect(result.AAPL.marketCap).toBe(3_000_000_000_000);
    expect(result.IWM.marketCap).toBeNull();
    expect(result.IWM.type).toBe("stock");
    expect(stub.resolve).toHaveBeenCalledWith("AAPL", "equity", "1w", { limit: 210, timeoutMs: 10_000 });
  });
});
