import { describe, it, expect } from "vitest";
import { KucoinAdapter } from "./kucoin.js";
import { createFakeHttp } from "../../testing/fake-http.js";
import { flatCandles } from "../../testing/candles.js";
import { kucoinBody } from "../../testing/payloads.js";

const NOW = Date.UTC(2024, 1, 1);
const request = { symbol: "BTC", interval: "1d", limit: 30, timeoutMs: 8000 } as const;

describe("KucoinAdapter", () => {
  it("requests a time window sized by the bar count", async () => {
    const { http, requests } = createFakeHttp(() => ({ data: kucoinBody(flatCandles(25)) }));
    await new KucoinAdapter(http, () => NOW).fetchCandles(request);

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe("https://api.kucoin.com/api/v1/market/candles");
    expect(requests[0].params).toEqual({
      symbol: "BTC-USDT",
      type: "1day",
      startAt: NOW / 1000 - 30 * 86_400,
      endAt: NOW / 1000,
    });
    expect(requests[0].timeout).toBe(8000);
  });

  it("returns candles oldest first", async () => {
    const candles = flatCandles(25);
    const { http } = createFakeHttp(() => ({ data: kucoinBody(candles) }));
    const outcome = await new KucoinAdapter(http, () => NOW).fetchCandles(request);

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.value.source).toBe("kucoin");
      expect(outcome.value.candles).toEqual(candles);
    }
  });

  it("treats a non-success code as malformed", async () => {
    const { http } = createFakeHttp(() => ({ data: { code: "400100", msg: "bad symbol" } }));
    const outcome = await new KucoinAdapter(http, () => NOW).fetchCandles(request);
    expect(outcome).toEqual({ ok: false, reason: "malformed", detail: "KuCoin code 400100" });
  });

  it("reports short histories as insufficient", async () => {
    const { http } = createFakeHttp(() => ({ data: kucoinBody(flatCandles(10)) }));
    const outcome = await new KucoinAdapter(http, () => NOW).fetchCandles(request);
    expect(outcome).toMatchObject({ ok: false, reason: "insufficient" });
  });

  it("maps HTTP errors and timeouts to soft failures", async () => {
    const failing = createFakeHttp(() => ({ status: 429, data: "too many requests" }));
    expect(await new KucoinAdapter(failing.http, () => NOW).fetchCandles(request)).toEqual({
      ok: false,
      reason: "http",
      detail: "HTTP 429 too many requests",
    });

    const slow = createFakeHttp(() => ({ timeout: true }));
    expect(await new KucoinAdapter(slow.http, () => NOW).fetchCandles(request)).toMatchObject({
      ok: false,
      reason: "transport",
    });
  });
});
