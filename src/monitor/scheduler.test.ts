import { describe, it, expect, vi, afterEach } from "vitest";
import { ScanScheduler, type ScanSchedulerOptions } from "./scheduler.js";
import { CooldownTracker } from "./cooldown.js";
import { UniverseManager } from "./universe.js";
import type { Notifier } from "../notify/telegram.js";
import type { ResolveResult, SourceId } from "../types/candle.js";
import type { ListingResult } from "../sources/listings.js";
import type { AlertCandidate, ScanReport } from "../types/internal.js";
import { flatCandles, spikeCandles } from "../testing/candles.js";

const NOW = Date.UTC(2024, 5, 1, 12, 0, 0);
const NOW_SEC = NOW / 1000;

const OPTIONS: ScanSchedulerOptions = {
  scanIntervalMs: 60_000,
  startupDelayMs: 1000,
  universeRefreshIntervalMs: 3_600_000,
  concurrency: 2,
  maxAlerts: 2,
  interval: "1d",
  candleLimit: 30,
  requestTimeoutMs: 8000,
  cooldownOnFailedDelivery: false,
};

/** Last-bar volume per symbol; null means no source can serve it */
const VOLUMES: Record<string, number | null> = {
  AAA: 1900,
  BBB: 3200,
  CCC: 1000,
  DDD: 2100,
  EEE: null,
};

function resolverStub(volumes: Record<string, number | null> = VOLUMES) {
  return {
    resolve: vi.fn(async (symbol: string): Promise<ResolveResult> => {
      const volume = volumes[symbol];
      if (volume === null || volume === undefined) {
        return { status: "unavailable", symbol };
      }
      const candles = volume === 1000 ? flatCandles(30) : spikeCandles(volume);
      return {
        status: "resolved",
        symbol,
        source: "kucoin",
        series: { symbol, interval: "1d", source: "kucoin", candles },
      };
    }),
    displayName: (source: SourceId): string => (source === "kucoin" ? "KuCoin" : source),
  };
}

function notifierStub(delivered: boolean): Notifier & { messages: string[] } {
  const messages: string[] = [];
  return {
    messages,
    send: async (text: string) => {
      messages.push(text);
      return delivered;
    },
  };
}

function listingsStub(result: ListingResult | null = null) {
  return { resolve: vi.fn(async () => result) };
}

function build(options: Partial<ScanSchedulerOptions> = {}, delivered = true) {
  const resolver = resolverStub();
  const notifier = notifierStub(delivered);
  const listings = listingsStub();
  const universe = new UniverseManager(listings, ["binance"], Object.keys(VOLUMES), () => NOW);
  const cooldown = new CooldownTracker(7200);
  const scheduler = new ScanScheduler(
    { resolver, universe, cooldown, notifier, now: () => NOW },
    { ...OPTIONS, ...options }
  );
  return { scheduler, resolver, notifier, listings, universe, cooldown };
}

afterEach(() => {
  vi.useRealTimers();
});

describe("ScanScheduler.runScan", () => {
  it("alerts the strongest signals, strongest first", async () => {
    const { scheduler, notifier } = build();

    const report = await scheduler.runScan("manual");

    expect(report.signals.map((s) => s.volumeRatio)).toEqual([3.2, 2.1, 1.9]);
    expect(report.alerted.map((s) => s.symbol)).toEqual(["BBB", "DDD"]);
    expect(report).toMatchObject({
      trigger: "manual",
      scanned: 5,
      cooling: 0,
      unavailable: 1,
      delivered: true,
    });

    expect(notifier.messages).toHaveLength(1);
    const lines = notifier.messages[0].split("\n");
    expect(lines[4]).toBe("<b>BBB</b>  3.2x avg volume");
    expect(lines[5]).toBe("   Price: $100.0000  |  1.0% above 30d low  |  KuCoin");
    expect(lines[7]).toBe("<b>DDD</b>  2.1x avg volume");
    expect(notifier.messages[0]).not.toContain("AAA");
  });

  it("records cooldown for delivered symbols and skips them next scan", async () => {
    const { scheduler, cooldown, resolver } = build();

    await scheduler.runScan();

    expect(cooldown.shouldSkip("BBB", NOW_SEC)).toBe(true);
    expect(cooldown.shouldSkip("DDD", NOW_SEC)).toBe(true);
    expect(cooldown.shouldSkip("AAA", NOW_SEC)).toBe(false);

    resolver.resolve.mockClear();
    const second = await scheduler.runScan();

    expect(second.cooling).toBe(2);
    expect(second.scanned).toBe(3);
    expect(resolver.resolve.mock.calls.map((call) => call[0])).toEqual(["AAA", "CCC", "EEE"]);
    expect(second.alerted.map((s) => s.symbol)).toEqual(["AAA"]);
  });

  it("leaves symbols eligible when delivery fails", async () => {
    const { scheduler, cooldown } = build({}, false);

    const report = await scheduler.runScan();

    expect(report.delivered).toBe(false);
    expect(cooldown.size).toBe(0);
  });

  it("records cooldown on failed delivery when configured", async () => {
    const { scheduler, cooldown } = build({ cooldownOnFailedDelivery: true }, false);

    await scheduler.runScan();

    expect(cooldown.shouldSkip("BBB", NOW_SEC)).toBe(true);
    expect(cooldown.size).toBe(2);
  });

  it("sends nothing when no symbol spikes", async () => {
    const { scheduler, notifier } = build({ detector: { spikeMultiplier: 5 } });

    const report = await scheduler.runScan();

    expect(report.signals).toEqual([]);
    expect(report.delivered).toBeNull();
    expect(notifier.messages).toEqual([]);
  });

  it("passes the candle request options to the resolver", async () => {
    const { scheduler, resolver } = build({ interval: "4h", candleLimit: 40, requestTimeoutMs: 5000 });

    await scheduler.runScan();

    expect(resolver.resolve).toHaveBeenCalledWith("AAA", "crypto", "4h", { limit: 40, timeoutMs: 5000 });
  });

  it("emits scan and alert events", async () => {
    const { scheduler } = build();
    const scans: ScanReport[] = [];
    const alerts: AlertCandidate[][] = [];
    scheduler.on("scan", (report) => scans.push(report));
    scheduler.on("alert", (batch) => alerts.push(batch));

    const report = await scheduler.runScan();

    expect(scans).toEqual([report]);
    expect(alerts.map((batch) => batch.map((a) => a.symbol))).toEqual([["BBB", "DDD"]]);
    expect(scheduler.status()).toEqual({ running: false, state: "idle", lastScan: report });
  });

  it("reports the configured spike multiplier", () => {
    expect(build().scheduler.spikeMultiplier).toBe(1.8);
    expect(build({ detector: { spikeMultiplier: 2.5 } }).scheduler.spikeMultiplier).toBe(2.5);
  });
});

describe("ScanScheduler lifecycle", () => {
  it("refreshes the universe, then scans on the interval", async () => {
    vi.useFakeTimers();
    const { scheduler, listings, resolver } = build();

    scheduler.start();
    expect(scheduler.isRunning).toBe(true);
    expect(listings.resolve).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1000);
    expect(listings.resolve).toHaveBeenCalledTimes(1);
    expect(resolver.resolve).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1000);
    expect(resolver.resolve).toHaveBeenCalledTimes(5);

    await vi.advanceTimersByTimeAsync(60_000);
    // BBB and DDD are cooling down
    expect(resolver.resolve).toHaveBeenCalledTimes(8);

    scheduler.stop();
    await vi.advanceTimersByTimeAsync(120_000);
    expect(resolver.resolve).toHaveBeenCalledTimes(8);
    expect(scheduler.isRunning).toBe(false);
  });

  it("keeps a single scan loop when restarted during a scan", async () => {
    vi.useFakeTimers();
    const { scheduler, resolver } = build();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    resolver.resolve.mockImplementationOnce(async (symbol: string): Promise<ResolveResult> => {
      await gate;
      return { status: "unavailable", symbol };
    });
    let scans = 0;
    scheduler.on("scan", () => {
      scans++;
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(1000);
    await vi.advanceTimersByTimeAsync(1000);
    expect(scheduler.state).toBe("scanning");

    scheduler.stop();
    scheduler.start();
    release();

    await vi.advanceTimersByTimeAsync(1000);
    expect(scans).toBe(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(scans).toBe(2);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(scans).toBe(3);

    scheduler.stop();
    await vi.advanceTimersByTimeAsync(200_000);
    expect(scans).toBe(3);
  });

  it("starts a manual scan in the background", async () => {
    const { scheduler, notifier } = build();

    scheduler.scanNow();
    expect(scheduler.state).toBe("scanning");

    await vi.waitFor(() => expect(scheduler.status().lastScan?.trigger).toBe("manual"));
    expect(scheduler.state).toBe("idle");
    expect(notifier.messages).toHaveLength(1);
  });
});
