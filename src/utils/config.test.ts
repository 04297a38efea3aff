import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigManager, DEFAULT_CONFIG, mergeFileConfig } from "./config.js";
import { logger } from "./logger.js";

describe("mergeFileConfig", () => {
  it("overlays valid values and keeps defaults elsewhere", () => {
    const config = mergeFileConfig(DEFAULT_CONFIG, {
      api: { port: 8080 },
      monitor: { spikeMultiplier: 2.5, interval: "4h", enabled: false },
      sources: { listingOrder: ["okx", "kucoin"] },
    });

    expect(config.api.port).toBe(8080);
    expect(config.monitor.spikeMultiplier).toBe(2.5);
    expect(config.monitor.interval).toBe("4h");
    expect(config.monitor.enabled).toBe(false);
    expect(config.monitor.cooldownSeconds).toBe(7200);
    expect(config.sources.listingOrder).toEqual(["okx", "kucoin"]);
    expect(config.batch).toEqual(DEFAULT_CONFIG.batch);
  });

  it("ignores values of the wrong type", () => {
    const config = mergeFileConfig(DEFAULT_CONFIG, {
      api: { port: "80" },
      monitor: { interval: "5m", maxAlerts: -1 },
      sources: { listingOrder: ["ftx"] },
      logging: { level: "verbose" },
      batch: [],
    });

    expect(config.api.port).toBe(3000);
    expect(config.monitor.interval).toBe("1d");
    expect(config.monitor.maxAlerts).toBe(10);
    expect(config.sources.listingOrder).toEqual(["binance", "kucoin", "okx"]);
    expect(config.logging.level).toBe("info");
    expect(config.batch.maxSymbols).toBe(200);
  });

  it("requires positive intervals and limits but allows a zero delay", () => {
    const config = mergeFileConfig(DEFAULT_CONFIG, {
      monitor: { scanIntervalMs: 0, startupDelayMs: 0, cooldownSeconds: 0, maxConcurrency: 0 },
      batch: { requestTimeoutMs: 0 },
    });

    expect(config.monitor.scanIntervalMs).toBe(3_600_000);
    expect(config.monitor.maxConcurrency).toBe(DEFAULT_CONFIG.monitor.maxConcurrency);
    expect(config.batch.requestTimeoutMs).toBe(DEFAULT_CONFIG.batch.requestTimeoutMs);
    expect(config.monitor.startupDelayMs).toBe(0);
    expect(config.monitor.cooldownSeconds).toBe(0);
  });

  it("does not share arrays with the defaults", () => {
    const config = mergeFileConfig(DEFAULT_CONFIG, {});
    config.sources.listingOrder.push("okx");
    expect(DEFAULT_CONFIG.sources.listingOrder).toEqual(["binance", "kucoin", "okx"]);
  });
});

describe("ConfigManager", () => {
  let dir: string | null = null;

  afterEach(() => {
    vi.restoreAllMocks();
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  function writeConfig(content: unknown): string {
    dir = mkdtempSync(join(tmpdir(), "scanner-config-"));
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify(content));
    return path;
  }

  it("uses defaults when the file is missing", () => {
    const manager = new ConfigManager({ CONFIG_PATH: join(tmpdir(), "does-not-exist", "config.json") });
    expect(manager.getConfig().monitor.scanIntervalMs).toBe(3_600_000);
  });

  it("reads the file, then applies environment overrides", () => {
    const path = writeConfig({ api: { port: 4000 }, monitor: { cooldownSeconds: 600 } });
    const config = new ConfigManager({
      CONFIG_PATH: path,
      PORT: "5000",
      SPIKE_MULTIPLIER: "2.2",
      SCAN_INTERVAL_SECONDS: "900",
      MONITOR_ENABLED: "false",
      TELEGRAM_BOT_TOKEN: " test-token ",
      TELEGRAM_CHAT_ID: "12345",
      LOG_LEVEL: "DEBUG",
    }).getConfig();

    expect(config.api.port).toBe(5000);
    expect(config.monitor.cooldownSeconds).toBe(600);
    expect(config.monitor.spikeMultiplier).toBe(2.2);
    expect(config.monitor.scanIntervalMs).toBe(900_000);
    expect(config.monitor.enabled).toBe(false);
    expect(config.telegram).toEqual({ botToken: "test-token", chatId: "12345" });
    expect(config.logging.level).toBe("debug");
  });

  it("logs a successful load only when the file holds an object", () => {
    const info = vi.spyOn(logger, "info");
    const warn = vi.spyOn(logger, "warn");
    const path = writeConfig([1, 2]);

    const config = new ConfigManager({ CONFIG_PATH: path }).getConfig();

    expect(config.api.port).toBe(3000);
    expect(warn).toHaveBeenCalledWith("Configuration file is not an object, ignoring", { path });
    expect(info).not.toHaveBeenCalledWith("Configuration loaded from file", expect.anything());
  });

  it("logs a successful load for an object file", () => {
    const info = vi.spyOn(logger, "info");
    const path = writeConfig({ api: { port: 4000 } });

    new ConfigManager({ CONFIG_PATH: path });

    expect(info).toHaveBeenCalledWith("Configuration loaded from file", { path });
  });

  it("ignores unparseable numeric overrides", () => {
    const config = new ConfigManager({
      CONFIG_PATH: writeConfig({}),
      PORT: "abc",
      SPIKE_MULTIPLIER: "-1",
    }).getConfig();

    expect(config.api.port).toBe(3000);
    expect(config.monitor.spikeMultiplier).toBe(1.8);
  });
});
