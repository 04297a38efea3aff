/**
 * Configuration system for the volume spike scanner.
 * Loads configuration from JSON files and environment variables.
 */

import { readFileSync } from "fs";
import { join } from "path";
import type { Interval, ListingExchange } from "../types/candle.js";
import { isLogLevel, logger, type LogLevel } from "./logger.js";

// ══════════════════════════════════════════════════════════════════════
// CONFIGURATION INTERFACE
// ══════════════════════════════════════════════════════════════════════

export interface SystemConfig {
  api: {
    port: number;                      // Default: 3000
  };

  // Background scanner
  monitor: {
    enabled: boolean;
    scanIntervalMs: number;            // Default: 3600000 (1 hour)
    startupDelayMs: number;            // Default: 30000
    universeRefreshIntervalMs: number; // Default: 86400000 (24 hours)
    cooldownSeconds: number;           // Default: 7200
    spikeMultiplier: number;           // Default: 1.8
    maxConcurrency: number;            // Default: 20
    maxAlerts: number;                 // Default: 10
    interval: Interval;                // Default: "1d"
    candleLimit: number;               // Default: 30
    cooldownOnFailedDelivery: boolean; // Default: false
  };

  // Candle and listing providers
  sources: {
    requestTimeoutMs: number;          // Default: 8000
    listingTimeoutMs: number;          // Default: 10000
    listingOrder: ListingExchange[];
  };

  // /crypto and /stocks endpoints
  batch: {
    maxSymbols: number;                // Default: 200
    cryptoConcurrency: number;         // Default: 20
    stockConcurrency: number;          // Default: 40
    defaultLimit: number;              // Default: 210
    requestTimeoutMs: number;          // Default: 10000
  };

  telegram: {
    botToken: string;
    chatId: string;
  };

  constituents: {
    cacheTtlMs: number;                // Default: 86400000
    timeoutMs: number;                 // Default: 20000
  };

  logging: {
    level: LogLevel;
  };
}

// ══════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ══════════════════════════════════════════════════════════════════════

export const DEFAULT_CONFIG: SystemConfig = {
  api: {
    port: 3000,
  },
  monitor: {
    enabled: true,
    scanIntervalMs: 3_600_000,
    startupDelayMs: 30_000,
    universeRefreshIntervalMs: 86_400_000,
    cooldownSeconds: 7200,
    spikeMultiplier: 1.8,
    maxConcurrency: 20,
    maxAlerts: 10,
    interval: "1d",
    candleLimit: 30,
    cooldownOnFailedDelivery: false,
  },
  sources: {
    requestTimeoutMs: 8000,
    listingTimeoutMs: 10000,
    listingOrder: ["binance", "kucoin", "okx"],
  },
  batch: {
    maxSymbols: 200,
    cryptoConcurrency: 20,
    stockConcurrency: 40,
    defaultLimit: 210,
    requestTimeoutMs: 10000,
  },
  telegram: {
    botToken: "",
    chatId: "",
  },
  constituents: {
    cacheTtlMs: 86_400_000,
    timeoutMs: 20000,
  },
  logging: {
    level: "info",
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const INTERVALS: readonly Interval[] = ["1h", "4h", "1d", "1w"];
const LISTING_EXCHANGES: readonly ListingExchange[] = ["binance", "kucoin", "okx"];

function isInterval(value: unknown): value is Interval {
  return INTERVALS.some((interval) => interval === value);
}

function isListingExchange(value: unknown): value is ListingExchange {
  return LISTING_EXCHANGES.some((exchange) => exchange === value);
}

// ══════════════════════════════════════════════════════════════════════
// FILE VALUE READERS
// Values of the wrong type keep the default.
// ══════════════════════════════════════════════════════════════════════

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isPlainObject(value) ? value : {};
}

function readNonNegative(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : fallback;
}

// Intervals, limits and timeouts where 0 would stall or empty the loop
function readPositive(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : fallback;
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === "boolean" ? value : fallback;
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === "string" ? value : fallback;
}

/**
 * Overlay a parsed configuration file onto the defaults.
 */
export function mergeFileConfig(base: SystemConfig, file: Record<string, unknown>): SystemConfig {
  const api = section(file, "api");
  const monitor = section(file, "monitor");
  const sources = section(file, "sources");
  const batch = section(file, "batch");
  const telegram = section(file, "telegram");
  const constituents = section(file, "constituents");
  const logging = section(file, "logging");

  const listingOrder = Array.isArray(sources.listingOrder)
    ? sources.listingOrder.filter(isListingExchange)
    : [];
  const level = logging.level;

  return {
    api: {
      port: readNonNegative(api, "port", base.api.port),
    },
    monitor: {
      enabled: readBoolean(monitor, "enabled", base.monitor.enabled),
      scanIntervalMs: readPositive(monitor, "scanIntervalMs", base.monitor.scanIntervalMs),
      startupDelayMs: readNonNegative(monitor, "startupDelayMs", base.monitor.startupDelayMs),
      universeRefreshIntervalMs: readPositive(
        monitor,
        "universeRefreshIntervalMs",
        base.monitor.universeRefreshIntervalMs
      ),
      cooldownSeconds: readNonNegative(monitor, "cooldownSeconds", base.monitor.cooldownSeconds),
      spikeMultiplier: readPositive(monitor, "spikeMultiplier", base.monitor.spikeMultiplier),
      maxConcurrency: readPositive(monitor, "maxConcurrency", base.monitor.maxConcurrency),
      maxAlerts: readPositive(monitor, "maxAlerts", base.monitor.maxAlerts),
      interval: isInterval(monitor.interval) ? monitor.interval : base.monitor.interval,
      candleLimit: readPositive(monitor, "candleLimit", base.monitor.candleLimit),
      cooldownOnFailedDelivery: readBoolean(
        monitor,
        "cooldownOnFailedDelivery",
        base.monitor.cooldownOnFailedDelivery
      ),
    },
    sources: {
      requestTimeoutMs: readPositive(sources, "requestTimeoutMs", base.sources.requestTimeoutMs),
      listingTimeoutMs: readPositive(sources, "listingTimeoutMs", base.sources.listingTimeoutMs),
      listingOrder: listingOrder.length > 0 ? listingOrder : [...base.sources.listingOrder],
    },
    batch: {
      maxSymbols: readPositive(batch, "maxSymbols", base.batch.maxSymbols),
      cryptoConcurrency: readPositive(batch, "cryptoConcurrency", base.batch.cryptoConcurrency),
      stockConcurrency: readPositive(batch, "stockConcurrency", base.batch.stockConcurrency),
      defaultLimit: readPositive(batch, "defaultLimit", base.batch.defaultLimit),
      requestTimeoutMs: readPositive(batch, "requestTimeoutMs", base.batch.requestTimeoutMs),
    },
    telegram: {
      botToken: readString(telegram, "botToken", base.telegram.botToken),
      chatId: readString(telegram, "chatId", base.telegram.chatId),
    },
    constituents: {
      cacheTtlMs: readPositive(constituents, "cacheTtlMs", base.constituents.cacheTtlMs),
      timeoutMs: readPositive(constituents, "timeoutMs", base.constituents.timeoutMs),
    },
    logging: {
      level: isLogLevel(level) ? level : base.logging.level,
    },
  };
}

function parsePositiveNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

// ══════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADER
// ══════════════════════════════════════════════════════════════════════

export class ConfigManager {
  private config: SystemConfig;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file and environment variables.
   */
  private loadConfig(): SystemConfig {
    const configPath = this.env.CONFIG_PATH || join(process.cwd(), "config", "default.json");

    let fileConfig: Record<string, unknown> = {};

    try {
      const configContent = readFileSync(configPath, "utf-8");
      const parsed: unknown = JSON.parse(configContent);
      if (isPlainObject(parsed)) {
        fileConfig = parsed;
        logger.info("Configuration loaded from file", { path: configPath });
      } else {
        logger.warn("Configuration file is not an object, ignoring", { path: configPath });
      }
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        logger.warn("Configuration file not found, using defaults", { path: configPath });
      } else {
        logger.error(
          "Failed to load configuration file",
          error instanceof Error ? error : new Error(String(error)),
          { path: configPath }
        );
      }
    }

    const merged = mergeFileConfig(DEFAULT_CONFIG, fileConfig);

    this.applyEnvOverrides(merged);

    return merged;
  }

  /**
   * Apply environment variable overrides.
   */
  private applyEnvOverrides(config: SystemConfig): void {
    const port = parsePositiveNumber(this.env.PORT);
    if (port !== undefined) {
      config.api.port = Math.floor(port);
    }

    if (this.env.MONITOR_ENABLED !== undefined) {
      config.monitor.enabled = this.env.MONITOR_ENABLED === "true";
    }

    const multiplier = parsePositiveNumber(this.env.SPIKE_MULTIPLIER);
    if (multiplier !== undefined) {
      config.monitor.spikeMultiplier = multiplier;
    }

    const scanSeconds = parsePositiveNumber(this.env.SCAN_INTERVAL_SECONDS);
    if (scanSeconds !== undefined) {
      config.monitor.scanIntervalMs = scanSeconds * 1000;
    }

    const cooldownSeconds = parsePositiveNumber(this.env.ALERT_COOLDOWN_SECONDS);
    if (cooldownSeconds !== undefined) {
      config.monitor.cooldownSeconds = cooldownSeconds;
    }

    // Telegram credentials
    if (this.env.TELEGRAM_BOT_TOKEN) {
      config.telegram.botToken = this.env.TELEGRAM_BOT_TOKEN.trim();
    }
    if (this.env.TELEGRAM_CHAT_ID) {
      config.telegram.chatId = this.env.TELEGRAM_CHAT_ID.trim();
    }

    if (this.env.LOG_LEVEL) {
      const level = this.env.LOG_LEVEL.toLowerCase();
      if (isLogLevel(level)) {
        config.logging.level = level;
      }
    }
  }

  /**
   * Get the current configuration.
   */
  getConfig(): SystemConfig {
    return { ...this.config };
  }
}

let instance: ConfigManager | null = null;

// Created on first use
export function getConfigManager(): ConfigManager {
  if (!instance) {
    instance = new ConfigManager();
  }
  return instance;
}

// Convenience function to get config
export function getConfig(): SystemConfig {
  return getConfigManager().getConfig();
}
