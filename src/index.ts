/**
 * Entry point for the volume spike scanner.
 *
 * Wires the sources, the monitor and the API, then starts the background scan loop.
 */

import { logger } from "./utils/logger.js";
import { getConfig } from "./utils/config.js";
import { createHttpClient } from "./utils/http.js";
import { createDefaultResolver } from "./sources/resolver.js";
import { ListingClient } from "./sources/listings.js";
import { UniverseManager } from "./monitor/universe.js";
import { CooldownTracker } from "./monitor/cooldown.js";
import { MonitorSettings } from "./monitor/settings.js";
import { ScanScheduler } from "./monitor/scheduler.js";
import { TelegramNotifier } from "./notify/telegram.js";
import { BatchFetcher } from "./market/batch.js";
import { ConstituentsClient } from "./constituents/ishares.js";
import { ApiServer } from "./api/server.js";
import { AlertStream } from "./api/websocket.js";

const config = getConfig();
logger.setLevel(config.logging.level);

const http = createHttpClient();

const resolver = createDefaultResolver(http, {
  defaultLimit: config.monitor.candleLimit,
  defaultTimeoutMs: config.sources.requestTimeoutMs,
});
const listings = new ListingClient(http, config.sources.listingTimeoutMs);
const universe = new UniverseManager(listings, config.sources.listingOrder);
const cooldown = new CooldownTracker(config.monitor.cooldownSeconds);
const settings = new MonitorSettings({
  token: config.telegram.botToken,
  chatId: config.telegram.chatId,
});
const notifier = new TelegramNotifier(settings, http);

const scheduler = new ScanScheduler(
  { resolver, universe, cooldown, notifier },
  {
    scanIntervalMs: config.monitor.scanIntervalMs,
    startupDelayMs: config.monitor.startupDelayMs,
    universeRefreshIntervalMs: config.monitor.universeRefreshIntervalMs,
    concurrency: config.monitor.maxConcurrency,
    maxAlerts: config.monitor.maxAlerts,
    interval: config.monitor.interval,
    candleLimit: config.monitor.candleLimit,
    requestTimeoutMs: config.sources.requestTimeoutMs,
    cooldownOnFailedDelivery: config.monitor.cooldownOnFailedDelivery,
    detector: { spikeMultiplier: config.monitor.spikeMultiplier },
  }
);

const stream = new AlertStream(scheduler);

const apiServer = new ApiServer({
  port: config.api.port,
  batch: new BatchFetcher(resolver, config.batch),
  listings,
  listingOrder: config.sources.listingOrder,
  constituents: new ConstituentsClient(config.constituents, http),
  scheduler,
  universe,
  cooldown,
  settings,
  notifier,
  stream,
});

async function main(): Promise<void> {
  logger.info("Starting volume spike scanner", {
    port: config.api.port,
    monitor: config.monitor.enabled,
    spikeMultiplier: config.monitor.spikeMultiplier,
    builtinCoins: universe.size,
    cryptoSources: resolver.chain("crypto"),
    equitySources: resolver.chain("equity"),
    telegramConfigured: settings.telegramConfigured,
  });

  await apiServer.start();

  if (config.monitor.enabled) {
    scheduler.start();
  } else {
    logger.info("Background monitor disabled in config");
  }

  logger.info("System initialized and running", { apiPort: apiServer.port });
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully`);

  scheduler.stop();
  await apiServer.stop();

  logger.info("Shutdown complete");
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error) => {
      logger.error("Shutdown failed", error instanceof Error ? error : new Error(String(error)));
      process.exit(1);
    });
  });
}

// Start the application
main().catch((error) => {
  logger.error("Fatal error in main", error instanceof Error ? error : new Error(String(error)));
  process.exit(1);
});
