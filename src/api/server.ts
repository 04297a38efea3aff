/**
 * HTTP API Server
 *
 * Batched candles, exchange pairs, index constituents and monitor control.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import { URL } from "url";
import { logger } from "../utils/logger.js";
import { type BatchFetcher, parseInterval, parseLimit, parseSymbols } from "../market/batch.js";
import type { ListingClient } from "../sources/listings.js";
import { isRecord } from "../sources/rest-adapter.js";
import type { ListingExchange } from "../types/candle.js";
import type { MonitorStatus } from "../types/internal.js";
import { ConstituentsUnavailableError, type ConstituentsClient } from "../constituents/ishares.js";
import { formatTestMessage } from "../monitor/alert-format.js";
import type { CooldownTracker } from "../monitor/cooldown.js";
import type { ScanScheduler } from "../monitor/scheduler.js";
import { MonitorSettings } from "../monitor/settings.js";
import type { UniverseManager } from "../monitor/universe.js";
import type { Notifier } from "../notify/telegram.js";
import type { AlertStream } from "./websocket.js";

const log = logger.child({ component: "api" });

/** Upper bound for POST bodies */
const MAX_BODY_BYTES = 64 * 1024;

export interface ApiServerOptions {
  port: number;
  host?: string;
  batch: BatchFetcher;
  listings: Pick<ListingClient, "resolve">;
  listingOrder: readonly ListingExchange[];
  constituents: Pick<ConstituentsClient, "russell2000" | "sp500">;
  scheduler: ScanScheduler;
  universe: UniverseManager;
  cooldown: CooldownTracker;
  settings: MonitorSettings;
  notifier: Notifier;
  stream?: AlertStream;
  now?: () => number;
}

class BadRequestError extends Error {}

export class ApiServer {
  private server: Server | null = null;
  private readonly options: ApiServerOptions;
  private readonly now: () => number;

  constructor(options: ApiServerOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  /**
   * Start the API server.
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res);
      });
      this.server = server;

      server.on("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "EADDRINUSE") {
          log.error(`Port ${this.options.port} is already in use`, error);
        } else {
          log.error("API server error", error);
        }
        reject(error);
      });

      server.listen(this.options.port, this.options.host, () => {
        this.options.stream?.start(server);
        log.info("API server started", { port: this.port });
        resolve();
      });
    });
  }

  /**
   * Stop the API server.
   */
  stop(): Promise<void> {
    this.options.stream?.stop();
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          log.info("API server stopped");
          resolve();
        });
        this.server = null;
      } else {
        resolve();
      }
    });
  }

  /** Bound port; differs from the configured one when that was 0 */
  get port(): number {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : this.options.port;
  }

  /**
   * Handle incoming HTTP request.
   */
  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const startTime = this.now();
    const url = new URL(req.url || "/", `http://${req.headers.host ?? "localhost"}`);

    // Enable CORS
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.writeHead(200);
      res.end();
      return;
    }

    this.route(req, res, url)
      .catch((error) => {
        if (error instanceof BadRequestError) {
          this.sendJson(res, 400, { error: error.message });
        } else {
          this.handleError(res, error instanceof Error ? error : new Error(String(error)));
        }
      })
      .finally(() => {
        log.debug("API request", {
          method: req.method,
          path: url.pathname,
          durationMs: this.now() - startTime,
        });
      });
  }

  private async route(req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> {
    const path = url.pathname.replace(/\/+$/, "") || "/";

    if (req.method === "POST") {
      if (path === "/monitor/config") {
        return this.handleMonitorConfig(req, res);
      }
      return this.handleNotFound(res);
    }

    switch (path) {
      case "/":
        return this.handleRoot(res);
      case "/health":
        return this.handleHealth(res);
      case "/crypto":
        return this.handleCrypto(res, url);
      case "/stocks":
        return this.handleStocks(res, url);
      case "/pairs":
        return this.handlePairs(res);
      case "/russell2000":
        return this.handleRussell(res);
      case "/sp500":
        return this.handleSp500(res);
      case "/monitor/status":
        return this.handleMonitorStatus(res);
      case "/monitor/test":
        return this.handleMonitorTest(res, url);
      case "/monitor/scan-now":
        return this.handleScanNow(res, url);
      default:
        return this.handleNotFound(res);
    }
  }

  // ══════════════════════════════════════════════════════════════════════
  // INFO
  // ══════════════════════════════════════════════════════════════════════

  private handleRoot(res: ServerResponse): void {
    this.sendJson(res, 200, {
      name: "Volume Spike Scanner API",
      version: "0.1.0",
      endpoints: {
        health: "/health",
        crypto: "/crypto?symbols=BTC,ETH&interval=1d&limit=210",
        stocks: "/stocks?symbols=AAPL,MSFT&interval=1wk",
        pairs: "/pairs",
        constituents: ["/russell2000", "/sp500"],
        monitor: {
          status: "/monitor/status",
          config: "POST /monitor/config",
          test: "/monitor/test",
          scanNow: "/monitor/scan-now",
        },
        stream: "/ws",
      },
    });
  }

  private handleHealth(res: ServerResponse): void {
    this.sendJson(res, 200, {
      status: "ok",
      monitor: this.options.scheduler.isRunning,
      stream: this.options.stream?.getStats() ?? null,
    });
  }

  // ══════════════════════════════════════════════════════════════════════
  // MARKET DATA
  // ══════════════════════════════════════════════════════════════════════

  private async handleCrypto(res: ServerResponse, url: URL): Promise<void> {
    const { batch } = this.options;
    const symbols = parseSymbols(url.searchParams.get("symbols"), batch.maxSymbols);
    if (symbols.length === 0) {
      this.sendJson(res, 200, {});
      return;
    }
    const interval = parseInterval(url.searchParams.get("interval"), "crypto");
    const limit = parseLimit(url.searchParams.get("limit"), batch.defaultLimit);

    this.sendJson(res, 200, await batch.fetchCrypto(symbols, interval, limit));
  }

  private async handleStocks(res: ServerResponse, url: URL): Promise<void> {
    const { batch } = this.options;
    const symbols = parseSymbols(url.searchParams.get("symbols"), batch.maxSymbols);
    if (symbols.length === 0) {
      this.sendJson(res, 200, {});
      return;
    }
    const interval = parseInterval(url.searchParams.get("interval"), "equity");

    this.sendJson(res, 200, await batch.fetchStocks(symbols, interval));
  }

  private async handlePairs(res: ServerResponse): Promise<void> {
    const listing = await this.options.listings.resolve(this.options.listingOrder);
    if (!listing) {
      this.sendJson(res, 200, { symbols: [], count: 0, source: "none" });
      return;
    }
    this.sendJson(res, 200, {
      symbols: listing.symbols,
      count: listing.symbols.length,
      source: listing.source,
    });
  }

  private async handleRussell(res: ServerResponse): Promise<void> {
    await this.sendConstituents(res, () => this.options.constituents.russell2000());
  }

  private async handleSp500(res: ServerResponse): Promise<void> {
    await this.sendConstituents(res, () => this.options.constituents.sp500());
  }

  private async sendConstituents(
    res: ServerResponse,
    fetch: () => Promise<unknown>
  ): Promise<void> {
    try {
      this.sendJson(res, 200, await fetch());
    } catch (error) {
      if (error instanceof ConstituentsUnavailableError) {
        log.warn("Constituents unavailable", { detail: error.message });
        this.sendJson(res, 503, { error: error.message });
        return;
      }
      throw error;
    }
  }

  // ══════════════════════════════════════════════════════════════════════
  // MONITOR
  // ══════════════════════════════════════════════════════════════════════

  private async handleMonitorConfig(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readJsonBody(req);
    const credentials = MonitorSettings.normalize(body.token, body.chat_id);
    if (!credentials) {
      this.sendJson(res, 400, { ok: false, message: "Missing token or chat_id" });
      return;
    }

    this.options.settings.setTelegram(credentials);
    log.info("Telegram configured via API", { chatId: credentials.chatId });
    this.sendJson(res, 200, { ok: true, message: "Telegram configured for this session" });
  }

  private handleMonitorStatus(res: ServerResponse): void {
    this.sendJson(res, 200, this.monitorStatus());
  }

  monitorStatus(): MonitorStatus {
    const { scheduler, universe, cooldown, settings } = this.options;
    const options = scheduler.getOptions();
    const last = scheduler.status().lastScan;

    return {
      running: scheduler.isRunning,
      state: scheduler.state,
      scan_interval_minutes: Math.floor(options.scanIntervalMs / 60_000),
      alert_cooldown_hours: Math.floor(cooldown.window / 3600),
      spike_threshold: scheduler.spikeMultiplier,
      coins_monitored: universe.size,
      universe_source: universe.source,
      recent_alerts: cooldown.recentCount(Math.floor(this.now() / 1000)),
      telegram_configured: settings.telegramConfigured,
      last_scan: last
        ? {
          trigger: last.trigger,
          finishedAt: last.finishedAt,
          scanned: last.scanned,
          alerted: last.alerted,
          delivered: last.delivered,
        }
        : null,
    };
  }

  /**
   * One-off test message. Query credentials are used for this send only.
   */
  private async handleMonitorTest(res: ServerResponse, url: URL): Promise<void> {
    const { settings, notifier, universe, scheduler } = this.options;
    const credentials = MonitorSettings.normalize(
      url.searchParams.get("token") ?? settings.getTelegram()?.token,
      url.searchParams.get("chat_id") ?? settings.getTelegram()?.chatId
    );
    if (!credentials) {
      this.sendJson(res, 200, { sent: false, error: "No Telegram token configured" });
      return;
    }

    const sent = await notifier.send(formatTestMessage(universe.size, scheduler.spikeMultiplier), credentials);
    this.sendJson(res, 200, { sent });
  }

  private handleScanNow(res: ServerResponse, url: URL): void {
    const { settings, scheduler, universe } = this.options;
    const credentials = MonitorSettings.normalize(
      url.searchParams.get("token"),
      url.searchParams.get("chat_id")
    );
    if (credentials) {
      settings.setTelegram(credentials);
    }

    scheduler.scanNow();
    this.sendJson(res, 200, { status: "scan started", coins: universe.size });
  }

  // ══════════════════════════════════════════════════════════════════════
  // RESPONSES
  // ══════════════════════════════════════════════════════════════════════

  private handleNotFound(res: ServerResponse): void {
    this.sendJson(res, 404, { error: "Not found" });
  }

  private handleError(res: ServerResponse, error: Error): void {
    log.error("API error", error);
    if (res.headersSent) {
      res.end();
      return;
    }
    this.sendJson(res, 500, {
      error: "Internal server error",
      message: error.message,
    });
  }

  private sendJson(res: ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(body));
  }
}

/**
 * Read a JSON object body. Anything unparseable reads as an empty object.
 */
async function readJsonBody(req: IncomingMessage): Promise<Record<string, unknown>> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new BadRequestError("Request body too large");
    }
    chunks.push(buffer);
  }

  try {
    const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString("utf-8"));
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}
