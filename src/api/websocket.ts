/**
 * Alert stream
 *
 * Pushes scan summaries and alert batches to dashboard clients over /ws.
 * Clients subscribe to "scans", "alerts" or "*".
 */

import type { Server } from "http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { logger } from "../utils/logger.js";
import type { AlertCandidate, ScanReport } from "../types/internal.js";
import {
  STREAM_CHANNELS,
  type StreamChannel,
  type WSClient,
  type WSClientMessage,
  type WSMessage,
} from "../types/websocket.js";
import type { ScanScheduler } from "../monitor/scheduler.js";

const log = logger.child({ component: "stream" });

function isChannel(value: unknown): value is StreamChannel {
  return STREAM_CHANNELS.some((channel) => channel === value);
}

/**
 * Validate a client frame. Unknown channels are dropped, not rejected.
 */
export function parseClientMessage(data: string): WSClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || !("action" in parsed)) {
    return null;
  }
  const action = parsed.action;
  if (action !== "subscribe" && action !== "unsubscribe" && action !== "ping") {
    return null;
  }
  const raw = "channels" in parsed && Array.isArray(parsed.channels) ? parsed.channels : [];
  return { action, channels: raw.filter(isChannel) };
}

/** Scan summary without the full signal list */
export function summarizeScan(report: ScanReport): Record<string, unknown> {
  return {
    trigger: report.trigger,
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    durationMs: report.durationMs,
    scanned: report.scanned,
    cooling: report.cooling,
    unavailable: report.unavailable,
    signals: report.signals.length,
    alerted: report.alerted.map((a) => a.symbol),
    delivered: report.delivered,
  };
}

export class AlertStream {
  private wss: WebSocketServer | null = null;
  private clients: Map<WebSocket, WSClient> = new Map();
  private sequenceNumber = 0;
  private pingInterval: NodeJS.Timeout | null = null;
  private readonly pingIntervalMs: number;

  private readonly onScan = (report: ScanReport): void => {
    this.broadcast("scans", summarizeScan(report));
  };

  private readonly onAlert = (alerts: AlertCandidate[]): void => {
    this.broadcast("alerts", alerts);
  };

  constructor(private readonly scheduler: ScanScheduler, options: { pingIntervalMs?: number } = {}) {
    this.pingIntervalMs = options.pingIntervalMs ?? 30_000;
  }

  /**
   * Attach to an HTTP server and start relaying scheduler events.
   */
  start(server: Server): void {
    if (this.wss) {
      log.warn("Alert stream already started");
      return;
    }

    this.wss = new WebSocketServer({ server, path: "/ws" });

    this.wss.on("connection", (ws, req) => {
      this.handleConnection(ws, req.headers.origin);
    });

    this.scheduler.on("scan", this.onScan);
    this.scheduler.on("alert", this.onAlert);

    this.pingInterval = setInterval(() => {
      this.pingClients();
    }, this.pingIntervalMs);

    log.info("Alert stream started", { path: "/ws" });
  }

  stop(): void {
    this.scheduler.off("scan", this.onScan);
    this.scheduler.off("alert", this.onAlert);

    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }

    for (const client of this.clients.values()) {
      client.ws.close();
    }
    this.clients.clear();

    if (this.wss) {
      this.wss.close();
      this.wss = null;
      log.info("Alert stream stopped");
    }
  }

  private handleConnection(ws: WebSocket, origin: string | undefined): void {
    const client: WSClient = {
      ws,
      subscriptions: new Set(),
      isAlive: true,
    };
    this.clients.set(ws, client);

    this.sendToClient(ws, {
      channel: "system",
      event: "subscribe",
      data: { message: "Connected to alert stream", channels: STREAM_CHANNELS },
      timestamp: Date.now(),
    });

    ws.on("message", (data: RawData) => {
      const message = parseClientMessage(data.toString());
      if (!message) {
        this.sendToClient(ws, {
          channel: "system",
          event: "error",
          data: { error: "Invalid message format" },
          timestamp: Date.now(),
        });
        return;
      }
      this.handleClientMessage(client, message);
    });

    ws.on("close", () => {
      this.clients.delete(ws);
      log.debug("Stream client disconnected", { remainingClients: this.clients.size });
    });

    ws.on("error", (error) => {
      log.error("Stream socket error", error);
      this.clients.delete(ws);
    });

    ws.on("pong", () => {
      client.isAlive = true;
    });

    log.debug("Stream client connected", { clientCount: this.clients.size, origin });
  }

  private handleClientMessage(client: WSClient, message: WSClientMessage): void {
    switch (message.action) {
      case "subscribe":
        for (const channel of message.channels) {
          client.subscriptions.add(channel);
        }
        this.sendToClient(client.ws, {
          channel: "system",
          event: "subscribe",
          data: { channels: Array.from(client.subscriptions) },
          timestamp: Date.now(),
        });
        break;

      case "unsubscribe":
        for (const channel of message.channels) {
          client.subscriptions.delete(channel);
        }
        this.sendToClient(client.ws, {
          channel: "system",
          event: "unsubscribe",
          data: { channels: Array.from(client.subscriptions) },
          timestamp: Date.now(),
        });
        break;

      case "ping":
        this.sendToClient(client.ws, {
          channel: "system",
          event: "pong",
          data: null,
          timestamp: Date.now(),
        });
        break;
    }
  }

  /**
   * Send to every client subscribed to `channel` or "*".
   */
  broadcast(channel: Exclude<StreamChannel, "*">, data: unknown): void {
    const message: WSMessage = {
      channel,
      event: "update",
      data,
      timestamp: Date.now(),
      sequence: ++this.sequenceNumber,
    };
    const payload = JSON.stringify(message);

    let sentCount = 0;
    for (const [ws, client] of this.clients.entries()) {
      if (!client.subscriptions.has(channel) && !client.subscriptions.has("*")) {
        continue;
      }
      if (ws.readyState !== WebSocket.OPEN) {
        continue;
      }
      try {
        ws.send(payload);
        sentCount++;
      } catch (error) {
        log.error("Failed to send stream message", error instanceof Error ? error : new Error(String(error)));
        this.clients.delete(ws);
      }
    }

    if (sentCount > 0) {
      log.debug("Broadcast message", { channel, sentCount });
    }
  }

  private sendToClient(ws: WebSocket, message: WSMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  /**
   * Drop clients that missed the previous ping, ping the rest.
   */
  private pingClients(): void {
    for (const [ws, client] of this.clients.entries()) {
      if (!client.isAlive) {
        log.debug("Closing inactive stream connection");
        ws.terminate();
        this.clients.delete(ws);
        continue;
      }

      client.isAlive = false;
      if (ws.readyState === WebSocket.OPEN) {
        ws.ping();
      }
    }
  }

  getStats(): { clientCount: number; totalSubscriptions: number } {
    let totalSubscriptions = 0;
    for (const client of this.clients.values()) {
      totalSubscriptions += client.subscriptions.size;
    }
    return { clientCount: this.clients.size, totalSubscriptions };
  }
}
