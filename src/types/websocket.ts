/**
 * WebSocket message types for the alert stream
 */

import type { WebSocket } from "ws";

export type StreamChannel = "scans" | "alerts" | "*";

export const STREAM_CHANNELS: readonly StreamChannel[] = ["scans", "alerts", "*"];

export interface WSMessage {
  channel: StreamChannel | "system";
  event: "update" | "subscribe" | "unsubscribe" | "error" | "pong";
  data: unknown;
  timestamp: number;
  sequence?: number; // For ordering messages
}

export interface WSClientMessage {
  action: "subscribe" | "unsubscribe" | "ping";
  channels: StreamChannel[];
}

export interface WSClient {
  ws: WebSocket;
  subscriptions: Set<StreamChannel>;
  isAlive: boolean;
}
