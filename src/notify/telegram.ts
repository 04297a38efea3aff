/**
 * Telegram Bot API notifier.
 *
 * send() never throws: a missing configuration, a transport error or a
 * rejected message all come back as false.
 */

import type { AxiosInstance } from "axios";
import type { TelegramCredentials } from "../types/internal.js";
import type { MonitorSettings } from "../monitor/settings.js";
import { createHttpClient, describeError } from "../utils/http.js";
import { logger } from "../utils/logger.js";

const log = logger.child({ component: "telegram" });

const API_BASE_URL = "https://api.telegram.org";

/** Telegram rejects texts above 4096 characters */
export const MAX_MESSAGE_LENGTH = 4000;

export interface Notifier {
  send(text: string, credentials?: TelegramCredentials): Promise<boolean>;
}

/**
 * Split on line boundaries where possible; a single overlong line is cut hard.
 */
export function chunkMessage(text: string, maxLength: number = MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  let current = "";

  for (const line of text.split("\n")) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= maxLength) {
      current = candidate;
      continue;
    }
    if (current) {
      chunks.push(current);
    }
    let rest = line;
    while (rest.length > maxLength) {
      chunks.push(rest.slice(0, maxLength));
      rest = rest.slice(maxLength);
    }
    current = rest;
  }
  if (current) {
    chunks.push(current);
  }

  return chunks;
}

export class TelegramNotifier implements Notifier {
  private readonly http: AxiosInstance;

  constructor(
    private readonly settings: MonitorSettings,
    http: AxiosInstance = createHttpClient(),
    private readonly timeoutMs = 10_000
  ) {
    this.http = http;
  }

  /**
   * Deliver `text` with explicit credentials, or the stored ones.
   * True only when every chunk was accepted.
   */
  async send(text: string, credentials?: TelegramCredentials): Promise<boolean> {
    const target = credentials ?? this.settings.getTelegram();
    if (!target) {
      log.warn("Telegram not configured, skipping notification");
      return false;
    }

    for (const chunk of chunkMessage(text)) {
      try {
        await this.http.post(
          `${API_BASE_URL}/bot${target.token}/sendMessage`,
          {
            chat_id: target.chatId,
            text: chunk,
            parse_mode: "HTML",
            disable_web_page_preview: true,
          },
          { timeout: this.timeoutMs }
        );
      } catch (error) {
        const { kind, detail } = describeError(error);
        log.warn("Telegram delivery failed", { kind, detail });
        return false;
      }
    }

    log.info("Telegram message sent", { chatId: target.chatId, length: text.length });
    return true;
  }
}
