/**
 * Runtime-reconfigurable monitor settings shared by the scheduler, notifier
 * and API. Credentials are replaced as a whole, never field by field.
 */

import type { TelegramCredentials } from "../types/internal.js";

export class MonitorSettings {
  private credentials: TelegramCredentials | null;

  constructor(initial?: Partial<TelegramCredentials>) {
    this.credentials = MonitorSettings.normalize(initial?.token, initial?.chatId);
  }

  /**
   * Both fields trimmed and non-empty, or null.
   */
  static normalize(token: unknown, chatId: unknown): TelegramCredentials | null {
    const t = typeof token === "string" ? token.trim() : "";
    const c = typeof chatId === "string" ? chatId.trim() : "";
    return t && c ? { token: t, chatId: c } : null;
  }

  getTelegram(): TelegramCredentials | null {
    return this.credentials;
  }

  setTelegram(credentials: TelegramCredentials): void {
    this.credentials = { ...credentials };
  }

  get telegramConfigured(): boolean {
    return this.credentials !== null;
  }
}
