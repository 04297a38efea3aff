import { describe, it, expect } from "vitest";
import { TelegramNotifier, chunkMessage } from "./telegram.js";
import { MonitorSettings } from "../monitor/settings.js";
import { createFakeHttp } from "../testing/fake-http.js";

describe("chunkMessage", () => {
  it("returns short texts whole", () => {
    expect(chunkMessage("hello", 10)).toEqual(["hello"]);
  });

  it("splits on line boundaries", () => {
    expect(chunkMessage("aaaa\nbbbb\ncc", 9)).toEqual(["aaaa\nbbbb", "cc"]);
  });

  it("cuts a single overlong line", () => {
    expect(chunkMessage("x".repeat(10), 4)).toEqual(["xxxx", "xxxx", "xx"]);
  });
});

describe("TelegramNotifier", () => {
  it("posts HTML messages with the stored credentials", async () => {
    const { http, requests } = createFakeHttp(() => ({ data: { ok: true } }));
    const notifier = new TelegramNotifier(new MonitorSettings({ token: "test-token", chatId: "12345" }), http, 4000);

    expect(await notifier.send("<b>hi</b>")).toBe(true);
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe("POST");
    expect(requests[0].url).toBe("https://api.telegram.org/bottest-token/sendMessage");
    expect(requests[0].timeout).toBe(4000);
    expect(requests[0].data).toEqual({
      chat_id: "12345",
      text: "<b>hi</b>",
      parse_mode: "HTML",
      disable_web_page_preview: true,
    });
  });

  it("prefers explicit credentials", async () => {
    const { http, requests } = createFakeHttp(() => ({ data: { ok: true } }));
    const notifier = new TelegramNotifier(new MonitorSettings({ token: "test-token", chatId: "1" }), http);

    await notifier.send("hi", { token: "other-token", chatId: "2" });

    expect(requests[0].url).toBe("https://api.telegram.org/botother-token/sendMessage");
    expect(requests[0].data).toMatchObject({ chat_id: "2" });
  });

  it("returns false without credentials and sends nothing", async () => {
    const { http, requests } = createFakeHttp(() => ({ data: { ok: true } }));
    expect(await new TelegramNotifier(new MonitorSettings(), http).send("hi")).toBe(false);
    expect(requests).toHaveLength(0);
  });

  it("returns false when Telegram rejects the message", async () => {
    const { http } = createFakeHttp(() => ({ status: 400, data: { ok: false, description: "chat not found" } }));
    const notifier = new TelegramNotifier(new MonitorSettings({ token: "test-token", chatId: "1" }), http);
    expect(await notifier.send("hi")).toBe(false);
  });

  it("sends long texts in several messages", async () => {
    const { http, requests } = createFakeHttp(() => ({ data: { ok: true } }));
    const notifier = new TelegramNotifier(new MonitorSettings({ token: "test-token", chatId: "1" }), http);
    const line = "y".repeat(3000);

    expect(await notifier.send(`${line}\n${line}`)).toBe(true);
    expect(requests).toHaveLength(2);
  });

  it("stops at the first failed chunk", async () => {
    let calls = 0;
    const { http, requests } = createFakeHttp(() => (++calls === 1 ? { timeout: true } : { data: { ok: true } }));
    const notifier = new TelegramNotifier(new MonitorSettings({ token: "test-token", chatId: "1" }), http);
    const line = "z".repeat(3000);

    expect(await notifier.send(`${line}\n${line}`)).toBe(false);
    expect(requests).toHaveLength(1);
  });
});
