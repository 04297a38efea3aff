/**
 * Candle builders for tests.
 */

import type { Candle } from "../types/candle.js";

export const DAY_MS = 86_400_000;
export const BASE_TIME = Date.UTC(2024, 0, 1);

/**
 * `count` flat daily bars: open/close 100, high 101, low 99, volume 1000.
 */
export function flatCandles(count: number, overrides: Partial<Candle> = {}): Candle[] {
  return Array.from({ length: count }, (_, i) => ({
    timestamp: BASE_TIME + i * DAY_MS,
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 1000,
    ...overrides,
  }));
}

/**
 * Flat history with the last bar replaced.
 */
export function withLastBar(candles: Candle[], last: Partial<Candle>): Candle[] {
  const copy = [...candles];
  const tail = copy[copy.length - 1];
  copy[copy.length - 1] = { ...tail, ...last };
  return copy;
}

/**
 * 30 flat bars ending in a spike of `volume` that passes every detector rule.
 */
export function spikeCandles(volume: number): Candle[] {
  return withLastBar(flatCandles(30), { volume });
}
