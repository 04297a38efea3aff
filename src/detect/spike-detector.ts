/**
 * Volume Spike Detector
 *
 * Pure evaluation of one candle history. A signal fires only when all four
 * rules pass:
 *
 * 1. Volume ratio: current volume / mean of the previous `volumeLookback` bars
 *    is at least `spikeMultiplier`.
 * 2. Rising volume: current volume is above the previous bar's.
 * 3. Not already pumped: current close is within `maxCloseAboveAvg` of the
 *    mean close of the previous `closeLookback` bars.
 * 4. Near recent low: current close is at most `maxPercentAboveLow` percent
 *    above the lowest low of the last `lowLookback` bars.
 */

import type { Candle, SpikeSignal } from "../types/candle.js";

export interface SpikeDetectorOptions {
  spikeMultiplier: number;
  volumeLookback: number;
  closeLookback: number;
  /** 0.05 allows the close to sit 5% above the average */
  maxCloseAboveAvg: number;
  lowLookback: number;
  maxPercentAboveLow: number;
  /** Histories shorter than this never fire */
  minCandles: number;
}

export const DEFAULT_SPIKE_OPTIONS: Readonly<SpikeDetectorOptions> = {
  spikeMultiplier: 1.8,
  volumeLookback: 20,
  closeLookback: 10,
  maxCloseAboveAvg: 0.05,
  lowLookback: 30,
  maxPercentAboveLow: 40,
  minCandles: 22,
};

function mean(values: number[]): number {
  let sum = 0;
  for (const v of values) {
    sum += v;
  }
  return sum / values.length;
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function detectSpike(
  candles: readonly Candle[],
  options: Partial<SpikeDetectorOptions> = {}
): SpikeSignal | undefined {
  const opts = { ...DEFAULT_SPIKE_OPTIONS, ...options };
  const n = candles.length;

  if (n < Math.max(opts.minCandles, opts.volumeLookback + 1, opts.closeLookback + 1)) {
    return undefined;
  }

  const current = candles[n - 1];
  const previous = candles[n - 2];
  // Every lookback excludes the current bar
  const history = candles.slice(0, n - 1);

  const avgVolume = mean(history.slice(-opts.volumeLookback).map((c) => c.volume));
  if (!Number.isFinite(avgVolume) || avgVolume <= 0) {
    return undefined;
  }
  const ratio = current.volume / avgVolume;
  if (!Number.isFinite(ratio) || ratio < opts.spikeMultiplier) {
    return undefined;
  }

  if (!(current.volume > previous.volume)) {
    return undefined;
  }

  const avgClose = mean(history.slice(-opts.closeLookback).map((c) => c.close));
  if (!Number.isFinite(avgClose) || current.close > avgClose * (1 + opts.maxCloseAboveAvg)) {
    return undefined;
  }

  let recentLow = Infinity;
  for (const candle of candles.slice(-opts.lowLookback)) {
    recentLow = Math.min(recentLow, candle.low);
  }
  if (!Number.isFinite(recentLow) || recentLow <= 0) {
    return undefined;
  }
  const percentAboveLow = ((current.close - recentLow) / recentLow) * 100;
  if (!Number.isFinite(percentAboveLow) || percentAboveLow > opts.maxPercentAboveLow) {
    return undefined;
  }

  return {
    volumeRatio: round(ratio, 2),
    percentAboveLow: round(percentAboveLow, 1),
  };
}
