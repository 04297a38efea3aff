/**
 * Base class for adapters backed by a REST endpoint.
 *
 * Subclasses describe the request and the payload mapping; the base class
 * turns request failures into tagged outcomes.
 */

import type { AxiosInstance } from "axios";
import type { SourceAdapter, CandleRequest } from "./interface.js";
import type {
  AssetClass,
  CandleSeries,
  FetchOutcome,
  Interval,
  SourceId,
} from "../types/candle.js";
import { createHttpClient, describeError } from "../utils/http.js";
import { logger } from "../utils/logger.js";

const log = logger.child({ component: "sources" });

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export abstract class RestSourceAdapter implements SourceAdapter {
  abstract readonly id: SourceId;
  abstract readonly displayName: string;
  abstract readonly assetClass: AssetClass;

  protected readonly http: AxiosInstance;

  constructor(http: AxiosInstance = createHttpClient()) {
    this.http = http;
  }

  abstract supports(interval: Interval): boolean;

  /** Perform the HTTP call and return the response body */
  protected abstract request(request: CandleRequest): Promise<unknown>;

  /** Map a response body into a series */
  protected abstract normalize(body: unknown, request: CandleRequest): FetchOutcome<CandleSeries>;

  async fetchCandles(request: CandleRequest): Promise<FetchOutcome<CandleSeries>> {
    if (!this.supports(request.interval)) {
      return { ok: false, reason: "unsupported", detail: `interval ${request.interval}` };
    }

    let body: unknown;
    try {
      body = await this.request(request);
    } catch (error) {
      const description = describeError(error);
      log.debug("Candle request failed", {
        source: this.id,
        symbol: request.symbol,
        kind: description.kind,
        detail: description.detail,
      });
      return {
        ok: false,
        reason: description.kind === "http" ? "http" : "transport",
        detail: description.detail,
      };
    }

    return this.normalize(body, request);
  }
}
