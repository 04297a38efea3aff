/**
 * Shared HTTP client for provider requests.
 */

import axios, { type AxiosInstance } from "axios";

export const DEFAULT_HEADERS = {
  "User-Agent": "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36",
  "Accept": "application/json",
} as const;

/**
 * Create an axios instance with the headers every provider expects.
 * Timeouts are set per call.
 */
export function createHttpClient(): AxiosInstance {
  return axios.create({
    headers: { ...DEFAULT_HEADERS },
  });
}

export type RequestErrorKind = "timeout" | "http" | "network" | "unknown";

export interface RequestErrorDescription {
  kind: RequestErrorKind;
  status?: number;
  detail: string;
}

/**
 * Classify a failed request for logging and fallback decisions.
 */
export function describeError(error: unknown): RequestErrorDescription {
  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return { kind: "timeout", detail: error.message };
    }
    if (error.response) {
      const body = typeof error.response.data === "string"
        ? error.response.data.slice(0, 80)
        : "";
      return {
        kind: "http",
        status: error.response.status,
        detail: `HTTP ${error.response.status}${body ? ` ${body}` : ""}`,
      };
    }
    return { kind: "network", detail: error.message };
  }

  if (error instanceof Error) {
    return { kind: "unknown", detail: error.message };
  }

  return { kind: "unknown", detail: String(error) };
}
