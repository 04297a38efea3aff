import { describe, it, expect } from "vitest";
import { AxiosError, AxiosHeaders, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { DEFAULT_HEADERS, createHttpClient, describeError } from "./http.js";

const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };

function response(status: number, data: unknown): AxiosResponse {
  return { status, statusText: String(status), data, headers: {}, config };
}

describe("describeError", () => {
  it("classifies timeouts", () => {
    const error = new AxiosError("timeout of 8000ms exceeded", "ECONNABORTED", config);
    expect(describeError(error)).toEqual({ kind: "timeout", detail: "timeout of 8000ms exceeded" });
  });

  it("includes status and a body excerpt for HTTP errors", () => {
    const error = new AxiosError("Request failed", "ERR_BAD_REQUEST", config, {}, response(429, "slow down"));
    expect(describeError(error)).toEqual({ kind: "http", status: 429, detail: "HTTP 429 slow down" });
  });

  it("omits non-text bodies", () => {
    const error = new AxiosError("Request failed", "ERR_BAD_RESPONSE", config, {}, response(500, { msg: "x" }));
    expect(describeError(error)).toEqual({ kind: "http", status: 500, detail: "HTTP 500" });
  });

  it("classifies connection failures as network errors", () => {
    const error = new AxiosError("getaddrinfo ENOTFOUND api.example.test", "ENOTFOUND", config);
    expect(describeError(error)).toEqual({ kind: "network", detail: "getaddrinfo ENOTFOUND api.example.test" });
  });

  it("handles plain errors and thrown values", () => {
    expect(describeError(new Error("bad"))).toEqual({ kind: "unknown", detail: "bad" });
    expect(describeError("oops")).toEqual({ kind: "unknown", detail: "oops" });
  });
});

describe("createHttpClient", () => {
  it("sends the default headers", () => {
    const client = createHttpClient();
    expect(client.defaults.headers["User-Agent"]).toBe(DEFAULT_HEADERS["User-Agent"]);
  });
});
