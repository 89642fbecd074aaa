// CHANGE: Check translation of HTTP client failures into transport errors.
// WHY: Status and timeout failures must surface as one diagnostic naming the stage.
// SOURCE: internal reasoning

import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { ChainBrokenError, ConfigurationError, TransportError, guardStage, succeed, toTransportError } from "../src/errors.js";

const PAGE_URL = "https://mirror.test/uploads/";
const dummyConfig = { url: PAGE_URL, headers: {} } as InternalAxiosRequestConfig;

describe("toTransportError", () => {
  it("keeps the HTTP status of a rejected response", () => {
    const cause = new AxiosError("Request failed with status code 503");
    cause.response = {
      status: 503,
      statusText: "Service Unavailable",
      headers: {},
      config: dummyConfig,
      data: null
    } satisfies AxiosResponse;

    const error = toTransportError(cause, "locate", PAGE_URL);

    expect(error).toBeInstanceOf(TransportError);
    expect(error.message).toBe(`HTTP 503 for ${PAGE_URL}`);
    expect(error.status).toBe(503);
    expect(error.stage).toBe("locate");
  });

  it("reports timeouts distinctly", () => {
    const cause = new AxiosError("timeout of 30000ms exceeded", "ECONNABORTED");
    expect(toTransportError(cause, "resolve", PAGE_URL).message).toBe(`Timed out fetching ${PAGE_URL}`);
  });

  it("returns an existing transport error unchanged", () => {
    const original = new TransportError("HTTP 404 for x", "select", "x", 404);
    expect(toTransportError(original, "download", "y")).toBe(original);
  });
});

describe("error classes", () => {
  it("carry kind, stage and class name", () => {
    const error = new ChainBrokenError(1, "https://mirror.test/v/");
    expect(error.name).toBe("ChainBrokenError");
    expect(error.kind).toBe("chain-broken");
    expect(error.stage).toBe("resolve");
    expect(new ConfigurationError("YOUTUBE_VERSION missing").stage).toBe("config");
  });
});

describe("guardStage", () => {
  it("turns a thrown retrieval error into a failed result", async () => {
    const error = new ConfigurationError("bad");
    const result = await guardStage<number>(async () => {
      throw error;
    });
    expect(result).toEqual({ ok: false, error });
  });

  it("passes successful results through", async () => {
    await expect(guardStage(async () => succeed(3))).resolves.toEqual({ ok: true, value: 3 });
  });

  it("rethrows unexpected errors", async () => {
    await expect(
      guardStage(async () => {
        throw new TypeError("boom");
      })
    ).rejects.toThrow("boom");
  });
});
