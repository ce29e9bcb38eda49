import { describe, it, expect } from "vitest";
import { checkConfig, type WorkerConfig } from "../src/config.js";

const valid: WorkerConfig = {
  apiBaseUrl: "http://queue.test/api",
  pollIntervalMs: 5_000,
  reconnectDelayMs: 30_000,
  requestTimeoutMs: 10_000,
  printerDevice: "console",
  receipt: {
    widthChars: 32,
    timeZone: "Europe/Berlin",
    header: "PRINTLINE",
    recipient: null,
    footer: null,
  },
  logLevel: "info",
};

describe("checkConfig", () => {
  it("accepts a usable config", () => {
    expect(checkConfig(valid)).toEqual([]);
  });

  it("rejects an unknown time zone", () => {
    const config = { ...valid, receipt: { ...valid.receipt, timeZone: "Mars/Olympus" } };
    expect(checkConfig(config)).toEqual([
      'RECEIPT_TIME_ZONE "Mars/Olympus" is not a known time zone',
    ]);
  });

  it("rejects settings that did not parse as numbers", () => {
    expect(checkConfig({ ...valid, pollIntervalMs: NaN })).toEqual([
      "POLL_INTERVAL_MS must be a positive number, got NaN",
    ]);
  });

  it("reports every setting that is zero or negative", () => {
    const config = {
      ...valid,
      reconnectDelayMs: 0,
      requestTimeoutMs: -1,
      receipt: { ...valid.receipt, widthChars: 0 },
    };
    expect(checkConfig(config)).toEqual([
      "RECONNECT_DELAY_MS must be a positive number, got 0",
      "REQUEST_TIMEOUT_MS must be a positive number, got -1",
      "PRINTER_WIDTH_CHARS must be a positive number, got 0",
    ]);
  });
});
