import type { WorkerConfig } from "../config.js";
import { createLogger } from "../logger.js";
import { HttpQueueClient } from "../queue/client.js";
import { ConsoleDevice } from "../device/console.js";
import { LinePrinterDevice } from "../device/line-printer.js";
import type { OutputDevice } from "../device/device.js";
import { formatReceipt } from "../receipt/format.js";
import { timerSleeper } from "../sleeper.js";
import type { WorkerContext } from "./step.js";

export function createDevice(printerDevice: string, config: WorkerConfig): OutputDevice {
  if (printerDevice === "console") {
    return new ConsoleDevice(createLogger("printer", config.logLevel));
  }
  return new LinePrinterDevice(printerDevice);
}

/** Wire the real queue client, device and timers from configuration */
export function buildWorker(config: WorkerConfig, apiBaseUrl: string, signal: AbortSignal): WorkerContext {
  return {
    queue: new HttpQueueClient({ baseUrl: apiBaseUrl, timeoutMs: config.requestTimeoutMs }),
    device: createDevice(config.printerDevice, config),
    sleeper: timerSleeper,
    logger: createLogger("worker", config.logLevel),
    render: (message) => formatReceipt(message, config.receipt),
    pollIntervalMs: config.pollIntervalMs,
    reconnectDelayMs: config.reconnectDelayMs,
    signal,
  };
}
