export type LogLevel = "debug" | "info" | "warn" | "error";

export interface WorkerConfig {
  /** Base URL of the queue API; the worker refuses to start without it */
  apiBaseUrl: string | null;
  pollIntervalMs: number;
  reconnectDelayMs: number;
  requestTimeoutMs: number;
  /** "console", or the path of a line printer character device such as /dev/usb/lp0 */
  printerDevice: string;
  receipt: ReceiptConfig;
  logLevel: LogLevel;
}

export interface ReceiptConfig {
  widthChars: number;
  /** IANA zone the printed date and time are shown in */
  timeZone: string;
  header: string;
  recipient: string | null;
  footer: string | null;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  switch (raw) {
    case "debug":
    case "warn":
    case "error":
      return raw;
    default:
      return "info";
  }
}

const config: WorkerConfig = {
  apiBaseUrl: process.env.API_BASE_URL?.trim().replace(/\/+$/, "") || null,
  pollIntervalMs: parseInt(process.env.POLL_INTERVAL_MS ?? "5000", 10),
  reconnectDelayMs: parseInt(process.env.RECONNECT_DELAY_MS ?? "30000", 10),
  requestTimeoutMs: parseInt(process.env.REQUEST_TIMEOUT_MS ?? "10000", 10),
  printerDevice: process.env.PRINTER_DEVICE ?? "console",
  receipt: {
    widthChars: parseInt(process.env.PRINTER_WIDTH_CHARS ?? "48", 10),
    timeZone: process.env.RECEIPT_TIME_ZONE ?? "UTC",
    header: process.env.RECEIPT_HEADER ?? "PRINTLINE",
    recipient: process.env.RECEIPT_RECIPIENT?.trim() || null,
    footer: process.env.RECEIPT_FOOTER?.trim() || null,
  },
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/** Problems that would stop the worker from running; empty when the config is usable */
export function checkConfig(config: WorkerConfig): string[] {
  const problems: string[] = [];
  const numbers: Array<[string, number]> = [
    ["POLL_INTERVAL_MS", config.pollIntervalMs],
    ["RECONNECT_DELAY_MS", config.reconnectDelayMs],
    ["REQUEST_TIMEOUT_MS", config.requestTimeoutMs],
    ["PRINTER_WIDTH_CHARS", config.receipt.widthChars],
  ];
  for (const [name, value] of numbers) {
    if (!Number.isFinite(value) || value <= 0) {
      problems.push(`${name} must be a positive number, got ${value}`);
    }
  }
  if (!isValidTimeZone(config.receipt.timeZone)) {
    problems.push(`RECEIPT_TIME_ZONE "${config.receipt.timeZone}" is not a known time zone`);
  }
  return problems;
}

export default config;
