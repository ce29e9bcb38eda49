import {
  TransportError,
  errorMessage,
  isRecord,
  parseWireMessage,
  type MarkPrintedRequest,
  type MarkPrintedResponse,
  type Message,
  type NextToPrintResponse,
} from "@printline/protocol";

/** The two queue operations the delivery worker needs */
export interface QueueClient {
  /** Oldest pending message, or null when the queue is drained */
  fetchNextPending(): Promise<Message | null>;
  /** Safe to repeat: the queue treats a second acknowledgement as success */
  acknowledgePrinted(id: string): Promise<void>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpQueueClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

// The message itself is checked by parseWireMessage
type UncheckedNextToPrint = { [K in keyof NextToPrintResponse]: unknown };

function isNextToPrintResponse(body: unknown): body is UncheckedNextToPrint {
  return isRecord(body) && "message" in body;
}

function isMarkPrintedResponse(body: unknown): body is MarkPrintedResponse {
  return isRecord(body) && body.status === "ok" && typeof body.id === "string";
}

/** Talks to the queue API over HTTP; every failure surfaces as a TransportError */
export class HttpQueueClient implements QueueClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpQueueClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async fetchNextPending(): Promise<Message | null> {
    const body = await this.request("GET", "/printer/next-to-print");
    if (!isNextToPrintResponse(body)) {
      throw new TransportError("Malformed response from /printer/next-to-print");
    }
    if (body.message === null) return null;

    const message = parseWireMessage(body.message);
    if (!message) {
      throw new TransportError("Malformed message in /printer/next-to-print response");
    }
    return message;
  }

  async acknowledgePrinted(id: string): Promise<void> {
    const payload: MarkPrintedRequest = { id };
    const body = await this.request("POST", "/printer/mark-printed", payload);
    if (!isMarkPrintedResponse(body) || body.id !== id) {
      throw new TransportError("Malformed response from /printer/mark-printed");
    }
  }

  private async request(method: "GET" | "POST", path: string, payload?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (payload !== undefined) headers["Content-Type"] = "application/json";

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TransportError(`Request to ${path} failed: ${errorMessage(err)}`, undefined, {
        cause: err,
      });
    }

    if (!response.ok) {
      const reason = await readErrorReason(response);
      throw new TransportError(
        `${path} returned ${response.status}${reason ? `: ${reason}` : ""}`,
        response.status
      );
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (err) {
      throw new TransportError(`${path} returned invalid JSON`, response.status, { cause: err });
    }
  }
}

async function readErrorReason(response: Response): Promise<string | undefined> {
  try {
    const body: unknown = await response.json();
    return isRecord(body) && typeof body.error === "string" ? body.error : undefined;
  } catch {
    return undefined;
  }
}
