/** A queued message as held in memory on either side of the wire */
export interface Message {
  id: string;
  /** Store-assigned sequence number, shown on the printed receipt */
  number: number;
  name: string;
  content: string;
  createdAt: number;
  printed: boolean;
  printedAt: number | null;
}

/** JSON representation of a message over HTTP and the live feed */
export interface WireMessage {
  id: string;
  number: number;
  name: string;
  content: string;
  created_at: string;
  printed: boolean;
  printed_at: string | null;
}

export interface SubmitMessageRequest {
  name: string;
  content: string;
}

export interface RecentMessagesResponse {
  messages: WireMessage[];
}

export interface NextToPrintResponse {
  message: WireMessage | null;
}

export interface MarkPrintedRequest {
  id: string;
}

export interface MarkPrintedResponse {
  status: "ok";
  id: string;
}

export interface ErrorResponse {
  error: string;
}

export interface HealthResponse {
  status: "healthy";
  pending: number;
}
