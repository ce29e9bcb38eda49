import type { WireMessage } from "./messages.js";

/** Every live-feed frame follows this envelope shape */
export interface Envelope<T = unknown> {
  type: string;
  id: string;
  timestamp: number;
  payload: T;
}

/** Server → Client events */

export interface MessageCreatedEvent {
  message: WireMessage;
}

export interface MessagePrintedEvent {
  id: string;
  printedAt: string;
}

export interface FeedErrorEvent {
  code: string;
  message: string;
}

export type FeedEvent =
  | (Envelope<MessageCreatedEvent> & { type: "message:created" })
  | (Envelope<MessagePrintedEvent> & { type: "message:printed" })
  | (Envelope<FeedErrorEvent> & { type: "feed:error" });
