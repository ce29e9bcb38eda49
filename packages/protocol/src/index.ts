export type {
  Message,
  WireMessage,
  SubmitMessageRequest,
  RecentMessagesResponse,
  NextToPrintResponse,
  MarkPrintedRequest,
  MarkPrintedResponse,
  ErrorResponse,
  HealthResponse,
} from "./messages.js";

export type {
  Envelope,
  MessageCreatedEvent,
  MessagePrintedEvent,
  FeedErrorEvent,
  FeedEvent,
} from "./events.js";

export {
  PrintlineError,
  ValidationError,
  TransportError,
  DeviceError,
  StoreError,
  errorMessage,
  type DeviceErrorKind,
} from "./errors.js";

export {
  MAX_NAME_LENGTH,
  MAX_CONTENT_LENGTH,
  textLength,
  validateName,
  validateContent,
  validateMessageId,
} from "./validation.js";

export { isRecord, toWireMessage, parseWireMessage } from "./wire.js";
