import type { Message, WireMessage } from "./messages.js";

export function toWireMessage(message: Message): WireMessage {
  return {
    id: message.id,
    number: message.number,
    name: message.name,
    content: message.content,
    created_at: new Date(message.createdAt).toISOString(),
    printed: message.printed,
    printed_at: message.printedAt === null ? null : new Date(message.printedAt).toISOString(),
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseTimestamp(value: unknown): number | undefined {
  if (typeof value !== "string") return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : ms;
}

/**
 * Narrow an untrusted JSON value into a Message.
 * Returns undefined when any field is missing or of the wrong shape.
 */
export function parseWireMessage(value: unknown): Message | undefined {
  if (!isRecord(value)) return undefined;

  const { id, number, name, content, printed } = value;
  if (typeof id !== "string" || typeof name !== "string" || typeof content !== "string") {
    return undefined;
  }
  if (typeof number !== "number" || !Number.isInteger(number)) return undefined;
  if (typeof printed !== "boolean") return undefined;

  const createdAt = parseTimestamp(value.created_at);
  if (createdAt === undefined) return undefined;

  let printedAt: number | null = null;
  if (value.printed_at !== null && value.printed_at !== undefined) {
    const parsed = parseTimestamp(value.printed_at);
    if (parsed === undefined) return undefined;
    printedAt = parsed;
  }
  if (printed !== (printedAt !== null)) return undefined;

  return { id, number, name, content, createdAt, printed, printedAt };
}
