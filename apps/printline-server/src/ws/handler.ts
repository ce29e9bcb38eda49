import type { WebSocket } from "ws";
import { v4 as uuid } from "uuid";
import { toWireMessage, type Message } from "@printline/protocol";
import { addConnection, removeConnection, send, broadcastToAll } from "./connections.js";

/**
 * The live feed is read-only: clients subscribe by connecting and receive
 * message:created and message:printed events.
 */
export function handleConnection(ws: WebSocket): void {
  addConnection(ws);

  ws.on("message", () => {
    send(ws, {
      type: "feed:error",
      id: uuid(),
      timestamp: Date.now(),
      payload: { code: "READ_ONLY", message: "The live feed does not accept commands" },
    });
  });

  ws.on("close", () => {
    removeConnection(ws);
  });

  ws.on("error", (err) => {
    console.warn("[ws] Connection error:", err.message);
    removeConnection(ws);
  });
}

export function announceCreated(message: Message): void {
  broadcastToAll({
    type: "message:created",
    id: uuid(),
    timestamp: Date.now(),
    payload: { message: toWireMessage(message) },
  });
}

export function announcePrinted(message: Message): void {
  if (message.printedAt === null) return;
  broadcastToAll({
    type: "message:printed",
    id: uuid(),
    timestamp: Date.now(),
    payload: { id: message.id, printedAt: new Date(message.printedAt).toISOString() },
  });
}
