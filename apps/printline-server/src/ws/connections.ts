import type { WebSocket } from "ws";
import type { FeedEvent } from "@printline/protocol";

export interface Connection {
  ws: WebSocket;
}

const connections = new Map<WebSocket, Connection>();

export function addConnection(ws: WebSocket): Connection {
  const conn: Connection = { ws };
  connections.set(ws, conn);
  return conn;
}

export function removeConnection(ws: WebSocket): Connection | undefined {
  const conn = connections.get(ws);
  connections.delete(ws);
  return conn;
}

export function getAllConnections(): Connection[] {
  return Array.from(connections.values());
}

/** Send an event to a single connection */
export function send(ws: WebSocket, event: FeedEvent): void {
  if (ws.readyState === ws.OPEN) {
    ws.send(JSON.stringify(event));
  }
}

/** Broadcast an event to every live-feed subscriber */
export function broadcastToAll(event: FeedEvent): void {
  for (const conn of connections.values()) {
    send(conn.ws, event);
  }
}
