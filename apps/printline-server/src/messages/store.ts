import { v4 as uuid } from "uuid";
import {
  StoreError,
  validateContent,
  validateName,
  type Message,
} from "@printline/protocol";
import { getDb } from "../db/database.js";

export const RECENT_LIMIT = 10;
const MAX_LIMIT = 100;

export interface NewMessage {
  name: string;
  content: string;
}

export type MarkPrintedResult = "printed" | "already-printed" | "not-found";

interface MessageRow {
  seq: number;
  id: string;
  name: string;
  content: string;
  created_at: number;
  printed: number;
  printed_at: number | null;
}

/**
 * Persist a new message, re-checking the field bounds first (throws
 * ValidationError). The store assigns id, sequence number and
 * created_at; created_at is strictly increasing even for inserts landing in
 * the same millisecond.
 */
export function saveMessage(input: NewMessage, now = Date.now()): Message {
  const name = validateName(input.name);
  const content = validateContent(input.content);

  try {
    const db = getDb();
    const insert = db.transaction((): Message => {
      const last = db
        .prepare("SELECT MAX(created_at) AS last FROM messages")
        .get() as { last: number | null };
      const createdAt = last.last === null ? now : Math.max(now, last.last + 1);
      const id = uuid();

      const result = db
        .prepare(
          `INSERT INTO messages (id, name, content, created_at, printed, printed_at)
           VALUES (?, ?, ?, ?, 0, NULL)`
        )
        .run(id, name, content, createdAt);

      return {
        id,
        number: Number(result.lastInsertRowid),
        name,
        content,
        createdAt,
        printed: false,
        printedAt: null,
      };
    });
    return insert();
  } catch (err) {
    throw new StoreError("Failed to save message", { cause: err });
  }
}

/** Newest first, regardless of print status */
export function getRecentMessages(limit = RECENT_LIMIT): Message[] {
  const bounded = Math.min(Math.max(Math.trunc(limit), 1), MAX_LIMIT);
  const rows = query(() =>
    getDb()
      .prepare("SELECT * FROM messages ORDER BY created_at DESC LIMIT ?")
      .all(bounded) as MessageRow[]
  );
  return rows.map(rowToMessage);
}

/** The pending message with the smallest created_at, via idx_messages_pending */
export function getOldestPending(): Message | undefined {
  const row = query(() =>
    getDb()
      .prepare("SELECT * FROM messages WHERE printed = 0 ORDER BY created_at ASC LIMIT 1")
      .get() as MessageRow | undefined
  );
  return row ? rowToMessage(row) : undefined;
}

export function getMessage(id: string): Message | undefined {
  const row = query(() =>
    getDb().prepare("SELECT * FROM messages WHERE id = ?").get(id) as MessageRow | undefined
  );
  return row ? rowToMessage(row) : undefined;
}

export function countPending(): number {
  const row = query(() =>
    getDb()
      .prepare("SELECT COUNT(*) AS pending FROM messages WHERE printed = 0")
      .get() as { pending: number }
  );
  return row.pending;
}

/**
 * Flag a message as printed. Only the first call changes the row; repeats
 * report "already-printed" and leave printed_at alone.
 */
export function markPrinted(id: string, now = Date.now()): MarkPrintedResult {
  const result = query(() =>
    getDb()
      .prepare("UPDATE messages SET printed = 1, printed_at = ? WHERE id = ? AND printed = 0")
      .run(now, id)
  );
  if (result.changes > 0) return "printed";

  return getMessage(id) ? "already-printed" : "not-found";
}

function query<T>(run: () => T): T {
  try {
    return run();
  } catch (err) {
    throw new StoreError("Message store query failed", { cause: err });
  }
}

function rowToMessage(row: MessageRow): Message {
  return {
    id: row.id,
    number: row.seq,
    name: row.name,
    content: row.content,
    createdAt: row.created_at,
    printed: row.printed === 1,
    printedAt: row.printed_at,
  };
}
