import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { validate as isUuid } from "uuid";
import { initDb, closeDb } from "../src/db/database.js";
import { buildApp } from "../src/app.js";

describe("queue API", () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    initDb(":memory:");
    app = await buildApp({ submitRateLimit: 0 });
  });

  afterEach(async () => {
    await app.close();
    closeDb();
    vi.restoreAllMocks();
  });

  const submit = (payload: unknown) => app.inject({ method: "POST", url: "/message", payload: JSON.stringify(payload), headers: { "content-type": "application/json" } });
  const recent = async () => (await app.inject({ method: "GET", url: "/messages/recent" })).json().messages;
  const nextToPrint = async () => (await app.inject({ method: "GET", url: "/printer/next-to-print" })).json().message;
  const markPrinted = (payload: unknown) =>
    app.inject({ method: "POST", url: "/printer/mark-printed", payload: JSON.stringify(payload), headers: { "content-type": "application/json" } });

  describe("POST /message", () => {
    it("creates a trimmed, unprinted message", async () => {
      const res = await submit({ name: "  Alice ", content: " Hello " });

      expect(res.statusCode).toBe(201);
      const body = res.json();
      expect(isUuid(body.id)).toBe(true);
      expect(body).toMatchObject({
        number: 1,
        name: "Alice",
        content: "Hello",
        printed: false,
        printed_at: null,
      });
      expect(Number.isNaN(Date.parse(body.created_at))).toBe(false);
    });

    it.each([
      [{ name: "", content: "hi" }, "Name cannot be empty or whitespace only"],
      [{ content: "hi" }, "Name is required"],
      [{ name: "a".repeat(51), content: "hi" }, "Name too long: 51 characters (max 50)"],
      [{ name: "Alice", content: "   " }, "Content cannot be empty or whitespace only"],
      [{ name: "Alice", content: "x".repeat(281) }, "Content too long: 281 characters (max 280)"],
    ])("rejects %j and persists nothing", async (payload, reason) => {
      const res = await submit(payload);

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: reason });
      expect(await recent()).toEqual([]);
    });

    it("rejects a body that is not JSON", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/message",
        payload: "{",
        headers: { "content-type": "application/json" },
      });
      expect(res.statusCode).toBe(400);
      expect(typeof res.json().error).toBe("string");
    });

    it("treats a body that is not an object as missing fields", async () => {
      const res = await submit(["Alice", "Hello"]);

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: "Name is required" });
    });

    it("gives every submit a unique id", async () => {
      const ids = new Set<string>();
      for (let i = 0; i < 5; i++) {
        ids.add((await submit({ name: "Alice", content: `Hello ${i}` })).json().id);
      }
      expect(ids.size).toBe(5);
    });

    it("rate limits a client once its window is full", async () => {
      const limited = await buildApp({ submitRateLimit: 2, submitRateWindowMs: 60_000 });
      try {
        const send = () =>
          limited.inject({ method: "POST", url: "/message", payload: { name: "A", content: "b" } });
        expect((await send()).statusCode).toBe(201);
        expect((await send()).statusCode).toBe(201);

        const third = await send();
        expect(third.statusCode).toBe(429);
        expect(third.json()).toEqual({ error: "Too many messages, slow down" });
      } finally {
        await limited.close();
      }
    });

    it("does not limit submits by default", async () => {
      const defaults = await buildApp();
      try {
        for (let i = 0; i < 7; i++) {
          const res = await defaults.inject({
            method: "POST",
            url: "/message",
            payload: { name: "Alice", content: `Hello ${i}` },
            headers: { "x-forwarded-for": `203.0.113.${i + 1}` },
          });
          expect(res.statusCode).toBe(201);
        }
      } finally {
        await defaults.close();
      }
    });

    it("keys the limit on the forwarded address behind a trusted proxy", async () => {
      const proxied = await buildApp({ submitRateLimit: 1, submitRateWindowMs: 60_000, trustProxy: true });
      try {
        const send = (client: string) =>
          proxied.inject({
            method: "POST",
            url: "/message",
            payload: { name: "A", content: "b" },
            headers: { "x-forwarded-for": client },
          });
        expect((await send("203.0.113.1")).statusCode).toBe(201);
        expect((await send("203.0.113.2")).statusCode).toBe(201);
        expect((await send("203.0.113.1")).statusCode).toBe(429);
      } finally {
        await proxied.close();
      }
    });
  });

  describe("GET /messages/recent", () => {
    it("is visible right after a submit", async () => {
      const created = (await submit({ name: "Alice", content: "Hello" })).json();
      expect(await recent()).toEqual([created]);
    });

    it("returns at most ten, newest first", async () => {
      for (let i = 0; i < 11; i++) {
        await submit({ name: "N", content: `m${i}` });
      }
      const messages = await recent();
      expect(messages).toHaveLength(10);
      expect(messages[0].content).toBe("m10");
      expect(messages[9].content).toBe("m1");
    });

    it("answers 500 when the store fails", async () => {
      closeDb();
      const res = await app.inject({ method: "GET", url: "/messages/recent" });
      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ error: "Internal server error" });
      initDb(":memory:");
    });
  });

  describe("printer routes", () => {
    it("submit, fetch, acknowledge, then the queue is empty", async () => {
      const created = (await submit({ name: "Alice", content: "Hello" })).json();
      expect(created.printed).toBe(false);

      expect(await nextToPrint()).toEqual(created);

      const ack = await markPrinted({ id: created.id });
      expect(ack.statusCode).toBe(200);
      expect(ack.json()).toEqual({ status: "ok", id: created.id });

      expect(await nextToPrint()).toBeNull();
    });

    it("returns null when nothing is pending", async () => {
      const res = await app.inject({ method: "GET", url: "/printer/next-to-print" });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ message: null });
    });

    it("serves the oldest pending message first", async () => {
      const first = (await submit({ name: "A", content: "first" })).json();
      const second = (await submit({ name: "B", content: "second" })).json();

      expect((await nextToPrint()).id).toBe(first.id);
      await markPrinted({ id: first.id });
      expect((await nextToPrint()).id).toBe(second.id);
    });

    it("keeps an unacknowledged message pending", async () => {
      const created = (await submit({ name: "Alice", content: "Hello" })).json();

      expect((await nextToPrint()).id).toBe(created.id);
      // a failed render never acknowledges, so the next poll sees it again
      expect((await nextToPrint()).id).toBe(created.id);
      expect((await recent())[0].printed).toBe(false);
    });

    it("acknowledges idempotently", async () => {
      const created = (await submit({ name: "Alice", content: "Hello" })).json();

      const first = await markPrinted({ id: created.id });
      const afterFirst = (await recent())[0];
      const second = await markPrinted({ id: created.id });
      const afterSecond = (await recent())[0];

      expect(first.statusCode).toBe(200);
      expect(second.statusCode).toBe(200);
      expect(second.json()).toEqual({ status: "ok", id: created.id });
      expect(afterSecond.printed).toBe(true);
      expect(afterSecond.printed_at).toBe(afterFirst.printed_at);
    });

    it.each([
      [{}, "Message ID is required"],
      [{ id: "" }, "Message ID cannot be empty"],
      [{ id: "abc" }, "Message ID is malformed"],
    ])("rejects %j", async (payload, reason) => {
      const res = await markPrinted(payload);
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: reason });
    });

    it("answers 404 for an unknown id", async () => {
      const id = "1b9d6bcd-bbfd-4b2d-9b5d-ab8dfbbd4bed";
      const res = await markPrinted({ id });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: `Message ${id} not found` });
    });
  });

  it("lists both of two concurrent submits in created_at order", async () => {
    const [a, b] = await Promise.all([
      submit({ name: "A", content: "one" }),
      submit({ name: "B", content: "two" }),
    ]);
    const ids = [a.json().id, b.json().id];
    expect(ids[0]).not.toBe(ids[1]);

    const messages = await recent();
    expect(messages.map((m: { id: string }) => m.id).sort()).toEqual([...ids].sort());
    expect(Date.parse(messages[0].created_at)).toBeGreaterThan(Date.parse(messages[1].created_at));
  });

  it("reports pending count on /health", async () => {
    await submit({ name: "A", content: "b" });
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.json()).toEqual({ status: "healthy", pending: 1 });
  });

  it("serves recent messages as an Atom feed", async () => {
    const created = (await submit({ name: "Alice", content: "Hello" })).json();
    const res = await app.inject({ method: "GET", url: "/feed" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toContain("application/atom+xml");
    expect(res.body).toContain("#1 from Alice");
    expect(res.body).toContain(`urn:uuid:${created.id}`);
  });
});
