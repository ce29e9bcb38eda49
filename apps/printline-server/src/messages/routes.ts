import type { FastifyInstance } from "fastify";
import {
  toWireMessage,
  validateContent,
  validateName,
  type RecentMessagesResponse,
  type SubmitMessageRequest,
  type WireMessage,
} from "@printline/protocol";
import { errorBody, readField, sendError } from "../http/errors.js";
import { announceCreated } from "../ws/handler.js";
import { KeyedRateLimiter } from "./rate-limit.js";
import { getRecentMessages, saveMessage, RECENT_LIMIT } from "./store.js";

export interface MessageRouteOptions {
  submitRateLimit: number;
  submitRateWindowMs: number;
}

const SWEEP_INTERVAL_MS = 60_000;

export function registerMessageRoutes(app: FastifyInstance, options: MessageRouteOptions): void {
  const limiter = new KeyedRateLimiter(options.submitRateLimit, options.submitRateWindowMs);
  const sweepTimer = setInterval(() => limiter.sweep(), SWEEP_INTERVAL_MS);
  sweepTimer.unref();
  app.addHook("onClose", async () => {
    clearInterval(sweepTimer);
  });

  app.post("/message", async (request, reply) => {
    const rawName = readField<SubmitMessageRequest>(request.body, "name");
    console.log(`[messages] Creating message from: ${typeof rawName === "string" ? rawName : "unknown"}`);

    try {
      const name = validateName(rawName);
      const content = validateContent(readField<SubmitMessageRequest>(request.body, "content"));

      if (!limiter.check(request.ip)) {
        console.warn(`[messages] Rate limited submit from ${request.ip}`);
        return reply.code(429).send(errorBody("Too many messages, slow down"));
      }

      const message = saveMessage({ name, content });
      console.log(`[messages] Created message ${message.id} (#${message.number})`);
      announceCreated(message);

      const created: WireMessage = toWireMessage(message);
      return reply.code(201).send(created);
    } catch (err) {
      return sendError(reply, err, "Create message");
    }
  });

  app.get("/messages/recent", async (_request, reply) => {
    try {
      const body: RecentMessagesResponse = {
        messages: getRecentMessages(RECENT_LIMIT).map(toWireMessage),
      };
      return reply.send(body);
    } catch (err) {
      return sendError(reply, err, "Fetch recent messages");
    }
  });
}
