import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { handleConnection } from "./ws/handler.js";
import { registerErrorHandlers, sendError } from "./http/errors.js";
import { registerMessageRoutes } from "./messages/routes.js";
import { registerPrinterRoutes } from "./printer/routes.js";
import { registerFeedRoutes } from "./feed/atom.js";
import { countPending } from "./messages/store.js";
import type { HealthResponse } from "@printline/protocol";
import config from "./config.js";

export interface AppOptions {
  submitRateLimit?: number;
  submitRateWindowMs?: number;
  trustProxy?: boolean | number | string;
}

/** Build the queue API. The database must already be initialized. */
export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    trustProxy: options.trustProxy ?? config.trustProxy,
  });
  await app.register(cors, { origin: true });
  await app.register(websocket);

  registerErrorHandlers(app);

  // Live feed of created/printed events
  app.get("/ws", { websocket: true }, (socket) => {
    handleConnection(socket);
  });

  registerMessageRoutes(app, {
    submitRateLimit: options.submitRateLimit ?? config.submitRateLimit,
    submitRateWindowMs: options.submitRateWindowMs ?? config.submitRateWindowMs,
  });
  registerPrinterRoutes(app);
  registerFeedRoutes(app, { title: config.feedTitle, publicUrl: config.publicUrl });

  // Health check
  app.get("/health", async (_request, reply) => {
    try {
      const body: HealthResponse = { status: "healthy", pending: countPending() };
      return reply.send(body);
    } catch (err) {
      return sendError(reply, err, "Health check");
    }
  });

  return app;
}
