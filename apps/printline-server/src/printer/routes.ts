import type { FastifyInstance } from "fastify";
import {
  toWireMessage,
  validateMessageId,
  type MarkPrintedRequest,
  type MarkPrintedResponse,
  type NextToPrintResponse,
} from "@printline/protocol";
import { errorBody, readField, sendError } from "../http/errors.js";
import { announcePrinted } from "../ws/handler.js";
import { getMessage, getOldestPending, markPrinted } from "../messages/store.js";

/** Routes polled by the delivery worker */
export function registerPrinterRoutes(app: FastifyInstance): void {
  // Never waits for a message to arrive; the worker owns the polling cadence
  app.get("/printer/next-to-print", async (_request, reply) => {
    try {
      const message = getOldestPending();
      if (message) {
        console.log(`[printer] Next to print: ${message.id}`);
      }
      const body: NextToPrintResponse = { message: message ? toWireMessage(message) : null };
      return reply.send(body);
    } catch (err) {
      return sendError(reply, err, "Fetch next message to print");
    }
  });

  app.post("/printer/mark-printed", async (request, reply) => {
    try {
      const id = validateMessageId(readField<MarkPrintedRequest>(request.body, "id"));
      const result = markPrinted(id);

      switch (result) {
        case "not-found":
          console.warn(`[printer] Mark printed for unknown message ${id}`);
          return reply.code(404).send(errorBody(`Message ${id} not found`));
        case "already-printed":
          console.log(`[printer] Message ${id} was already marked printed`);
          break;
        case "printed": {
          console.log(`[printer] Marked message ${id} as printed`);
          const message = getMessage(id);
          if (message) announcePrinted(message);
          break;
        }
      }

      const body: MarkPrintedResponse = { status: "ok", id };
      return reply.send(body);
    } catch (err) {
      return sendError(reply, err, "Mark message printed");
    }
  });
}
