import type { FastifyInstance } from "fastify";
import { Feed } from "feed";
import type { Message } from "@printline/protocol";
import { getRecentMessages, RECENT_LIMIT } from "../messages/store.js";
import { sendError } from "../http/errors.js";

export interface FeedOptions {
  title: string;
  publicUrl: string;
}

export function buildAtomFeed(messages: Message[], options: FeedOptions): string {
  const feed = new Feed({
    title: options.title,
    description: "Recently submitted messages",
    id: options.publicUrl,
    link: options.publicUrl,
    updated: new Date(messages[0]?.createdAt ?? 0),
    copyright: "",
  });

  for (const message of messages) {
    feed.addItem({
      title: `#${message.number} from ${message.name}`,
      id: `urn:uuid:${message.id}`,
      link: `${options.publicUrl}/#${message.id}`,
      description: message.content,
      date: new Date(message.createdAt),
    });
  }

  return feed.atom1();
}

export function registerFeedRoutes(app: FastifyInstance, options: FeedOptions): void {
  app.get("/feed", async (_request, reply) => {
    try {
      const xml = buildAtomFeed(getRecentMessages(RECENT_LIMIT), options);
      return reply.header("Content-Type", "application/atom+xml").send(xml);
    } catch (err) {
      return sendError(reply, err, "Build feed");
    }
  });
}
