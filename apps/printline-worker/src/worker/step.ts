import { DeviceError, errorMessage, type Message } from "@printline/protocol";
import type { QueueClient } from "../queue/client.js";
import type { DeviceConnection, OutputDevice } from "../device/device.js";
import type { Sleeper } from "../sleeper.js";
import type { Logger } from "../logger.js";
import type { WorkerState } from "./state.js";

export interface WorkerContext {
  queue: QueueClient;
  device: OutputDevice;
  sleeper: Sleeper;
  logger: Logger;
  /** Turns a message into the text handed to the device */
  render: (message: Message) => string;
  pollIntervalMs: number;
  reconnectDelayMs: number;
  signal?: AbortSignal;
}

function shortId(id: string): string {
  return id.slice(0, 8);
}

function describeDeviceError(err: unknown): string {
  if (err instanceof DeviceError) {
    return err.kind === "not-found" ? `device not found (${err.message})` : `device I/O error (${err.message})`;
  }
  return errorMessage(err);
}

/** Close a connection, logging instead of throwing. Returns whether it closed cleanly. */
export async function releaseConnection(connection: DeviceConnection, logger: Logger): Promise<boolean> {
  try {
    await connection.close();
    return true;
  } catch (err) {
    logger.warn(`Error closing printer: ${errorMessage(err)}`);
    return false;
  }
}

/**
 * Run one state's entry action and return the next state.
 * Every failure folds into a transition; step never rejects for an
 * operation failure.
 */
export async function step(state: WorkerState, ctx: WorkerContext): Promise<WorkerState> {
  const { logger } = ctx;

  switch (state.kind) {
    case "disconnected": {
      try {
        const connection = await ctx.device.connect();
        logger.info(`Printer connected (${ctx.device.description})`);
        return { kind: "idle", connection };
      } catch (err) {
        logger.warn(
          `Printer unavailable: ${describeDeviceError(err)}; retrying in ${ctx.reconnectDelayMs}ms (attempt ${state.attempt + 1})`
        );
        await ctx.sleeper.sleep(ctx.reconnectDelayMs, ctx.signal);
        return { kind: "disconnected", attempt: state.attempt + 1 };
      }
    }

    case "idle": {
      await ctx.sleeper.sleep(ctx.pollIntervalMs, ctx.signal);
      return { kind: "fetching", connection: state.connection };
    }

    case "fetching": {
      try {
        const message = await ctx.queue.fetchNextPending();
        if (!message) {
          logger.debug("No messages available to print");
          return { kind: "idle", connection: state.connection };
        }
        logger.info(`Processing message #${message.number} ${shortId(message.id)} from ${message.name}`);
        return { kind: "rendering", connection: state.connection, message };
      } catch (err) {
        logger.warn(`Failed to fetch next message: ${errorMessage(err)}`);
        return { kind: "idle", connection: state.connection };
      }
    }

    case "rendering": {
      const { message } = state;
      try {
        await state.connection.render(ctx.render(message));
        logger.info(`Message ${shortId(message.id)} printed`);
        return { kind: "acknowledging", connection: state.connection, message };
      } catch (err) {
        // The message was never acknowledged, so it stays pending and comes back on a later fetch
        logger.error(`Failed to print message ${message.id}: ${describeDeviceError(err)}`);
        await releaseConnection(state.connection, logger);
        return { kind: "disconnected", attempt: 0 };
      }
    }

    case "acknowledging": {
      const { message } = state;
      try {
        await ctx.queue.acknowledgePrinted(message.id);
        logger.info(`Message ${shortId(message.id)} marked as printed`);
      } catch (err) {
        // No retry here: the message stays pending and may be printed again
        logger.warn(
          `Message ${message.id} printed but not acknowledged (${errorMessage(err)}); it may be reprinted`
        );
      }
      return { kind: "idle", connection: state.connection };
    }
  }
}
