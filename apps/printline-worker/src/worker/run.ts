import { errorMessage } from "@printline/protocol";
import { initialState, connectionOf, type WorkerState } from "./state.js";
import { releaseConnection, step, type WorkerContext } from "./step.js";

export interface RunOptions {
  /** Called after every transition; used by tests and debug logging */
  onTransition?: (from: WorkerState, to: WorkerState) => void;
}

/**
 * Drive the state machine until the context's signal aborts, then release
 * the device. Resolves with the last state.
 */
export async function runWorker(
  ctx: WorkerContext,
  start: WorkerState = initialState,
  options: RunOptions = {}
): Promise<WorkerState> {
  let state = start;

  while (!ctx.signal?.aborted) {
    let next: WorkerState;
    try {
      next = await step(state, ctx);
    } catch (err) {
      next = await recover(state, err, ctx);
    }
    options.onTransition?.(state, next);
    if (next.kind !== state.kind) {
      ctx.logger.debug(`${state.kind} → ${next.kind}`);
    }
    state = next;
  }

  ctx.logger.info("Shutting down gracefully...");
  const connection = connectionOf(state);
  if (connection && (await releaseConnection(connection, ctx.logger))) {
    ctx.logger.info("Printer connection closed");
  }
  return state;
}

/** Anything step did not expect: log it and carry on from a live state */
async function recover(state: WorkerState, err: unknown, ctx: WorkerContext): Promise<WorkerState> {
  ctx.logger.error(`Unexpected error in ${state.kind} state: ${errorMessage(err)}`, err);
  await ctx.sleeper.sleep(ctx.pollIntervalMs, ctx.signal);

  const connection = connectionOf(state);
  return connection ? { kind: "idle", connection } : { kind: "disconnected", attempt: 0 };
}
