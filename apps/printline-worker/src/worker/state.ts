import type { Message } from "@printline/protocol";
import type { DeviceConnection } from "../device/device.js";

/**
 * Delivery worker states. The device connection lives in the state value
 * itself, so only the connected states can reach the device.
 *
 *   disconnected → idle → fetching → rendering → acknowledging → idle
 *                                        ↓
 *                                  disconnected
 */
export type WorkerState =
  | { kind: "disconnected"; attempt: number }
  | { kind: "idle"; connection: DeviceConnection }
  | { kind: "fetching"; connection: DeviceConnection }
  | { kind: "rendering"; connection: DeviceConnection; message: Message }
  | { kind: "acknowledging"; connection: DeviceConnection; message: Message };

export const initialState: WorkerState = { kind: "disconnected", attempt: 0 };

export function connectionOf(state: WorkerState): DeviceConnection | undefined {
  return state.kind === "disconnected" ? undefined : state.connection;
}
