import type { Logger } from "../logger.js";
import type { DeviceConnection, OutputDevice } from "./device.js";

/** Writes receipts to the log instead of paper; for running without hardware */
export class ConsoleDevice implements OutputDevice {
  readonly description = "console";

  constructor(private logger: Logger) {}

  async connect(): Promise<DeviceConnection> {
    const logger = this.logger;
    return {
      async render(text) {
        logger.info(`Receipt:\n${text}`);
      },
      async close() {},
    };
  }
}
