import fs, { type FileHandle } from "node:fs/promises";
import { DeviceError, errorMessage } from "@printline/protocol";
import type { DeviceConnection, OutputDevice } from "./device.js";
import { encodeReceipt } from "./escpos.js";

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * ESC/POS receipt printer exposed by the kernel as a character device
 * (usblp's /dev/usb/lp0 or a serial port).
 */
export class LinePrinterDevice implements OutputDevice {
  constructor(private devicePath: string) {}

  get description(): string {
    return `line printer at ${this.devicePath}`;
  }

  async connect(): Promise<DeviceConnection> {
    let handle: FileHandle;
    try {
      handle = await fs.open(this.devicePath, "w");
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOENT" || code === "ENODEV" || code === "ENXIO") {
        throw new DeviceError("not-found", `Printer not found at ${this.devicePath}`, { cause: err });
      }
      if (code === "EACCES" || code === "EPERM") {
        throw new DeviceError("io", `Permission denied opening ${this.devicePath}`, { cause: err });
      }
      throw new DeviceError("io", `Failed to open ${this.devicePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const devicePath = this.devicePath;
    return {
      async render(text) {
        try {
          await handle.write(encodeReceipt(text));
        } catch (err) {
          throw new DeviceError("io", `Write to ${devicePath} failed: ${errorMessage(err)}`, {
            cause: err,
          });
        }
      },
      async close() {
        await handle.close();
      },
    };
  }
}
