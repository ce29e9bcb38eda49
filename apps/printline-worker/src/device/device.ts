/** An open handle on the output device */
export interface DeviceConnection {
  /** Throws DeviceError("io") when the device fails mid-render */
  render(text: string): Promise<void>;
  close(): Promise<void>;
}

/** The physical renderer, seen only through this narrow contract */
export interface OutputDevice {
  readonly description: string;
  /** Throws DeviceError("not-found") when absent, DeviceError("io") when unusable */
  connect(): Promise<DeviceConnection>;
}
