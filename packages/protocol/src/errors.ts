/** Base class for every error the queue and the worker raise on purpose */
export class PrintlineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad input from a client. Returned to the caller as-is, never retried. */
export class ValidationError extends PrintlineError {}

/** The queue API could not be reached or answered with something unusable */
export class TransportError extends PrintlineError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type DeviceErrorKind = "not-found" | "io";

/** The output device is absent (`not-found`) or present but failing (`io`) */
export class DeviceError extends PrintlineError {
  constructor(
    public readonly kind: DeviceErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Persistence failed; nothing was written */
export class StoreError extends PrintlineError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
