import type { Disposable } from "./types";

/**
 * Process lifecycle port.
 * Owns the compiler process; the session only asks for it to exist.
 */
export interface ProcessPort {
  /** Start the process if it is not already running. Rejects when it cannot be started. */
  ensureRunning(): Promise<void>;

  isRunning(): boolean;

  /** Stop the process. Pending replies are never delivered afterwards. */
  terminate(): void;
}

/**
 * Message transport port.
 * Carries unframed s-expression payloads in both directions.
 */
export interface TransportPort {
  /** Whether `send` can currently deliver to the process. */
  isOpen(): boolean;

  /** Write one payload. Payloads are delivered in call order. */
  send(payload: string): void;

  onMessage(listener: (payload: string) => void): Disposable;

  /** Fires when the process goes away without `terminate` having been called. */
  onClose(listener: (reason: string) => void): Disposable;
}

export type CompilerConnection = ProcessPort & TransportPort;
