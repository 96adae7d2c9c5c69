/**
 * Handle returned by subscriptions; calling dispose detaches the listener.
 */
export interface Disposable {
  dispose(): void;
}

/**
 * Trace event types for protocol logging.
 */
export type TraceEvent =
  | { tag: "E_Send"; id: number; command: string }
  | { tag: "E_Reply"; id: number; command: string; ok: boolean; durationMs: number }
  | { tag: "E_Notification"; kind: string }
  | { tag: "E_Load"; file: string; ok: boolean }
  | { tag: "E_DirectoryChange"; path: string }
  | { tag: "E_Discard"; count: number }
  | { tag: "E_Wire"; direction: "in" | "out"; payload: string };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

export const silentTrace: TraceSink = {
  emit() {},
};
