import type { Diagnostic } from "../outcome";

/**
 * Diagnostics port: the client collects compiler diagnostics, a presentation layer renders them.
 */
export interface DiagnosticsPort {
  /** Clear what was collected for `file` before it is loaded again. */
  reset(file: string): void;

  add(diagnostic: Diagnostic): void;

  /** Diagnostics for `file` are complete and may be rendered. */
  signalAvailable(file: string): void;
}
