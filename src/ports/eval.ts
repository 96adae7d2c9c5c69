import type { Command } from "../core/protocol/command";
import type { ReturnValue } from "../core/protocol/reply";
import type { Outcome, Failure } from "../outcome";

/**
 * Handle for an asynchronous call in flight.
 */
export interface PendingCallHandle {
  readonly id: number;
  readonly command: Command;
}

export type SuccessContinuation = (value: ReturnValue) => void;
export type FailureContinuation = (failure: Failure) => void;

/**
 * Eval port: what the session and the interactive protocols consume.
 */
export interface EvalPort {
  /**
   * Resolves with the reply correlated to this command, or with a failure once
   * the process is gone. Refused from inside an async continuation, including
   * after the continuation has awaited something.
   */
  callSync(command: Command): Promise<Outcome<ReturnValue>>;

  /**
   * Register continuations and return at once.
   * Exactly one continuation runs, exactly once, and never before this returns.
   */
  callAsync(command: Command, onSuccess: SuccessContinuation, onFailure: FailureContinuation): PendingCallHandle;
}
