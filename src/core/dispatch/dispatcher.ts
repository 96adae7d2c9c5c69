// src/core/dispatch/dispatcher.ts
// Request dispatcher: correlates replies to calls by id, routes notifications to observers

import { AsyncLocalStorage } from "async_hooks";
import { parseSexp, sexpToString, str, type Sexp } from "../sexp";
import { type Command, describeCommand, encodeCommand } from "../protocol/command";
import { decodeMessage, type Notification, type ReturnValue } from "../protocol/reply";
import type {
  Disposable,
  EvalPort,
  FailureContinuation,
  PendingCallHandle,
  SuccessContinuation,
  TraceSink,
  TransportPort,
} from "../../ports";
import { silentTrace } from "../../ports";
import type { Outcome, OutcomeMeta } from "../../outcome";
import {
  callFailed,
  done,
  isDone,
  processUnavailable,
  protocolError,
  syncFromContinuation,
  timeout,
} from "../../outcome";

export type NotificationListener = (notification: Notification) => void;

export interface DispatcherOptions {
  /** Fail a call with `timeout` when no reply arrives in time; 0 disables. */
  requestTimeoutMs?: number;
  trace?: TraceSink;
}

interface PendingCall {
  readonly id: number;
  /** Sync callers are awaiting a promise; async callers registered continuations. */
  readonly kind: "sync" | "async";
  readonly command: Command;
  readonly startedAt: number;
  readonly settle: (outcome: Outcome<ReturnValue>) => void;
  timer?: ReturnType<typeof setTimeout>;
}

/**
 * Pipelined dispatcher.
 *
 * Every outgoing message carries its correlation id and replies are matched by
 * that id, so the transport may answer out of order. Messages are written in
 * issuance order.
 */
export class Dispatcher implements EvalPort {
  private nextId = 1;
  private generation = 0;
  /** Set while a continuation runs, and across every await it makes. */
  private readonly continuationScope = new AsyncLocalStorage<number>();
  private readonly pending = new Map<number, PendingCall>();
  private readonly listeners = new Set<NotificationListener>();
  private readonly subscriptions: Disposable[];
  private readonly requestTimeoutMs: number;
  private readonly trace: TraceSink;

  constructor(private readonly transport: TransportPort, options: DispatcherOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? 0;
    this.trace = options.trace ?? silentTrace;
    this.subscriptions = [
      transport.onMessage((payload) => this.receive(payload)),
      transport.onClose((reason) => this.failAll(reason)),
    ];
  }

  /** Number of calls still waiting for a reply. */
  get pendingCount(): number {
    return this.pending.size;
  }

  callSync(command: Command): Promise<Outcome<ReturnValue>> {
    // A continuation runs on behalf of another call; blocking here could starve a one-at-a-time transport.
    if (this.continuationScope.getStore() !== undefined) {
      return Promise.resolve(syncFromContinuation(command.tag));
    }
    if (!this.transport.isOpen()) {
      return Promise.resolve(processUnavailable());
    }
    return new Promise((resolve) => {
      this.register(command, "sync", resolve);
    });
  }

  callAsync(command: Command, onSuccess: SuccessContinuation, onFailure: FailureContinuation): PendingCallHandle {
    const generation = this.generation;
    const deliver = (outcome: Outcome<ReturnValue>) => {
      setImmediate(() => {
        if (generation !== this.generation) return;
        this.runContinuation(generation, () => {
          if (isDone(outcome)) onSuccess(outcome.value);
          else onFailure(outcome.failure);
        });
      });
    };

    if (!this.transport.isOpen()) {
      const id = this.nextId++;
      deliver(processUnavailable());
      return { id, command };
    }
    return this.register(command, "async", deliver);
  }

  observe(listener: NotificationListener): Disposable {
    this.listeners.add(listener);
    return { dispose: () => { this.listeners.delete(listener); } };
  }

  /**
   * Drop every pending call. Continuations never run; sync callers get
   * `process-unavailable`. Replies that arrive later for those ids are ignored.
   */
  discardAll(): number {
    const calls = [...this.pending.values()];
    const count = calls.length;
    this.pending.clear();
    this.generation++;
    for (const call of calls) {
      if (call.timer) clearTimeout(call.timer);
      if (call.kind === "sync") call.settle(processUnavailable("process terminated", { callId: call.id }));
    }
    this.trace.emit({ tag: "E_Discard", count });
    return count;
  }

  dispose(): void {
    for (const sub of this.subscriptions) sub.dispose();
    this.discardAll();
    this.listeners.clear();
  }

  private register(
    command: Command,
    kind: PendingCall["kind"],
    settle: (outcome: Outcome<ReturnValue>) => void,
  ): PendingCallHandle {
    const id = this.nextId++;
    const call: PendingCall = { id, kind, command, startedAt: Date.now(), settle };

    if (this.requestTimeoutMs > 0) {
      const ms = this.requestTimeoutMs;
      call.timer = setTimeout(() => {
        if (this.pending.delete(id)) {
          this.trace.emit({ tag: "E_Reply", id, command: command.tag, ok: false, durationMs: Date.now() - call.startedAt });
          settle(timeout(command.tag, ms, { callId: id, durationMs: ms }));
        }
      }, ms);
    }

    this.pending.set(id, call);
    this.trace.emit({ tag: "E_Send", id, command: describeCommand(command) });

    try {
      this.transport.send(sexpToString(encodeCommand(command, id)));
    } catch (error) {
      this.pending.delete(id);
      if (call.timer) clearTimeout(call.timer);
      settle(processUnavailable(error instanceof Error ? error.message : String(error), { callId: id }));
    }
    return { id, command };
  }

  private receive(payload: string): void {
    let raw: Sexp;
    try {
      raw = parseSexp(payload);
    } catch {
      this.notify({ tag: "Unknown", kind: "malformed", raw: str(payload) });
      return;
    }

    const decoded = decodeMessage(raw);
    if (!isDone(decoded)) {
      // A return we cannot read still terminates its call.
      const id = trailingId(raw);
      const call = id === undefined ? undefined : this.take(id);
      if (call) this.finish(call, protocolError(decoded.failure.message));
      else this.notify({ tag: "Unknown", kind: "malformed", raw });
      return;
    }

    const message = decoded.value;
    switch (message.tag) {
      case "ReturnOk": {
        const call = this.take(message.id);
        if (call) this.finish(call, done(message.reply));
        return;
      }
      case "ReturnError": {
        const call = this.take(message.id);
        if (call) this.finish(call, callFailed(call.command.tag, message.message));
        return;
      }
      default:
        this.notify(message);
    }
  }

  private take(id: number): PendingCall | undefined {
    const call = this.pending.get(id);
    if (!call) return undefined;
    this.pending.delete(id);
    if (call.timer) clearTimeout(call.timer);
    return call;
  }

  private finish(call: PendingCall, outcome: Outcome<ReturnValue>): void {
    const durationMs = Date.now() - call.startedAt;
    const meta: OutcomeMeta = { callId: call.id, durationMs };
    this.trace.emit({ tag: "E_Reply", id: call.id, command: call.command.tag, ok: isDone(outcome), durationMs });
    call.settle({ ...outcome, meta });
  }

  private failAll(reason: string): void {
    const calls = [...this.pending.values()];
    this.pending.clear();
    for (const call of calls) {
      if (call.timer) clearTimeout(call.timer);
      call.settle(processUnavailable(reason, { callId: call.id }));
    }
  }

  private notify(notification: Notification): void {
    this.trace.emit({ tag: "E_Notification", kind: notification.tag === "Unknown" ? notification.kind : notification.tag });
    for (const listener of [...this.listeners]) listener(notification);
  }

  private runContinuation(generation: number, fn: () => void): void {
    this.continuationScope.run(generation, fn);
  }
}

function trailingId(raw: Sexp): number | undefined {
  if (raw.tag !== "List") return undefined;
  const last = raw.items[raw.items.length - 1];
  return last?.tag === "Num" ? last.n : undefined;
}
