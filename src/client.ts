// src/client.ts
// IdeClient: one session against one compiler process, with every command surfaced to the host

import * as path from "path";
import { Dispatcher, type NotificationListener } from "./core/dispatch";
import { Session, type LoadMode } from "./core/session";
import { createMediator } from "./core/edit";
import type { Notification, Text } from "./core/protocol/reply";
import {
  type CompletionResult,
  type EditResult,
  type InteractiveContext,
  type RefineResult,
  type RefineVariant,
  addClause,
  addMissing,
  addProofClause,
  caseSplit,
  completeAt,
  docsFor,
  interpret,
  makeWith,
  proofSearch,
  refineMetavariable,
  typeOf,
} from "./core/interactive";
import type { IdeClientConfig } from "./core/config";
import type {
  BufferPort,
  CompilerConnection,
  DiagnosticsPort,
  Disposable,
  Position,
  PresentationPort,
  TemplatePort,
  TraceSink,
} from "./ports";
import { silentTrace } from "./ports";
import type { Outcome } from "./outcome";
import { isDone, makeDiagnostic } from "./outcome";

export interface IdeClientDeps {
  connection: CompilerConnection;
  presentation: PresentationPort;
  diagnostics: DiagnosticsPort;
  templates?: TemplatePort;
  trace?: TraceSink;
}

export type IdeClientOptions = Pick<IdeClientConfig, "protocol" | "editing">;

/**
 * Host-facing entry point. Wires the dispatcher, the session and the edit
 * mediator, and reports every failed command through the presentation port.
 */
export class IdeClient {
  readonly session: Session;
  private readonly dispatcher: Dispatcher;
  private readonly ctx: InteractiveContext;
  private readonly subscriptions: Disposable[];
  private prompt: string | undefined;
  private version: { major: number; minor: number } | undefined;

  constructor(private readonly deps: IdeClientDeps, options: IdeClientOptions) {
    const trace = deps.trace ?? silentTrace;
    this.dispatcher = new Dispatcher(deps.connection, {
      requestTimeoutMs: options.protocol.requestTimeoutMs,
      trace,
    });
    this.session = new Session({
      process: deps.connection,
      eval: this.dispatcher,
      diagnostics: deps.diagnostics,
      pending: this.dispatcher,
      trace,
    });
    this.ctx = {
      session: this.session,
      eval: this.dispatcher,
      process: deps.connection,
      presentation: deps.presentation,
      mediator: createMediator(options.editing, deps.templates),
    };
    this.subscriptions = [
      this.dispatcher.observe((n) => this.onNotification(n)),
      // The dispatcher fails the pending calls; what the process knew is gone too.
      deps.connection.onClose(() => this.session.reset()),
    ];
  }

  /** Last prompt the compiler announced. */
  get currentPrompt(): string | undefined {
    return this.prompt;
  }

  get protocolVersion(): { major: number; minor: number } | undefined {
    return this.version;
  }

  /** Extra listener for notifications, beside the client's own handling. */
  observe(listener: NotificationListener): Disposable {
    return this.dispatcher.observe(listener);
  }

  load(buffer: BufferPort, mode: LoadMode = "sync"): Promise<Outcome<void>> {
    if (mode === "sync") return this.report(this.session.loadIfNeeded(buffer, "sync"));
    return this.report(this.session.loadIfNeeded(buffer, "async", (outcome) => {
      if (!isDone(outcome)) this.deps.presentation.message(outcome.failure.message);
    }));
  }

  typeOf(buffer: BufferPort, name?: string): Promise<Outcome<Text>> {
    return this.report(typeOf(this.ctx, buffer, name));
  }

  docsFor(name: string): Promise<Outcome<Text>> {
    return this.report(docsFor(this.ctx, name));
  }

  interpret(code: string): Promise<Outcome<Text>> {
    return this.report(interpret(this.ctx, code));
  }

  caseSplit(buffer: BufferPort): Promise<Outcome<EditResult>> {
    return this.report(caseSplit(this.ctx, buffer));
  }

  addClause(buffer: BufferPort): Promise<Outcome<EditResult>> {
    return this.report(addClause(this.ctx, buffer));
  }

  addProofClause(buffer: BufferPort): Promise<Outcome<EditResult>> {
    return this.report(addProofClause(this.ctx, buffer));
  }

  addMissing(buffer: BufferPort): Promise<Outcome<EditResult>> {
    return this.report(addMissing(this.ctx, buffer));
  }

  makeWith(buffer: BufferPort): Promise<Outcome<EditResult>> {
    return this.report(makeWith(this.ctx, buffer));
  }

  proofSearch(buffer: BufferPort, hints?: string | string[]): Promise<Outcome<EditResult>> {
    return this.report(proofSearch(this.ctx, buffer, hints));
  }

  refine(buffer: BufferPort, variant: RefineVariant = "plain"): Promise<Outcome<RefineResult>> {
    return this.report(refineMetavariable(this.ctx, buffer, variant));
  }

  completeAt(buffer: BufferPort, position: Position): Promise<Outcome<CompletionResult | undefined>> {
    return this.report(completeAt(this.ctx, buffer, position));
  }

  quit(): void {
    this.session.quit();
  }

  dispose(): void {
    for (const sub of this.subscriptions) sub.dispose();
    this.quit();
    this.dispatcher.dispose();
  }

  private async report<A>(pending: Promise<Outcome<A>>): Promise<Outcome<A>> {
    const outcome = await pending;
    if (!isDone(outcome)) this.deps.presentation.message(outcome.failure.message);
    return outcome;
  }

  private onNotification(n: Notification): void {
    switch (n.tag) {
      case "Warning": {
        const { range, message } = n.warning;
        const cwd = this.session.currentWorkingDirectory;
        const file = cwd ? path.resolve(cwd, range.file) : range.file;
        this.deps.diagnostics.add(makeDiagnostic("W0001", { detail: message }, { ...range, file }));
        return;
      }
      case "WriteString":
        this.deps.presentation.message(n.text);
        return;
      case "SetPrompt":
        this.prompt = n.prompt;
        return;
      case "ProtocolVersion":
        this.version = { major: n.major, minor: n.minor };
        return;
      case "Output":
      case "Unknown":
        return;
    }
  }
}
