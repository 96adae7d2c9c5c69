import type { CompilerConnection, Disposable, TraceEvent, TraceSink } from "../ports";

function formatEvent(event: TraceEvent): string {
  switch (event.tag) {
    case "E_Send":
      return `-> #${event.id} ${event.command}`;
    case "E_Reply":
      return `<- #${event.id} ${event.command} ${event.ok ? "ok" : "failed"} (${event.durationMs}ms)`;
    case "E_Notification":
      return `<- ${event.kind}`;
    case "E_Load":
      return `load ${event.file} ${event.ok ? "ok" : "failed"}`;
    case "E_DirectoryChange":
      return `cd ${event.path}`;
    case "E_Discard":
      return `discarded ${event.count} pending call(s)`;
    case "E_Wire":
      return `${event.direction === "out" ? ">>" : "<<"} ${event.payload}`;
  }
}

/**
 * Trace sink writing one line per event.
 * Defaults to stderr so stdout stays free for command output.
 */
export function consoleTraceSink(write: (line: string) => void = (line) => console.error(line)): TraceSink {
  return {
    emit(event: TraceEvent): void {
      write(`[idris-ide] ${formatEvent(event)}`);
    },
  };
}

/**
 * Fan one event out to several sinks.
 */
export function teeTrace(...sinks: TraceSink[]): TraceSink {
  return {
    emit(event: TraceEvent): void {
      for (const sink of sinks) sink.emit(event);
    },
  };
}

/**
 * Wrap a connection so every payload in either direction is traced.
 */
export function loggingConnection(inner: CompilerConnection, trace: TraceSink): CompilerConnection {
  return {
    ensureRunning: () => inner.ensureRunning(),
    isRunning: () => inner.isRunning(),
    terminate: () => inner.terminate(),
    isOpen: () => inner.isOpen(),
    send(payload: string): void {
      trace.emit({ tag: "E_Wire", direction: "out", payload });
      inner.send(payload);
    },
    onMessage(listener: (payload: string) => void): Disposable {
      return inner.onMessage((payload) => {
        trace.emit({ tag: "E_Wire", direction: "in", payload });
        listener(payload);
      });
    },
    onClose: (listener) => inner.onClose(listener),
  };
}
