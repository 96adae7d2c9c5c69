import { spawn, type ChildProcessWithoutNullStreams } from "child_process";
import { FrameDecoder, frame } from "../core/protocol/framing";
import type { CompilerConnection, Disposable } from "../ports";

export interface ProcessTransportOptions {
  command: string;
  args: string[];
  cwd?: string;
  /** Receives whatever the compiler writes to stderr. */
  onStderr?: (text: string) => void;
}

function listenerSet<T extends unknown[]>() {
  const listeners = new Set<(...args: T) => void>();
  return {
    add(listener: (...args: T) => void): Disposable {
      listeners.add(listener);
      return { dispose: () => { listeners.delete(listener); } };
    },
    fire(...args: T): void {
      for (const listener of [...listeners]) listener(...args);
    },
  };
}

/**
 * Compiler connection over a child process's stdio.
 * Frames go to stdin; stdout is decoded frame by frame.
 */
export class ProcessTransport implements CompilerConnection {
  private child: ChildProcessWithoutNullStreams | undefined;
  private starting: Promise<void> | undefined;
  private readonly messages = listenerSet<[string]>();
  private readonly closes = listenerSet<[string]>();

  constructor(private readonly options: ProcessTransportOptions) {}

  ensureRunning(): Promise<void> {
    if (this.child) return Promise.resolve();
    // Concurrent callers share one start.
    this.starting ??= this.start().finally(() => {
      this.starting = undefined;
    });
    return this.starting;
  }

  isRunning(): boolean {
    return this.child !== undefined;
  }

  isOpen(): boolean {
    return this.child !== undefined && this.child.stdin.writable;
  }

  send(payload: string): void {
    if (!this.child) throw new Error("compiler process is not running");
    this.child.stdin.write(frame(payload));
  }

  onMessage(listener: (payload: string) => void): Disposable {
    return this.messages.add(listener);
  }

  onClose(listener: (reason: string) => void): Disposable {
    return this.closes.add(listener);
  }

  terminate(): void {
    const child = this.child;
    this.child = undefined;
    if (!child) return;
    child.removeAllListeners();
    child.stdout.removeAllListeners();
    child.stderr.removeAllListeners();
    child.stdin.end();
    child.kill();
  }

  private start(): Promise<void> {
    const { command, args, cwd, onStderr } = this.options;

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { cwd, stdio: "pipe", shell: process.platform === "win32" });
      const decoder = new FrameDecoder();

      child.stdout.on("data", (chunk: Buffer) => {
        let payloads: string[];
        try {
          payloads = decoder.push(chunk);
        } catch (error) {
          this.lose(child, `unreadable output: ${error instanceof Error ? error.message : String(error)}`);
          return;
        }
        for (const payload of payloads) this.messages.fire(payload);
      });

      // Writing to a compiler that just died fails here, not in `send`.
      child.stdin.on("error", (err) => this.lose(child, err.message));

      child.stderr.setEncoding("utf8");
      child.stderr.on("data", (text: string) => onStderr?.(text));

      child.once("spawn", () => {
        this.child = child;
        resolve();
      });

      child.once("error", (err) => {
        if (this.child === child) this.lose(child, err.message);
        else reject(err);
      });

      child.once("exit", (code, signal) => {
        this.lose(child, signal ? `killed by ${signal}` : `exited with code ${code ?? "unknown"}`);
      });
    });
  }

  private lose(child: ChildProcessWithoutNullStreams, reason: string): void {
    if (this.child !== child) return;
    this.child = undefined;
    child.kill();
    this.closes.fire(reason);
  }
}
