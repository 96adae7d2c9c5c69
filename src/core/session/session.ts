// src/core/session/session.ts
// Session state machine: which buffer the compiler has loaded, and in which directory

import * as path from "path";
import { command } from "../protocol/command";
import type { ReturnValue } from "../protocol/reply";
import type {
  BufferPort,
  DiagnosticsPort,
  Disposable,
  EvalPort,
  ProcessPort,
  TraceSink,
} from "../../ports";
import { silentTrace } from "../../ports";
import type { Outcome } from "../../outcome";
import { done, fail, isDone, loadFailed, processUnavailable } from "../../outcome";

export type LoadMode = "sync" | "async";

/** Receives the terminal outcome of a load issued in "async" mode. */
export type LoadContinuation = (outcome: Outcome<void>) => void;

export interface SessionDeps {
  process: ProcessPort;
  eval: EvalPort;
  diagnostics: DiagnosticsPort;
  /** Drops calls in flight without running their continuations. */
  pending?: { discardAll(): number };
  trace?: TraceSink;
}

/**
 * Tracks per-buffer dirty flags, the buffer the compiler currently holds, and
 * the compiler's working directory.
 *
 * Invariant: `loadedBuffer` is set only while that buffer is clean and was the
 * last one loaded successfully.
 */
export class Session {
  private cwd: string | undefined;
  private loaded: BufferPort | undefined;
  private readonly dirty = new WeakMap<BufferPort, boolean>();
  private readonly versions = new WeakMap<BufferPort, number>();
  private readonly watches = new WeakMap<BufferPort, Disposable>();
  private readonly trace: TraceSink;

  constructor(private readonly deps: SessionDeps) {
    this.trace = deps.trace ?? silentTrace;
  }

  get currentWorkingDirectory(): string | undefined {
    return this.cwd;
  }

  get loadedBuffer(): BufferPort | undefined {
    return this.loaded;
  }

  async ensureProcess(): Promise<Outcome<void>> {
    if (this.deps.process.isRunning()) return done(undefined);
    // A fresh process knows nothing we told the previous one.
    this.reset();
    try {
      await this.deps.process.ensureRunning();
    } catch (error) {
      return processUnavailable(error instanceof Error ? error.message : String(error));
    }
    return done(undefined);
  }

  async switchWorkingDirectory(dir: string): Promise<Outcome<void>> {
    if (dir === this.cwd && this.deps.process.isRunning()) return done(undefined);

    const started = await this.ensureProcess();
    if (!isDone(started)) return started;

    const res = await this.deps.eval.callSync(command("interpret", `:cd ${dir}`));
    if (!isDone(res)) return res;

    this.cwd = dir;
    this.trace.emit({ tag: "E_DirectoryChange", path: dir });
    return done(undefined);
  }

  /** Start following a buffer's edits. Idempotent. */
  track(buffer: BufferPort): void {
    if (this.watches.has(buffer)) return;
    this.watches.set(buffer, buffer.onDidChange(() => {
      this.versions.set(buffer, this.versionOf(buffer) + 1);
      this.markDirty(buffer);
    }));
  }

  untrack(buffer: BufferPort): void {
    this.watches.get(buffer)?.dispose();
    this.watches.delete(buffer);
    if (this.loaded === buffer) this.loaded = undefined;
  }

  markDirty(buffer: BufferPort): void {
    this.dirty.set(buffer, true);
  }

  markClean(buffer: BufferPort): void {
    this.dirty.set(buffer, false);
    this.loaded = buffer;
  }

  isDirty(buffer: BufferPort): boolean {
    return this.dirty.get(buffer) ?? true;
  }

  isStale(buffer: BufferPort): boolean {
    return this.isDirty(buffer) || buffer !== this.loaded;
  }

  /**
   * Load `buffer` into the compiler unless it is already loaded and unmodified.
   *
   * In "sync" mode the promise settles with the load's result. In "async" mode
   * it settles once the load is issued, and `continuation` later receives the
   * result. Failures before the load is issued are returned in both modes.
   */
  async loadIfNeeded(buffer: BufferPort, mode: LoadMode = "sync", continuation?: LoadContinuation): Promise<Outcome<void>> {
    this.track(buffer);
    if (!this.isStale(buffer)) return done(undefined);

    const file = buffer.filePath();
    this.deps.diagnostics.reset(file);

    const switched = await this.switchWorkingDirectory(buffer.directory());
    if (!isDone(switched)) return switched;

    // The compiler reads the file from disk.
    try {
      await buffer.save();
    } catch (error) {
      return loadFailed(file, `Could not save ${file}: ${error instanceof Error ? error.message : String(error)}`);
    }

    this.loaded = undefined;
    const version = this.versionOf(buffer);
    const cmd = command("load-file", path.basename(file));

    if (mode === "sync") {
      return this.finishLoad(buffer, version, await this.deps.eval.callSync(cmd));
    }

    this.deps.eval.callAsync(
      cmd,
      (value) => {
        const outcome = this.finishLoad(buffer, version, done(value));
        continuation?.(outcome);
      },
      (failure) => {
        const outcome = this.finishLoad(buffer, version, fail(failure));
        continuation?.(outcome);
      },
    );
    return done(undefined);
  }

  /** Drop pending calls, stop the process, and forget its state. */
  quit(): void {
    this.deps.pending?.discardAll();
    this.deps.process.terminate();
    this.reset();
  }

  /** Forget everything the compiler process was told. */
  reset(): void {
    this.cwd = undefined;
    this.loaded = undefined;
  }

  private finishLoad(buffer: BufferPort, version: number, res: Outcome<ReturnValue>): Outcome<void> {
    const file = buffer.filePath();
    this.trace.emit({ tag: "E_Load", file, ok: isDone(res) });

    if (isDone(res)) {
      // Edited while the compiler was reading it: what it holds is already out of date.
      if (this.versionOf(buffer) === version) this.markClean(buffer);
      return done(undefined, res.meta);
    }

    if (res.failure.reason !== "call-failed") return res;
    this.deps.diagnostics.signalAvailable(file);
    return loadFailed(file, res.failure.message, res.failure.diagnostics, res.meta);
  }

  private versionOf(buffer: BufferPort): number {
    return this.versions.get(buffer) ?? 0;
  }
}
