// test/core/session/session.spec.ts
// Tests for the session state machine: process, working directory, dirty tracking, loads

import { describe, it, expect, beforeEach } from "vitest";
import type { Outcome } from "../../../src/outcome";
import { isDone } from "../../../src/outcome";
import type { TraceEvent } from "../../../src/ports";
import { Session } from "../../../src/core/session";
import { Dispatcher } from "../../../src/core/dispatch";
import { ScriptedCompiler, errorReply, okSexp, settle } from "../../helpers/scriptedCompiler";
import { RecordingDiagnostics, makeBuffer, makeHarness, type Harness } from "../../helpers/fakes";
import { TextBuffer } from "../../../src/adapters/textBuffer";
import { command } from "../../../src/core/protocol/command";

describe("Session", () => {
  let h: Harness;

  beforeEach(() => {
    h = makeHarness();
  });

  describe("loadIfNeeded", () => {
    it("starts the process, changes directory, then loads by file name", async () => {
      const buffer = makeBuffer("module Main\n");
      const res = await h.session.loadIfNeeded(buffer);

      expect(isDone(res)).toBe(true);
      expect(h.compiler.startCount).toBe(1);
      expect(h.compiler.sent.map((c) => [c.tag, ...c.args])).toEqual([
        ["interpret", ":cd /work"],
        ["load-file", "Main.idr"],
      ]);
      expect(h.session.currentWorkingDirectory).toBe("/work");
      expect(h.session.loadedBuffer).toBe(buffer);
      expect(h.session.isDirty(buffer)).toBe(false);
    });

    it("skips the round trip when the buffer is loaded and unmodified", async () => {
      const buffer = makeBuffer("module Main\n");
      await h.session.loadIfNeeded(buffer);
      await h.session.loadIfNeeded(buffer);
      expect(h.compiler.tags).toEqual(["interpret", "load-file"]);
    });

    it("reloads after the buffer is edited", async () => {
      const buffer = makeBuffer("module Main\n");
      await h.session.loadIfNeeded(buffer);
      buffer.insertAt({ line: 2, column: 0 }, "x : Nat");
      expect(h.session.isStale(buffer)).toBe(true);

      await h.session.loadIfNeeded(buffer);
      expect(h.compiler.tags).toEqual(["interpret", "load-file", "load-file"]);
    });

    it("changes directory only when it differs from the cached one", async () => {
      const a = makeBuffer("module A\n", undefined, "/work/A.idr");
      const b = makeBuffer("module B\n", undefined, "/work/B.idr");
      const c = makeBuffer("module C\n", undefined, "/other/C.idr");

      await h.session.loadIfNeeded(a);
      await h.session.loadIfNeeded(b);
      await h.session.loadIfNeeded(c);

      expect(h.compiler.sent.map((s) => [s.tag, ...s.args])).toEqual([
        ["interpret", ":cd /work"],
        ["load-file", "A.idr"],
        ["load-file", "B.idr"],
        ["interpret", ":cd /other"],
        ["load-file", "C.idr"],
      ]);
    });

    it("treats another buffer as stale after a switch", async () => {
      const a = makeBuffer("module A\n", undefined, "/work/A.idr");
      const b = makeBuffer("module B\n", undefined, "/work/B.idr");
      await h.session.loadIfNeeded(a);
      await h.session.loadIfNeeded(b);

      expect(h.session.isDirty(a)).toBe(false);
      expect(h.session.isStale(a)).toBe(true);
      await h.session.loadIfNeeded(a);
      expect(h.compiler.tags.filter((t) => t === "load-file")).toHaveLength(3);
    });

    it("reports a rejected load and leaves nothing loaded", async () => {
      h.compiler.on("load-file", () => errorReply("Main.idr:3:5: Type mismatch"));
      const buffer = makeBuffer("module Main\n");
      const res = await h.session.loadIfNeeded(buffer);

      expect(isDone(res)).toBe(false);
      if (isDone(res)) return;
      expect(res.failure.reason).toBe("load-failed");
      expect(res.failure.message).toBe("Main.idr:3:5: Type mismatch");
      expect(res.failure.context).toEqual({ file: "/work/Main.idr" });
      expect(h.session.loadedBuffer).toBeUndefined();
      expect(h.session.isDirty(buffer)).toBe(true);
      expect(h.diagnostics.events).toEqual(["reset /work/Main.idr", "available /work/Main.idr"]);
    });

    it("does not mark the buffer clean when it changed during the load", async () => {
      const buffer = makeBuffer("module Main\n");
      h.compiler.on("load-file", () => {
        buffer.insertAt({ line: 2, column: 0 }, "-- typed while loading");
        return okSexp("()");
      });

      const res = await h.session.loadIfNeeded(buffer);
      expect(isDone(res)).toBe(true);
      expect(h.session.isDirty(buffer)).toBe(true);
      expect(h.session.loadedBuffer).toBeUndefined();
    });

    it("saves the buffer before loading", async () => {
      const order: string[] = [];
      const buffer = new TextBuffer("/work/Main.idr", "module Main\n", {
        persist: () => {
          order.push("save");
          return Promise.resolve();
        },
      });
      h.compiler.on("load-file", () => {
        order.push("load-file");
        return okSexp("()");
      });

      await h.session.loadIfNeeded(buffer);
      expect(order).toEqual(["save", "load-file"]);
    });

    it("fails without loading when the buffer cannot be saved", async () => {
      const buffer = new TextBuffer("/work/Main.idr", "module Main\n", {
        persist: () => Promise.reject(new Error("read-only file system")),
      });
      const res = await h.session.loadIfNeeded(buffer);

      expect(isDone(res)).toBe(false);
      if (isDone(res)) return;
      expect(res.failure.reason).toBe("load-failed");
      expect(res.failure.message).toBe("Could not save /work/Main.idr: read-only file system");
      expect(h.compiler.tags).toEqual(["interpret"]);
    });

    it("reports a process that cannot start", async () => {
      h.compiler.failStart = "spawn idris ENOENT";
      const res = await h.session.loadIfNeeded(makeBuffer("module Main\n"));

      expect(isDone(res)).toBe(false);
      if (isDone(res)) return;
      expect(res.failure.reason).toBe("process-unavailable");
      expect(res.failure.message).toBe("Compiler process unavailable: spawn idris ENOENT");
    });
  });

  describe("asynchronous loads", () => {
    it("returns once the load is issued and hands the result to the continuation", async () => {
      h.compiler.on("load-file", () => ({ hold: true }));
      const buffer = makeBuffer("module Main\n");
      const results: Array<Outcome<void>> = [];

      const issued = await h.session.loadIfNeeded(buffer, "async", (o) => results.push(o));
      expect(isDone(issued)).toBe(true);
      expect(h.compiler.tags).toEqual(["interpret", "load-file"]);
      expect(results).toEqual([]);

      const loadId = h.compiler.sent[1]?.id ?? -1;
      h.compiler.release(loadId, okSexp("()"));
      await settle();

      expect(results.map((r) => r.tag)).toEqual(["Done"]);
      expect(h.session.loadedBuffer).toBe(buffer);
    });

    it("hands a rejected load to the continuation as load-failed", async () => {
      h.compiler.on("load-file", () => errorReply("parse error"));
      const results: Array<Outcome<void>> = [];

      await h.session.loadIfNeeded(makeBuffer("module Main\n"), "async", (o) => results.push(o));
      await settle();

      const [result] = results;
      expect(result && !isDone(result) && result.failure.reason).toBe("load-failed");
    });
  });

  describe("quit", () => {
    it("discards pending calls, stops the process and forgets its state", async () => {
      const buffer = makeBuffer("module Main\n");
      await h.session.loadIfNeeded(buffer);

      h.compiler.on("type-of", () => ({ hold: true }));
      const calls: string[] = [];
      h.dispatcher.callAsync(command("type-of", "x"), () => calls.push("ok"), () => calls.push("fail"));

      h.session.quit();
      await settle();

      expect(calls).toEqual([]);
      expect(h.compiler.terminateCount).toBe(1);
      expect(h.session.loadedBuffer).toBeUndefined();
      expect(h.session.currentWorkingDirectory).toBeUndefined();
    });

    it("ends a sync load that was still waiting for the compiler", async () => {
      h.compiler.on("load-file", () => ({ hold: true }));
      const buffer = makeBuffer("module Main\n");
      const loading = h.session.loadIfNeeded(buffer);
      await settle();
      expect(h.compiler.tags).toEqual(["interpret", "load-file"]);

      h.session.quit();
      const res = await loading;

      expect(isDone(res) ? "done" : res.failure.reason).toBe("process-unavailable");
      expect(h.session.loadedBuffer).toBeUndefined();
      expect(h.session.isDirty(buffer)).toBe(true);
    });

    it("restarts and repeats the directory change on the next load", async () => {
      const buffer = makeBuffer("module Main\n");
      await h.session.loadIfNeeded(buffer);
      h.session.quit();
      await h.session.loadIfNeeded(buffer);

      expect(h.compiler.startCount).toBe(2);
      expect(h.compiler.tags).toEqual(["interpret", "load-file", "interpret", "load-file"]);
    });
  });

  it("traces directory changes and loads", async () => {
    const compiler = new ScriptedCompiler();
    const events: TraceEvent[] = [];
    const trace = { emit: (e: TraceEvent) => events.push(e) };
    const session = new Session({
      process: compiler,
      eval: new Dispatcher(compiler),
      diagnostics: new RecordingDiagnostics(),
      trace,
    });

    await session.loadIfNeeded(makeBuffer("module Main\n"));
    expect(events).toEqual([
      { tag: "E_DirectoryChange", path: "/work" },
      { tag: "E_Load", file: "/work/Main.idr", ok: true },
    ]);
  });
});
