import { describe, expect, it } from "vitest";
import { silentTrace } from "../../src/ports";
import type { CompilerConnection, TraceEvent } from "../../src/ports";
import { ScriptedCompiler } from "../helpers/scriptedCompiler";
import { makeBuffer } from "../helpers/fakes";

describe("silentTrace", () => {
  it("accepts every event kind", () => {
    const events: TraceEvent[] = [
      { tag: "E_Send", id: 1, command: "load-file" },
      { tag: "E_Load", file: "Main.idr", ok: true },
      { tag: "E_Notification", kind: "SetPrompt" },
    ];
    for (const event of events) expect(() => silentTrace.emit(event)).not.toThrow();
  });
});

describe("CompilerConnection", () => {
  it("is one object for process control and transport", async () => {
    const connection: CompilerConnection = new ScriptedCompiler();
    expect(connection.isRunning()).toBe(false);
    await connection.ensureRunning();
    expect(connection.isRunning()).toBe(true);
    expect(connection.isOpen()).toBe(true);
  });

  it("stops delivering after a subscription is disposed", async () => {
    const compiler = new ScriptedCompiler();
    const seen: string[] = [];
    const sub = compiler.onMessage((p) => seen.push(p));
    compiler.emit("(:set-prompt \"*Main\" 1)");
    await Promise.resolve();
    sub.dispose();
    compiler.emit("(:set-prompt \"*Other\" 2)");
    await Promise.resolve();
    expect(seen).toEqual(["(:set-prompt \"*Main\" 1)"]);
  });
});

describe("BufferPort", () => {
  it("reports the current line at the cursor", () => {
    const buffer = makeBuffer("module Main\nf : Nat", { line: 2, column: 0 });
    expect(buffer.currentLineText()).toBe("f : Nat");
    expect(buffer.cursor()).toEqual({ line: 2, column: 0 });
  });
});
