// test/adapters/diagnosticsStore.spec.ts

import { describe, it, expect } from "vitest";
import { DiagnosticsStore } from "../../src/adapters/diagnosticsStore";
import { makeDiagnostic, type Diagnostic } from "../../src/outcome";

function warningIn(file: string, detail: string) {
  return makeDiagnostic("W0001", { detail }, { file, start: { line: 2, column: 0 }, end: { line: 2, column: 4 } });
}

describe("DiagnosticsStore", () => {
  it("groups diagnostics by file", () => {
    const store = new DiagnosticsStore();
    store.add(warningIn("/work/A.idr", "one"));
    store.add(warningIn("/work/B.idr", "two"));
    store.add(warningIn("/work/A.idr", "three"));

    expect(store.get("/work/A.idr").map((d) => d.message)).toEqual(["one", "three"]);
    expect(store.get("/work/B.idr").map((d) => d.message)).toEqual(["two"]);
    expect(store.get("/work/C.idr")).toEqual([]);
  });

  it("clears one file on reset", () => {
    const store = new DiagnosticsStore();
    store.add(warningIn("/work/A.idr", "one"));
    store.add(warningIn("/work/B.idr", "two"));
    store.reset("/work/A.idr");
    expect(store.get("/work/A.idr")).toEqual([]);
    expect(store.get("/work/B.idr")).toHaveLength(1);
  });

  it("hands the file's set to listeners when it is available", () => {
    const store = new DiagnosticsStore();
    const seen: Array<{ file: string; found: Diagnostic[] }> = [];
    const sub = store.onAvailable((file, found) => seen.push({ file, found }));

    store.add(warningIn("/work/A.idr", "one"));
    store.signalAvailable("/work/A.idr");
    sub.dispose();
    store.signalAvailable("/work/A.idr");

    expect(seen).toHaveLength(1);
    expect(seen[0]?.file).toBe("/work/A.idr");
    expect(seen[0]?.found.map((d) => d.severity)).toEqual(["warning"]);
  });
});
