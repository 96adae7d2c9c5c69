// test/core/protocol/command.spec.ts
// Tests for outgoing command construction and encoding

import { describe, it, expect } from "vitest";
import { command, describeCommand, encodeCommand } from "../../../src/core/protocol/command";
import { sexpToString } from "../../../src/core/sexp";

describe("command", () => {
  it("freezes the command and its arguments", () => {
    const cmd = command("case-split", 10, "foo");
    expect(Object.isFrozen(cmd)).toBe(true);
    expect(Object.isFrozen(cmd.args)).toBe(true);
    expect(cmd).toEqual({ tag: "case-split", args: [10, "foo"] });
  });
});

describe("encodeCommand", () => {
  it("wraps the tagged call and its id", () => {
    expect(sexpToString(encodeCommand(command("load-file", "Main.idr"), 1))).toBe('((:load-file "Main.idr") 1)');
    expect(sexpToString(encodeCommand(command("case-split", 10, "foo"), 5))).toBe('((:case-split 10 "foo") 5)');
  });

  it("encodes proof-search hints as a list of strings", () => {
    const cmd = command("proof-search", 3, "rhs", ["plusZero", "refl"]);
    expect(sexpToString(encodeCommand(cmd, 9))).toBe('((:proof-search 3 "rhs" ("plusZero" "refl")) 9)');
    expect(sexpToString(encodeCommand(command("proof-search", 3, "rhs", []), 10))).toBe('((:proof-search 3 "rhs" ()) 10)');
  });

  it("escapes quotes in string arguments", () => {
    const cmd = command("interpret", ':t "x"');
    expect(sexpToString(encodeCommand(cmd, 2))).toBe('((:interpret ":t \\"x\\"") 2)');
  });

  it("carries the choice for refinement commands", () => {
    const cmd = command("choose-identifier", 4, "goal", "Just");
    expect(sexpToString(encodeCommand(cmd, 11))).toBe('((:choose-identifier 4 "goal" "Just") 11)');
  });
});

describe("describeCommand", () => {
  it("renders a short human-readable form", () => {
    expect(describeCommand(command("type-of", "plus"))).toBe("type-of plus");
    expect(describeCommand(command("proof-search", 3, "rhs", ["a", "b"]))).toBe("proof-search 3 rhs [a b]");
  });
});
