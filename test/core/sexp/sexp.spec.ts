// test/core/sexp/sexp.spec.ts
// Tests for the s-expression parser and printer used on the wire

import { describe, it, expect } from "vitest";
import {
  sym, kw, num, str, bool, list, isKw,
  parseSexp, sexpToString, sexpEq,
} from "../../../src/core/sexp/sexp";

describe("parseSexp", () => {
  it("parses keywords, strings and numbers", () => {
    expect(parseSexp(":ok")).toEqual(kw("ok"));
    expect(parseSexp('"hello"')).toEqual(str("hello"));
    expect(parseSexp("42")).toEqual(num(42));
    expect(parseSexp("-3")).toEqual(num(-3));
    expect(parseSexp("foo")).toEqual(sym("foo"));
  });

  it("decodes :True and :False to booleans", () => {
    expect(parseSexp(":True")).toEqual(bool(true));
    expect(parseSexp(":False")).toEqual(bool(false));
  });

  it("decodes nil to the empty list", () => {
    expect(parseSexp("nil")).toEqual(list([]));
    expect(parseSexp("()")).toEqual(list([]));
  });

  it("parses a nested return message", () => {
    const x = parseSexp('(:return (:ok "Nat" ()) 3)');
    expect(x).toEqual(list([kw("return"), list([kw("ok"), str("Nat"), list([])]), num(3)]));
  });

  it("handles escapes inside strings", () => {
    expect(parseSexp('"a\\"b"')).toEqual(str('a"b'));
    expect(parseSexp('"a\\\\b"')).toEqual(str("a\\b"));
    expect(parseSexp('"line\\nnext"')).toEqual(str("line\nnext"));
  });

  it("keeps parentheses inside strings", () => {
    expect(parseSexp('("(_)")')).toEqual(list([str("(_)")]));
  });

  it("rejects malformed input", () => {
    expect(() => parseSexp('"open')).toThrow("unterminated string");
    expect(() => parseSexp("(a b")).toThrow("unterminated list");
    expect(() => parseSexp(")")).toThrow("unexpected ')'");
    expect(() => parseSexp("a b")).toThrow("trailing tokens after first expression");
    expect(() => parseSexp("")).toThrow("unexpected EOF");
  });
});

describe("sexpToString", () => {
  it("prints an outgoing command", () => {
    const cmd = list([list([kw("case-split"), num(10), str("foo")]), num(7)]);
    expect(sexpToString(cmd)).toBe('((:case-split 10 "foo") 7)');
  });

  it("escapes quotes and backslashes", () => {
    expect(sexpToString(str('say "hi" \\ bye'))).toBe('"say \\"hi\\" \\\\ bye"');
  });

  it("prints booleans as keywords", () => {
    expect(sexpToString(list([bool(true), bool(false)]))).toBe("(:True :False)");
  });

  it("reads back what it prints", () => {
    const x = list([kw("warning"), list([str("Main.idr"), list([num(1), num(2)])]), num(4)]);
    expect(parseSexp(sexpToString(x))).toEqual(x);
  });
});

describe("sexpEq and isKw", () => {
  it("compares structurally", () => {
    expect(sexpEq(parseSexp('(:ok "x")'), list([kw("ok"), str("x")]))).toBe(true);
    expect(sexpEq(parseSexp('(:ok "x")'), parseSexp('(:ok "y")'))).toBe(false);
    expect(sexpEq(kw("ok"), sym("ok"))).toBe(false);
    expect(sexpEq(list([num(1)]), list([num(1), num(2)]))).toBe(false);
  });

  it("recognises keywords by name", () => {
    expect(isKw(kw("ok"))).toBe(true);
    expect(isKw(kw("ok"), "ok")).toBe(true);
    expect(isKw(kw("ok"), "error")).toBe(false);
    expect(isKw(sym("ok"))).toBe(false);
    expect(isKw(undefined)).toBe(false);
  });
});
