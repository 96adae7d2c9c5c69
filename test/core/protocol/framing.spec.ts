// test/core/protocol/framing.spec.ts
// Tests for the six-hex-digit length framing

import { describe, it, expect } from "vitest";
import { FrameDecoder, frame } from "../../../src/core/protocol/framing";

describe("frame", () => {
  it("prefixes the length of payload plus newline", () => {
    expect(frame("(:ok)")).toBe("000006(:ok)\n");
  });

  it("counts characters, not bytes", () => {
    // "→" is three bytes in UTF-8 but one character.
    expect(frame('(:return (:ok "a → b") 1)').slice(0, 6)).toBe("00001a");
    expect(frame(':cd "/home/josé"').slice(0, 6)).toBe("000011");
  });

  it("counts a character outside the basic plane once", () => {
    expect(frame('"𝕍"')).toBe('000004"𝕍"\n');
  });

  it("uses lowercase hex", () => {
    const payload = "x".repeat(25);
    expect(frame(payload).slice(0, 6)).toBe("00001a");
  });
});

describe("FrameDecoder", () => {
  it("decodes several frames from one chunk", () => {
    const d = new FrameDecoder();
    expect(d.push(frame("(a)") + frame("(b)"))).toEqual(["(a)", "(b)"]);
    expect(d.buffered).toBe(0);
  });

  it("waits for a frame split across chunks", () => {
    const d = new FrameDecoder();
    const whole = frame('(:return (:ok "Nat") 1)');
    expect(d.push(whole.slice(0, 3))).toEqual([]);
    expect(d.push(whole.slice(3, 12))).toEqual([]);
    expect(d.buffered).toBe(12);
    expect(d.push(whole.slice(12))).toEqual(['(:return (:ok "Nat") 1)']);
  });

  it("keeps frames aligned after a non-ASCII reply", () => {
    const d = new FrameDecoder();
    const bytes = Buffer.from('00001a(:return (:ok "a → b") 1)\n00000c(:ok "Nat")\n', "utf8");
    expect(d.push(bytes)).toEqual(['(:return (:ok "a → b") 1)', '(:ok "Nat")']);
    expect(d.buffered).toBe(0);
  });

  it("reassembles a multi-byte character split between chunks", () => {
    const d = new FrameDecoder();
    const bytes = Buffer.from(frame('"λ"'), "utf8");
    // Header, the quote, then the first byte of "λ".
    expect(d.push(bytes.subarray(0, 8))).toEqual([]);
    expect(d.push(bytes.subarray(8))).toEqual(['"λ"']);
  });

  it("rejects a header that is not hex", () => {
    const d = new FrameDecoder();
    expect(() => d.push("zzzzzz(a)\n")).toThrow('bad frame header: "zzzzzz"');
  });
});
