// src/core/protocol/framing.ts
// Length-prefixed framing: six hex digits (character count of payload + newline), then payload

import { StringDecoder } from "string_decoder";

const HEADER_LENGTH = 6;
const MAX_FRAME = 0xffffff;

/** Lengths count code points, as the compiler counts characters. */
function codePointLength(text: string): number {
  return [...text].length;
}

/**
 * String index just past `count` code points starting at `from`,
 * or undefined when the text ends first.
 */
function advanceCodePoints(text: string, from: number, count: number): number | undefined {
  let i = from;
  for (let seen = 0; seen < count; seen++) {
    if (i >= text.length) return undefined;
    const cp = text.codePointAt(i) ?? 0;
    i += cp > 0xffff ? 2 : 1;
  }
  return i;
}

export function frame(payload: string): string {
  const body = `${payload}\n`;
  const length = codePointLength(body);
  if (length > MAX_FRAME) {
    throw new Error(`frame too large: ${length} characters`);
  }
  return length.toString(16).padStart(HEADER_LENGTH, "0") + body;
}

/**
 * Incremental decoder for a UTF-8 stream of frames.
 * Chunks may split frames anywhere, including inside a header or a multi-byte character.
 */
export class FrameDecoder {
  private readonly utf8 = new StringDecoder("utf8");
  private pending = "";

  push(chunk: Buffer | string): string[] {
    this.pending += typeof chunk === "string" ? chunk : this.utf8.write(chunk);

    const out: string[] = [];
    while (this.pending.length >= HEADER_LENGTH) {
      const header = this.pending.slice(0, HEADER_LENGTH);
      if (!/^[0-9a-fA-F]{6}$/.test(header)) {
        throw new Error(`bad frame header: ${JSON.stringify(header)}`);
      }
      const end = advanceCodePoints(this.pending, HEADER_LENGTH, parseInt(header, 16));
      if (end === undefined) break;

      const body = this.pending.slice(HEADER_LENGTH, end);
      this.pending = this.pending.slice(end);
      out.push(body.endsWith("\n") ? body.slice(0, -1) : body);
    }
    return out;
  }

  /** Characters received but not yet forming a complete frame. */
  get buffered(): number {
    return this.pending.length;
  }
}
