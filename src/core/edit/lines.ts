// src/core/edit/lines.ts
// Line-oriented positions within a buffer

import type { BufferPort, Position } from "../../ports";

export interface LineSpan {
  start: Position;
  end: Position;
}

export function lineContentSpan(buffer: BufferPort, line: number): LineSpan {
  return {
    start: { line, column: 0 },
    end: { line, column: buffer.lineText(line).length },
  };
}

export function endOfLine(buffer: BufferPort, line: number): Position {
  return { line, column: buffer.lineText(line).length };
}

export function stripTrailingNewline(text: string): string {
  if (text.endsWith("\r\n")) return text.slice(0, -2);
  if (text.endsWith("\n")) return text.slice(0, -1);
  return text;
}

const HOLE_NAME_CHAR = /[A-Za-z0-9_']/;

/**
 * Span of `?name` on a line, matching whole names only (`?x` does not match `?xs`).
 */
export function findHole(lineText: string, name: string): { start: number; end: number } | undefined {
  const needle = `?${name}`;
  let from = 0;
  while (true) {
    const at = lineText.indexOf(needle, from);
    if (at < 0) return undefined;
    const end = at + needle.length;
    if (end >= lineText.length || !HOLE_NAME_CHAR.test(lineText.charAt(end))) return { start: at, end };
    from = at + 1;
  }
}

/**
 * Span from the nearest `?` at or before `column` through the end of the name that follows it.
 */
export function holeSpanBefore(lineText: string, column: number): { start: number; end: number } | undefined {
  for (let i = Math.min(column, lineText.length - 1); i >= 0; i--) {
    if (lineText[i] !== "?") continue;
    let end = i + 1;
    while (end < lineText.length && HOLE_NAME_CHAR.test(lineText.charAt(end))) end++;
    return { start: i, end };
  }
  return undefined;
}
