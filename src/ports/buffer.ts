import type { Disposable } from "./types";

/** 1-based line, 0-based column. */
export interface Position {
  line: number;
  column: number;
}

export interface IdentifierAtPoint {
  name: string;
  line: number;
}

/**
 * Buffer port: an editable text unit owned by the host editor.
 * The client compares buffers by identity and never copies their text ahead of need.
 */
export interface BufferPort {
  filePath(): string;

  directory(): string;

  cursor(): Position;

  lineCount(): number;

  lineText(line: number): string;

  currentLineText(): string;

  replaceRange(start: Position, end: Position, text: string): void;

  insertAt(position: Position, text: string): void;

  /** Write the text where the compiler will read it. Must not count as a change. */
  save(): Promise<void>;

  /** Identifier under the cursor and its line, or undefined when there is none. */
  cursorIdentifierAndLine(): IdentifierAtPoint | undefined;

  /** Fires after every text mutation, whoever made it. */
  onDidChange(listener: () => void): Disposable;
}
