import * as fs from "fs/promises";
import * as path from "path";
import type { BufferPort, Disposable, IdentifierAtPoint, Position } from "../ports";

export interface TextBufferOptions {
  cursor?: Position;
  /** Where `save` writes; defaults to the file itself. */
  persist?: (filePath: string, text: string) => Promise<void>;
}

const IDENTIFIER_CHAR = /[A-Za-z0-9_'.]/;

/**
 * In-memory buffer over a file's text, for hosts without an editor of their own.
 */
export class TextBuffer implements BufferPort {
  private lines: string[];
  private point: Position;
  private readonly listeners = new Set<() => void>();
  private readonly persist: (filePath: string, text: string) => Promise<void>;

  constructor(private readonly file: string, text: string, options: TextBufferOptions = {}) {
    this.lines = text.split("\n");
    this.point = options.cursor ?? { line: 1, column: 0 };
    this.persist = options.persist ?? ((p, t) => fs.writeFile(p, t, "utf8"));
  }

  static async fromFile(filePath: string, options: TextBufferOptions = {}): Promise<TextBuffer> {
    const absolute = path.resolve(filePath);
    return new TextBuffer(absolute, await fs.readFile(absolute, "utf8"), options);
  }

  get text(): string {
    return this.lines.join("\n");
  }

  filePath(): string {
    return this.file;
  }

  directory(): string {
    return path.dirname(this.file);
  }

  cursor(): Position {
    return { ...this.point };
  }

  setCursor(position: Position): void {
    this.point = { ...position };
  }

  lineCount(): number {
    return this.lines.length;
  }

  lineText(line: number): string {
    return this.lines[line - 1] ?? "";
  }

  currentLineText(): string {
    return this.lineText(this.point.line);
  }

  replaceRange(start: Position, end: Position, text: string): void {
    const before = this.lineText(start.line).slice(0, start.column);
    const after = this.lineText(end.line).slice(end.column);
    const replacement = `${before}${text}${after}`.split("\n");
    this.lines.splice(start.line - 1, end.line - start.line + 1, ...replacement);
    this.changed();
  }

  insertAt(position: Position, text: string): void {
    if (position.line > this.lines.length) {
      this.lines.push("");
    }
    this.replaceRange(position, position, text);
  }

  save(): Promise<void> {
    return this.persist(this.file, this.text);
  }

  cursorIdentifierAndLine(): IdentifierAtPoint | undefined {
    const { line, column } = this.point;
    const text = this.lineText(line);

    let start = Math.min(column, text.length);
    // On the "?" of a hole, the name follows it.
    if (text.charAt(start) === "?") start++;
    let end = start;
    while (start > 0 && IDENTIFIER_CHAR.test(text.charAt(start - 1))) start--;
    while (end < text.length && IDENTIFIER_CHAR.test(text.charAt(end))) end++;

    // Dots qualify names but never start or end one.
    const name = text.slice(start, end).replace(/^\.+|\.+$/g, "");
    if (name.length === 0) return undefined;
    return { name, line };
  }

  onDidChange(listener: () => void): Disposable {
    this.listeners.add(listener);
    return { dispose: () => { this.listeners.delete(listener); } };
  }

  private changed(): void {
    for (const listener of [...this.listeners]) listener();
  }
}
