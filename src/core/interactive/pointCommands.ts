// src/core/interactive/pointCommands.ts
// Single round-trip commands scoped to the identifier at point

import type { InteractiveContext } from "./context";
import { prepareAtPoint } from "./context";
import { command } from "../protocol/command";
import { decodeText, type Text } from "../protocol/reply";
import { endOfLine, holeSpanBefore, lineContentSpan, stripTrailingNewline } from "../edit";
import type { BufferPort } from "../../ports";
import type { Outcome } from "../../outcome";
import { done, isDone, metavariableVanished } from "../../outcome";

type LineCommand = "case-split" | "add-clause" | "add-proof-clause" | "add-missing" | "make-with";

/** Applied edit, for callers that want to know what changed. */
export interface EditResult {
  line: number;
  name: string;
  text: string;
}

/**
 * Show the type of the identifier at point, or of `explicitName` when given.
 */
export async function typeOf(ctx: InteractiveContext, buffer: BufferPort, explicitName?: string): Promise<Outcome<Text>> {
  let name = explicitName;
  if (name === undefined) {
    const target = await prepareAtPoint(ctx, buffer);
    if (!isDone(target)) return target;
    name = target.value.name;
  } else {
    const loaded = await ctx.session.loadIfNeeded(buffer, "sync");
    if (!isDone(loaded)) return loaded;
  }

  const res = await ctx.eval.callSync(command("type-of", name));
  if (!isDone(res)) return res;
  const text = decodeText(res.value);
  if (!isDone(text)) return text;

  ctx.presentation.showInfo(text.value.text, text.value.highlights);
  return text;
}

/** Documentation for a name, shown like a type. */
export async function docsFor(ctx: InteractiveContext, name: string): Promise<Outcome<Text>> {
  const res = await ctx.eval.callSync(command("docs-for", name));
  if (!isDone(res)) return res;
  const text = decodeText(res.value);
  if (isDone(text)) ctx.presentation.showInfo(text.value.text, text.value.highlights);
  return text;
}

/** Evaluate an expression in the compiler's REPL context. */
export async function interpret(ctx: InteractiveContext, code: string): Promise<Outcome<Text>> {
  const started = await ctx.session.ensureProcess();
  if (!isDone(started)) return started;

  const res = await ctx.eval.callSync(command("interpret", code));
  if (!isDone(res)) return res;
  const text = decodeText(res.value);
  if (isDone(text)) ctx.presentation.showInfo(text.value.text, text.value.highlights);
  return text;
}

async function lineCommand(
  ctx: InteractiveContext,
  buffer: BufferPort,
  tag: LineCommand,
): Promise<Outcome<EditResult>> {
  const target = await prepareAtPoint(ctx, buffer);
  if (!isDone(target)) return target;
  const { line, name } = target.value;

  const res = await ctx.eval.callSync(command(tag, line, name));
  if (!isDone(res)) return res;
  const decoded = decodeText(res.value);
  if (!isDone(decoded)) return decoded;
  const text = decoded.value.text;

  switch (tag) {
    case "case-split":
    case "make-with": {
      const span = lineContentSpan(buffer, line);
      ctx.mediator.apply(buffer, span.start, span.end, stripTrailingNewline(text));
      break;
    }
    case "add-clause":
    case "add-proof-clause": {
      const at = endOfLine(buffer, line);
      ctx.mediator.apply(buffer, at, at, `\n${stripTrailingNewline(text)}`);
      break;
    }
    case "add-missing": {
      if (line < buffer.lineCount()) {
        const at = { line: line + 1, column: 0 };
        buffer.insertAt(at, text.endsWith("\n") ? text : `${text}\n`);
      } else {
        buffer.insertAt(endOfLine(buffer, line), `\n${stripTrailingNewline(text)}`);
      }
      break;
    }
  }
  return done({ line, name, text }, res.meta);
}

/** Replace the current line with the compiler's split of the pattern variable at point. */
export function caseSplit(ctx: InteractiveContext, buffer: BufferPort): Promise<Outcome<EditResult>> {
  return lineCommand(ctx, buffer, "case-split");
}

/** Insert an initial clause for the declaration at point below the current line. */
export function addClause(ctx: InteractiveContext, buffer: BufferPort): Promise<Outcome<EditResult>> {
  return lineCommand(ctx, buffer, "add-clause");
}

export function addProofClause(ctx: InteractiveContext, buffer: BufferPort): Promise<Outcome<EditResult>> {
  return lineCommand(ctx, buffer, "add-proof-clause");
}

/** Insert the clauses missing from the function at point, starting on the next line. */
export function addMissing(ctx: InteractiveContext, buffer: BufferPort): Promise<Outcome<EditResult>> {
  return lineCommand(ctx, buffer, "add-missing");
}

/** Turn the clause at point into a `with` block. */
export function makeWith(ctx: InteractiveContext, buffer: BufferPort): Promise<Outcome<EditResult>> {
  return lineCommand(ctx, buffer, "make-with");
}

/** Hints come as one string of names separated by whitespace, commas or semicolons. */
export function parseHints(hints: string | string[] | undefined): string[] {
  if (hints === undefined) return [];
  const joined = Array.isArray(hints) ? hints.join(" ") : hints;
  return joined.split(/[\s,;]+/).filter((h) => h.length > 0);
}

/**
 * Ask the compiler to fill the hole at point and replace `?name` with the result.
 */
export async function proofSearch(
  ctx: InteractiveContext,
  buffer: BufferPort,
  hints?: string | string[],
): Promise<Outcome<EditResult>> {
  const target = await prepareAtPoint(ctx, buffer);
  if (!isDone(target)) return target;
  const { line, name } = target.value;

  const res = await ctx.eval.callSync(command("proof-search", line, name, parseHints(hints)));
  if (!isDone(res)) return res;
  const decoded = decodeText(res.value);
  if (!isDone(decoded)) return decoded;

  const cursor = buffer.cursor();
  const column = cursor.line === line ? cursor.column : buffer.lineText(line).length;
  const span = holeSpanBefore(buffer.lineText(line), column);
  if (!span) return metavariableVanished(name, line);

  const text = stripTrailingNewline(decoded.value.text);
  buffer.replaceRange({ line, column: span.start }, { line, column: span.end }, text);
  return done({ line, name, text }, res.meta);
}
