// src/core/interactive/completion.ts
// Completion at a position; never triggers a load

import type { InteractiveContext } from "./context";
import { command } from "../protocol/command";
import { decodeCompletions } from "../protocol/reply";
import type { BufferPort, Position } from "../../ports";
import type { Outcome } from "../../outcome";
import { done, isDone } from "../../outcome";

export interface CompletionResult {
  start: Position;
  end: Position;
  candidates: string[];
}

const IDENTIFIER_RUN = /[A-Za-z0-9_]+$/;

export function prefixAt(buffer: BufferPort, position: Position): string {
  const before = buffer.lineText(position.line).slice(0, position.column);
  return IDENTIFIER_RUN.exec(before)?.[0] ?? "";
}

/**
 * Candidates for the identifier ending at `position`, or undefined when there
 * is nothing to complete. A missing process is not an error: it just means
 * there is nobody to ask yet.
 */
export async function completeAt(
  ctx: InteractiveContext,
  buffer: BufferPort,
  position: Position,
): Promise<Outcome<CompletionResult | undefined>> {
  if (!ctx.process.isRunning()) return done(undefined);

  const prefix = prefixAt(buffer, position);
  if (prefix.length === 0) return done(undefined);

  const res = await ctx.eval.callSync(command("repl-completions", prefix));
  if (!isDone(res)) return res;
  const completions = decodeCompletions(res.value);
  if (!isDone(completions)) return completions;
  if (completions.value.candidates.length === 0) return done(undefined);

  return done({
    start: { line: position.line, column: position.column - prefix.length },
    end: position,
    candidates: completions.value.candidates,
  });
}
