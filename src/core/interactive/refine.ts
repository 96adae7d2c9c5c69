// src/core/interactive/refine.ts
// Metavariable refinement: Start -> AwaitingChoice -> Done, with an unbounded number of rounds

import type { InteractiveContext } from "./context";
import { prepareAtPoint } from "./context";
import { command, type Command } from "../protocol/command";
import { decodeDisambiguation, decodeIdentifiers, decodeText, type DisambiguationStep } from "../protocol/reply";
import { findHole } from "../edit";
import type { BufferPort } from "../../ports";
import type { Outcome } from "../../outcome";
import { callFailed, done, isDone, metavariableVanished, userCancelled } from "../../outcome";

/**
 * plain: pick an identifier, the compiler builds the expression.
 * complete: as plain, with a fuller candidate list.
 * recursive: each pick may open another round of choices.
 */
export type RefineVariant = "plain" | "complete" | "recursive";

export type RefineState =
  | { state: "Start" }
  | { state: "AwaitingChoice"; choices: string[] }
  | { state: "Done"; expression: string };

export interface RefineResult {
  hole: string;
  line: number;
  expression: string;
  /** Requests sent for the refinement itself, loads excluded. */
  rounds: number;
}

const START_COMMAND = {
  plain: "compatible-identifiers",
  complete: "complete-compatible-identifiers",
  recursive: "compatible-identifiers-recursive",
} as const;

function stepToState(step: DisambiguationStep): RefineState {
  return step.tag === "Final"
    ? { state: "Done", expression: step.expression }
    : { state: "AwaitingChoice", choices: step.choices };
}

export async function refineMetavariable(
  ctx: InteractiveContext,
  buffer: BufferPort,
  variant: RefineVariant = "plain",
): Promise<Outcome<RefineResult>> {
  const target = await prepareAtPoint(ctx, buffer);
  if (!isDone(target)) return target;
  const { name: hole, line } = target.value;

  let state: RefineState = { state: "Start" };
  let rounds = 0;

  const ask = async (cmd: Command) => {
    rounds++;
    return ctx.eval.callSync(cmd);
  };

  while (state.state !== "Done") {
    if (state.state === "Start") {
      const res = await ask(command(START_COMMAND[variant], line, hole));
      if (!isDone(res)) return res;

      if (variant === "recursive") {
        const step = decodeDisambiguation(res.value);
        if (!isDone(step)) return step;
        state = stepToState(step.value);
      } else {
        const names = decodeIdentifiers(res.value);
        if (!isDone(names)) return names;
        state = { state: "AwaitingChoice", choices: names.value };
      }
      continue;
    }

    if (state.choices.length === 0) {
      return callFailed(START_COMMAND[variant], `No compatible identifiers for ?${hole}`);
    }
    const choice = await ctx.presentation.offerChoices(`Refine ?${hole}`, state.choices);
    if (choice === undefined) return userCancelled();

    if (variant === "recursive") {
      const res = await ask(command("choose-identifier", line, hole, choice));
      if (!isDone(res)) return res;
      const step = decodeDisambiguation(res.value);
      if (!isDone(step)) return step;
      state = stepToState(step.value);
    } else {
      const res = await ask(command("make-refined-expression", line, hole, choice));
      if (!isDone(res)) return res;
      const text = decodeText(res.value);
      if (!isDone(text)) return text;
      state = { state: "Done", expression: text.value.text };
    }
  }

  // The user may have edited the line while choosing.
  const span = line <= buffer.lineCount() ? findHole(buffer.lineText(line), hole) : undefined;
  if (!span) return metavariableVanished(hole, line);

  buffer.replaceRange({ line, column: span.start }, { line, column: span.end }, state.expression);

  const reloaded = await ctx.session.loadIfNeeded(buffer, "sync");
  if (!isDone(reloaded)) return reloaded;
  return done({ hole, line, expression: state.expression, rounds });
}
