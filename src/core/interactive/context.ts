// src/core/interactive/context.ts
// What an interactive command needs, and the shared prologue of point-scoped commands

import type { Session } from "../session";
import type { EditMediator } from "../edit";
import type { BufferPort, EvalPort, IdentifierAtPoint, PresentationPort, ProcessPort } from "../../ports";
import type { Outcome } from "../../outcome";
import { done, isDone, noTargetAtPoint } from "../../outcome";

export interface InteractiveContext {
  session: Session;
  eval: EvalPort;
  process: ProcessPort;
  presentation: PresentationPort;
  mediator: EditMediator;
}

/**
 * Resolve the identifier at point, then make sure the compiler holds the current text.
 * Nothing is sent when there is no identifier.
 */
export async function prepareAtPoint(ctx: InteractiveContext, buffer: BufferPort): Promise<Outcome<IdentifierAtPoint>> {
  const target = buffer.cursorIdentifierAndLine();
  if (!target) return noTargetAtPoint();

  const loaded = await ctx.session.loadIfNeeded(buffer, "sync");
  if (!isDone(loaded)) return loaded;
  return done(target);
}
