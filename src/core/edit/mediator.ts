// src/core/edit/mediator.ts
// Text-edit mediator: how compiler text lands in a buffer

import type { BufferPort, Position, TemplatePort } from "../../ports";
import { templatize } from "./template";

export interface EditMediator {
  readonly kind: "plain" | "template";
  apply(buffer: BufferPort, start: Position, end: Position, text: string): void;
}

/** Inserts compiler text verbatim. */
export class PlainMediator implements EditMediator {
  readonly kind = "plain";

  apply(buffer: BufferPort, start: Position, end: Position, text: string): void {
    buffer.replaceRange(start, end, text);
  }
}

/** Hands compiler text to a template expander with every hole turned into a field. */
export class TemplateMediator implements EditMediator {
  readonly kind = "template";

  constructor(private readonly templates: TemplatePort) {}

  apply(buffer: BufferPort, start: Position, end: Position, text: string): void {
    this.templates.expand(buffer, start, end, templatize(text).template);
  }
}

export function createMediator(options: { templates: boolean }, templatePort?: TemplatePort): EditMediator {
  if (options.templates && templatePort) return new TemplateMediator(templatePort);
  return new PlainMediator();
}
