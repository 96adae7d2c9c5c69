import type { BufferPort, Position } from "./buffer";

/**
 * Template expansion port.
 * `template` uses `${n:default}` fields; literal `$`, `\` and `}` arrive escaped with `\`.
 */
export interface TemplatePort {
  expand(buffer: BufferPort, start: Position, end: Position, template: string): void;
}
