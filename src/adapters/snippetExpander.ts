import type { BufferPort, Position, TemplatePort } from "../ports";

export interface ExpandedField {
  index: number;
  /** Offset of the field's text within the expanded string. */
  offset: number;
  text: string;
}

export interface Expansion {
  text: string;
  fields: ExpandedField[];
}

/**
 * Read `${n:default}` template syntax back into plain text, remembering where
 * each field landed. Backslash escapes the next character.
 */
export function expandTemplate(template: string): Expansion {
  const fields: ExpandedField[] = [];
  let text = "";
  let i = 0;

  while (i < template.length) {
    const c = template.charAt(i);
    if (c === "\\" && i + 1 < template.length) {
      text += template.charAt(i + 1);
      i += 2;
      continue;
    }
    const field = /^\$\{(\d+):([^}]*)\}/.exec(template.slice(i));
    if (c === "$" && field) {
      const [whole, index = "0", defaultText = ""] = field;
      fields.push({ index: parseInt(index, 10), offset: text.length, text: defaultText });
      text += defaultText;
      i += whole.length;
      continue;
    }
    text += c;
    i++;
  }

  return { text, fields };
}

/**
 * Template port for hosts without a snippet engine: fields collapse to their
 * defaults and are kept for whoever wants to walk them.
 */
export class SnippetExpander implements TemplatePort {
  private last: Expansion | undefined;

  /** Fields of the most recent expansion, in index order. */
  get lastFields(): ExpandedField[] {
    return [...(this.last?.fields ?? [])].sort((a, b) => a.index - b.index);
  }

  expand(buffer: BufferPort, start: Position, end: Position, template: string): void {
    this.last = expandTemplate(template);
    buffer.replaceRange(start, end, this.last.text);
  }
}
