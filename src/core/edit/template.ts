// src/core/edit/template.ts
// Turn residual holes in compiler output into numbered template fields

const PLACEHOLDER = /\?([A-Za-z_][A-Za-z0-9_']*)|\(_\)/g;

export interface TemplateField {
  index: number;
  defaultText: string;
}

export interface Templated {
  template: string;
  fields: TemplateField[];
}

/** Characters that mean something in template syntax get a backslash. */
export function escapeTemplateText(text: string): string {
  return text.replace(/[\\$}]/g, (c) => `\\${c}`);
}

/**
 * `?name` becomes `${n:name}` and `(_)` becomes `${n:_}`; every occurrence gets
 * its own field, numbered from 1 in order of appearance.
 */
export function templatize(text: string): Templated {
  const fields: TemplateField[] = [];
  let template = "";
  let last = 0;

  for (const m of text.matchAll(PLACEHOLDER)) {
    const at = m.index ?? 0;
    template += escapeTemplateText(text.slice(last, at));
    const defaultText = m[1] ?? "_";
    const index = fields.length + 1;
    fields.push({ index, defaultText });
    template += `\${${index}:${defaultText}}`;
    last = at + m[0].length;
  }
  template += escapeTemplateText(text.slice(last));

  return { template, fields };
}
