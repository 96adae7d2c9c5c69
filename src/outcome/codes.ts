import type { Diagnostic, DiagnosticSeverity, SourceRange } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0100: { code: "E0100", severity: "error", category: "Process", template: "Compiler process is not running" },
  E0101: { code: "E0101", severity: "error", category: "Process", template: "Compiler process unavailable: {detail}" },

  E0200: { code: "E0200", severity: "error", category: "Editor", template: "No identifier at point" },
  E0201: { code: "E0201", severity: "error", category: "Editor", template: "Metavariable ?{name} is no longer on line {line}" },

  E0300: { code: "E0300", severity: "error", category: "Compiler", template: "Could not load {file}" },
  E0301: { code: "E0301", severity: "error", category: "Compiler", template: "{command} failed: {detail}" },

  E0400: { code: "E0400", severity: "error", category: "Protocol", template: "Malformed message: {detail}" },
  E0401: { code: "E0401", severity: "error", category: "Protocol", template: "No reply to {command} after {ms}ms" },

  E0500: { code: "E0500", severity: "error", category: "Interaction", template: "Selection dismissed" },
  E0501: { code: "E0501", severity: "error", category: "Interaction", template: "Synchronous {command} issued from an asynchronous continuation" },

  W0001: { code: "W0001", severity: "warning", category: "Compiler", template: "{detail}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  range?: SourceRange
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    range,
    data: params,
  };
}
