export type DiagnosticSeverity = "error" | "warning" | "info" | "hint";

/** 1-based line, 0-based column. */
export interface SourcePoint {
  line: number;
  column: number;
}

export interface SourceRange {
  file: string;
  start: SourcePoint;
  end: SourcePoint;
}

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  range?: SourceRange;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}

export function infoDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "info", ...opts };
}
