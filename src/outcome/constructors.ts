import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";
import type { Diagnostic } from "./diagnostic";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function processUnavailable(detail?: string, meta: OutcomeMeta = {}): Fail {
  const diagnostic = detail === undefined
    ? makeDiagnostic("E0100")
    : makeDiagnostic("E0101", { detail });
  return fail(
    failure("process-unavailable", diagnostic.message, {
      diagnostics: [diagnostic],
      recoverable: true,
    }),
    meta
  );
}

export function noTargetAtPoint(meta: OutcomeMeta = {}): Fail {
  const diagnostic = makeDiagnostic("E0200");
  return fail(failure("no-target-at-point", diagnostic.message, { diagnostics: [diagnostic] }), meta);
}

export function metavariableVanished(name: string, line: number, meta: OutcomeMeta = {}): Fail {
  const diagnostic = makeDiagnostic("E0201", { name, line });
  return fail(
    failure("metavariable-vanished", diagnostic.message, {
      diagnostics: [diagnostic],
      context: { name, line },
    }),
    meta
  );
}

export function loadFailed(file: string, detail: string, diagnostics: Diagnostic[] = [], meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("load-failed", detail, {
      diagnostics: [makeDiagnostic("E0300", { file }), ...diagnostics],
      context: { file },
      recoverable: true,
    }),
    meta
  );
}

/** The compiler's own message is kept verbatim as the failure message. */
export function callFailed(command: string, detail: string, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("call-failed", detail, {
      diagnostics: [makeDiagnostic("E0301", { command, detail })],
      context: { command },
      recoverable: true,
    }),
    meta
  );
}

export function protocolError(detail: string, meta: OutcomeMeta = {}): Fail {
  const diagnostic = makeDiagnostic("E0400", { detail });
  return fail(failure("protocol-error", diagnostic.message, { diagnostics: [diagnostic] }), meta);
}

export function timeout(command: string, ms: number, meta: OutcomeMeta = {}): Fail {
  const diagnostic = makeDiagnostic("E0401", { command, ms });
  return fail(
    failure("timeout", diagnostic.message, {
      diagnostics: [diagnostic],
      recoverable: true,
    }),
    meta
  );
}

export function userCancelled(meta: OutcomeMeta = {}): Fail {
  const diagnostic = makeDiagnostic("E0500");
  return fail(failure("user-cancelled", diagnostic.message, { diagnostics: [diagnostic], recoverable: true }), meta);
}

export function syncFromContinuation(command: string, meta: OutcomeMeta = {}): Fail {
  const diagnostic = makeDiagnostic("E0501", { command });
  return fail(failure("precondition-failed", diagnostic.message, { diagnostics: [diagnostic] }), meta);
}
