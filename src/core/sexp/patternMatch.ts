// src/core/sexp/patternMatch.ts
// Pattern matcher over reply shapes: `_` wildcard, `?x` binders, trailing `&rest ?xs`

import type { Sexp } from "./sexp";
import { sexpEq, sexpToString } from "./sexp";

export type Bindings = Map<string, Sexp>;

export type MatchResult =
  | { ok: true; bindings: Bindings }
  | { ok: false; reason: string };

export function matchSexp(pattern: Sexp, value: Sexp): MatchResult {
  return match(pattern, value, new Map<string, Sexp>());
}

/** Match and return the bindings, or undefined when the shape does not fit. */
export function bindSexp(pattern: Sexp, value: Sexp): Bindings | undefined {
  const r = matchSexp(pattern, value);
  return r.ok ? r.bindings : undefined;
}

function match(p: Sexp, v: Sexp, b: Bindings): MatchResult {
  if (p.tag === "Sym" && p.name === "_") return { ok: true, bindings: b };

  if (p.tag === "Sym" && p.name.startsWith("?") && p.name.length > 1) {
    return bindVar(p.name.slice(1), v, b);
  }

  if (p.tag === "List") {
    if (v.tag !== "List") return fail(`expected list, got ${v.tag}`);
    return matchList(p.items, v.items, b);
  }

  if (!sexpEq(p, v)) return fail(`literal mismatch: ${sexpToString(p)} != ${sexpToString(v)}`);
  return { ok: true, bindings: b };
}

function matchList(pats: Sexp[], vals: Sexp[], b: Bindings): MatchResult {
  for (let i = 0; i < pats.length; i++) {
    const p = pats[i]!;
    if (p.tag === "Sym" && p.name === "&rest") {
      const binder = pats[i + 1];
      if (!binder || i + 2 !== pats.length) return fail("&rest must be followed by exactly one pattern");
      return match(binder, { tag: "List", items: vals.slice(i) }, b);
    }
    const v = vals[i];
    if (!v) return fail("value list ended early");
    const r = match(p, v, b);
    if (!r.ok) return r;
  }
  if (vals.length !== pats.length) return fail("pattern ended early");
  return { ok: true, bindings: b };
}

function bindVar(name: string, v: Sexp, b: Bindings): MatchResult {
  const existing = b.get(name);
  if (existing && !sexpEq(existing, v)) return fail(`var ?${name} mismatch`);
  b.set(name, v);
  return { ok: true, bindings: b };
}

function fail(reason: string): MatchResult {
  return { ok: false, reason };
}
