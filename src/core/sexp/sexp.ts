// src/core/sexp/sexp.ts
// S-expression model, parser, printer, and structural equality for the IDE wire format

export type Sexp =
  | { tag: "Sym"; name: string }
  | { tag: "Kw"; name: string }
  | { tag: "Num"; n: number }
  | { tag: "Str"; s: string }
  | { tag: "Bool"; b: boolean }
  | { tag: "List"; items: Sexp[] };

export function sym(name: string): Sexp { return { tag: "Sym", name }; }
/** Keyword atom; `kw("ok")` prints as `:ok`. */
export function kw(name: string): Sexp { return { tag: "Kw", name }; }
export function num(n: number): Sexp { return { tag: "Num", n }; }
export function str(s: string): Sexp { return { tag: "Str", s }; }
export function bool(b: boolean): Sexp { return { tag: "Bool", b }; }
export function list(items: Sexp[]): Sexp { return { tag: "List", items }; }

export function isKw(x: Sexp | undefined, name?: string): x is { tag: "Kw"; name: string } {
  return x?.tag === "Kw" && (name === undefined || x.name === name);
}

export function sexpEq(a: Sexp, b: Sexp): boolean {
  switch (a.tag) {
    case "Sym": return b.tag === "Sym" && a.name === b.name;
    case "Kw": return b.tag === "Kw" && a.name === b.name;
    case "Num": return b.tag === "Num" && a.n === b.n;
    case "Str": return b.tag === "Str" && a.s === b.s;
    case "Bool": return b.tag === "Bool" && a.b === b.b;
    case "List": {
      if (b.tag !== "List") return false;
      const aa = a.items, bb = b.items;
      if (aa.length !== bb.length) return false;
      for (let i = 0; i < aa.length; i++) if (!sexpEq(aa[i]!, bb[i]!)) return false;
      return true;
    }
  }
}

export function sexpToString(x: Sexp): string {
  switch (x.tag) {
    case "Sym": return x.name;
    case "Kw": return `:${x.name}`;
    case "Num": return Number.isFinite(x.n) ? String(x.n) : "nan";
    case "Str": return `"${escapeString(x.s)}"`;
    case "Bool": return x.b ? ":True" : ":False";
    case "List": return `(${x.items.map(sexpToString).join(" ")})`;
  }
}

function escapeString(s: string): string {
  return s.replace(/\\/g, "\\\\").replace(/"/g, "\\\"");
}

// ----- Parser -----

type Tok =
  | { tag: "LP" }
  | { tag: "RP" }
  | { tag: "STR"; s: string }
  | { tag: "ATOM"; s: string };

export function parseSexp(src: string): Sexp {
  const toks = tokenize(src);
  let i = 0;

  function peek(): Tok | undefined { return toks[i]; }
  function take(): Tok {
    const t = toks[i];
    if (!t) throw new Error("unexpected EOF");
    i++;
    return t;
  }

  function parseOne(): Sexp {
    const t = take();
    if (t.tag === "LP") {
      const items: Sexp[] = [];
      while (true) {
        const p = peek();
        if (!p) throw new Error("unterminated list");
        if (p.tag === "RP") { take(); break; }
        items.push(parseOne());
      }
      return list(items);
    }
    if (t.tag === "RP") throw new Error("unexpected ')'");
    if (t.tag === "STR") return str(t.s);

    // ATOM
    return atomToSexp(t.s);
  }

  const out = parseOne();
  if (i !== toks.length) throw new Error("trailing tokens after first expression");
  return out;
}

function atomToSexp(a: string): Sexp {
  if (a === ":True") return bool(true);
  if (a === ":False") return bool(false);
  if (a === "nil") return list([]);

  if (/^[+-]?\d+(\.\d+)?$/.test(a)) return num(Number(a));

  if (a.startsWith(":") && a.length > 1) return kw(a.slice(1));
  return sym(a);
}

function tokenize(src: string): Tok[] {
  const out: Tok[] = [];
  let i = 0;

  function isWS(c: string) { return c === " " || c === "\t" || c === "\n" || c === "\r"; }

  while (i < src.length) {
    const c = src[i]!;
    if (isWS(c)) { i++; continue; }

    if (c === "(") { out.push({ tag: "LP" }); i++; continue; }
    if (c === ")") { out.push({ tag: "RP" }); i++; continue; }

    // String
    if (c === "\"") {
      i++;
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src[i]!;
        if (d === "\"") { i++; closed = true; break; }
        if (d === "\\") {
          i++;
          if (i >= src.length) throw new Error("unterminated escape");
          const e = src[i]!;
          if (e === "n") s += "\n";
          else if (e === "t") s += "\t";
          else if (e === "r") s += "\r";
          else s += e;
          i++;
          continue;
        }
        s += d;
        i++;
      }
      if (!closed) throw new Error("unterminated string");
      out.push({ tag: "STR", s });
      continue;
    }

    // Atom
    let a = "";
    while (i < src.length) {
      const d = src[i]!;
      if (isWS(d) || d === "(" || d === ")" || d === "\"") break;
      a += d;
      i++;
    }
    if (a.length === 0) throw new Error("lexer error");
    out.push({ tag: "ATOM", s: a });
  }

  return out;
}
