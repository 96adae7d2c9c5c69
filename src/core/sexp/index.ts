// src/core/sexp/index.ts
// S-expression utilities

export {
  type Sexp,
  sym,
  kw,
  num,
  str,
  bool,
  list,
  isKw,
  sexpEq,
  sexpToString,
  parseSexp,
} from "./sexp";

export {
  type Bindings,
  type MatchResult,
  matchSexp,
  bindSexp,
} from "./patternMatch";
