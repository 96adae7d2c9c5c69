// src/core/protocol/command.ts
// Outgoing commands: one tag, fixed-arity arguments, encoded as ((:tag args...) id)

import { type Sexp, kw, list, num, str } from "../sexp";

/** Argument tuple per command tag. */
export type CommandSpec = {
  "load-file": [file: string];
  interpret: [code: string];
  "type-of": [name: string];
  "docs-for": [name: string];
  "case-split": [line: number, name: string];
  "add-clause": [line: number, name: string];
  "add-proof-clause": [line: number, name: string];
  "add-missing": [line: number, name: string];
  "make-with": [line: number, name: string];
  "proof-search": [line: number, name: string, hints: string[]];
  "repl-completions": [prefix: string];
  "compatible-identifiers": [line: number, name: string];
  "complete-compatible-identifiers": [line: number, name: string];
  "compatible-identifiers-recursive": [line: number, name: string];
  "choose-identifier": [line: number, name: string, choice: string];
  "make-refined-expression": [line: number, name: string, choice: string];
};

export type CommandTag = keyof CommandSpec;

export type CommandOf<K extends CommandTag> = {
  readonly tag: K;
  readonly args: Readonly<CommandSpec[K]>;
};

export type Command = { [K in CommandTag]: CommandOf<K> }[CommandTag];

export function command<K extends CommandTag>(tag: K, ...args: CommandSpec[K]): CommandOf<K> {
  return Object.freeze({ tag, args: Object.freeze(args) });
}

type Arg = string | number | readonly string[];

function argToSexp(arg: Arg): Sexp {
  if (typeof arg === "number") return num(arg);
  if (typeof arg === "string") return str(arg);
  return list(arg.map(str));
}

export function encodeCommand(cmd: Command, id: number): Sexp {
  const args: readonly Arg[] = cmd.args;
  return list([list([kw(cmd.tag), ...args.map(argToSexp)]), num(id)]);
}

export function describeCommand(cmd: Command): string {
  const args: readonly Arg[] = cmd.args;
  const shown = args.map((a) => (Array.isArray(a) ? `[${a.join(" ")}]` : String(a)));
  return [cmd.tag, ...shown].join(" ");
}
