// src/core/protocol/reply.ts
// Incoming messages: call returns, notifications, and typed decoders for :ok payloads

import { type Sexp, bindSexp, parseSexp, sexpToString } from "../sexp";
import type { Outcome } from "../../outcome";
import { done, protocolError } from "../../outcome";
import type { SourceRange } from "../../outcome";

/** The `:ok` payload of a return: its value plus trailing extras such as highlighting. */
export interface ReturnValue {
  value: Sexp;
  extras: Sexp[];
}

export interface Highlight {
  start: number;
  length: number;
  properties: Record<string, string>;
}

export interface CompilerWarning {
  range: SourceRange;
  message: string;
}

export type IncomingMessage =
  | { tag: "ReturnOk"; id: number; reply: ReturnValue }
  | { tag: "ReturnError"; id: number; message: string; extras: Sexp[] }
  | { tag: "WriteString"; id: number; text: string }
  | { tag: "Output"; id: number; payload: Sexp }
  | { tag: "Warning"; id: number; warning: CompilerWarning }
  | { tag: "SetPrompt"; id: number; prompt: string }
  | { tag: "ProtocolVersion"; major: number; minor: number }
  | { tag: "Unknown"; kind: string; raw: Sexp };

export type Notification = Exclude<IncomingMessage, { tag: "ReturnOk" } | { tag: "ReturnError" }>;

const RETURN_OK = parseSexp("(:return (:ok ?value &rest ?extras) ?id)");
const RETURN_ERROR = parseSexp("(:return (:error ?message &rest ?extras) ?id)");
const WRITE_STRING = parseSexp("(:write-string ?text ?id)");
const OUTPUT = parseSexp("(:output ?payload ?id)");
const WARNING = parseSexp("(:warning (?file (?l1 ?c1) (?l2 ?c2) ?message &rest _) ?id)");
const SET_PROMPT = parseSexp("(:set-prompt ?prompt ?id)");
const PROTOCOL_VERSION = parseSexp("(:protocol-version ?major ?minor)");

function asNum(x: Sexp | undefined): number | undefined {
  return x?.tag === "Num" ? x.n : undefined;
}

function asStr(x: Sexp | undefined): string | undefined {
  return x?.tag === "Str" ? x.s : undefined;
}

function asItems(x: Sexp | undefined): Sexp[] {
  return x?.tag === "List" ? x.items : [];
}

export function decodeMessage(raw: Sexp): Outcome<IncomingMessage> {
  let b = bindSexp(RETURN_OK, raw);
  if (b) {
    const id = asNum(b.get("id"));
    const value = b.get("value");
    if (id !== undefined && value) {
      return done({ tag: "ReturnOk", id, reply: { value, extras: asItems(b.get("extras")) } });
    }
  }

  b = bindSexp(RETURN_ERROR, raw);
  if (b) {
    const id = asNum(b.get("id"));
    const message = b.get("message");
    if (id !== undefined && message) {
      const text = asStr(message) ?? sexpToString(message);
      return done({ tag: "ReturnError", id, message: text, extras: asItems(b.get("extras")) });
    }
  }

  b = bindSexp(WRITE_STRING, raw);
  if (b) {
    const id = asNum(b.get("id"));
    const text = asStr(b.get("text"));
    if (id !== undefined && text !== undefined) return done({ tag: "WriteString", id, text });
  }

  b = bindSexp(OUTPUT, raw);
  if (b) {
    const id = asNum(b.get("id"));
    const payload = b.get("payload");
    if (id !== undefined && payload) return done({ tag: "Output", id, payload });
  }

  b = bindSexp(WARNING, raw);
  if (b) {
    const id = asNum(b.get("id"));
    const file = asStr(b.get("file"));
    const message = asStr(b.get("message"));
    const l1 = asNum(b.get("l1")), c1 = asNum(b.get("c1"));
    const l2 = asNum(b.get("l2")), c2 = asNum(b.get("c2"));
    if (id !== undefined && file !== undefined && message !== undefined &&
        l1 !== undefined && c1 !== undefined && l2 !== undefined && c2 !== undefined) {
      // Compiler columns are 1-based.
      const range: SourceRange = {
        file,
        start: { line: l1, column: Math.max(0, c1 - 1) },
        end: { line: l2, column: Math.max(0, c2 - 1) },
      };
      return done({ tag: "Warning", id, warning: { range, message } });
    }
  }

  b = bindSexp(SET_PROMPT, raw);
  if (b) {
    const id = asNum(b.get("id"));
    const prompt = asStr(b.get("prompt"));
    if (id !== undefined && prompt !== undefined) return done({ tag: "SetPrompt", id, prompt });
  }

  b = bindSexp(PROTOCOL_VERSION, raw);
  if (b) {
    const major = asNum(b.get("major"));
    const minor = asNum(b.get("minor"));
    if (major !== undefined && minor !== undefined) return done({ tag: "ProtocolVersion", major, minor });
  }

  const head = raw.tag === "List" ? raw.items[0] : undefined;
  if (head?.tag === "Kw") {
    const kind = head.name;
    if (kind === "return") return protocolError(`unrecognised return shape ${sexpToString(raw)}`);
    return done({ tag: "Unknown", kind, raw });
  }
  return protocolError(`expected a tagged list, got ${sexpToString(raw)}`);
}

// ----- Payload decoders -----

export interface Text {
  text: string;
  highlights: Highlight[];
}

export interface Completions {
  candidates: string[];
  prefix: string;
}

export type DisambiguationStep =
  | { tag: "MoreChoices"; choices: string[] }
  | { tag: "Final"; expression: string };

const HIGHLIGHT = parseSexp("(?start ?length ?props)");
const COMPLETIONS = parseSexp("(?candidates ?prefix)");
const MORE_CHOICES = parseSexp("(:more-choices ?choices)");
const FINAL = parseSexp("(:final ?expression)");

function propertyValue(x: Sexp): string {
  switch (x.tag) {
    case "Kw":
    case "Sym":
      return x.name;
    case "Str":
      return x.s;
    default:
      return sexpToString(x);
  }
}

export function decodeHighlights(x: Sexp | undefined): Highlight[] {
  const out: Highlight[] = [];
  for (const item of asItems(x)) {
    const b = bindSexp(HIGHLIGHT, item);
    const start = asNum(b?.get("start"));
    const length = asNum(b?.get("length"));
    if (!b || start === undefined || length === undefined) continue;

    const properties: Record<string, string> = {};
    for (const prop of asItems(b.get("props"))) {
      const [key, value] = asItems(prop);
      if (key?.tag === "Kw" && value) properties[key.name] = propertyValue(value);
    }
    out.push({ start, length, properties });
  }
  return out;
}

export function decodeText(reply: ReturnValue): Outcome<Text> {
  const text = asStr(reply.value);
  if (text === undefined) return protocolError(`expected text, got ${sexpToString(reply.value)}`);
  return done({ text, highlights: decodeHighlights(reply.extras[0]) });
}

function stringList(x: Sexp): string[] | undefined {
  if (x.tag !== "List") return undefined;
  const out: string[] = [];
  for (const item of x.items) {
    const s = asStr(item);
    if (s === undefined) return undefined;
    out.push(s);
  }
  return out;
}

export function decodeIdentifiers(reply: ReturnValue): Outcome<string[]> {
  const names = stringList(reply.value);
  if (!names) return protocolError(`expected identifier list, got ${sexpToString(reply.value)}`);
  return done(names);
}

export function decodeCompletions(reply: ReturnValue): Outcome<Completions> {
  const b = bindSexp(COMPLETIONS, reply.value);
  const listed = b?.get("candidates");
  const candidates = listed ? stringList(listed) : undefined;
  const prefix = asStr(b?.get("prefix"));
  if (!candidates || prefix === undefined) {
    return protocolError(`expected completions, got ${sexpToString(reply.value)}`);
  }
  return done({ candidates, prefix });
}

export function decodeDisambiguation(reply: ReturnValue): Outcome<DisambiguationStep> {
  const listed = bindSexp(MORE_CHOICES, reply.value)?.get("choices");
  const choices = listed ? stringList(listed) : undefined;
  if (choices) return done({ tag: "MoreChoices", choices });

  const expression = asStr(bindSexp(FINAL, reply.value)?.get("expression"));
  if (expression !== undefined) return done({ tag: "Final", expression });

  return protocolError(`expected :more-choices or :final, got ${sexpToString(reply.value)}`);
}
