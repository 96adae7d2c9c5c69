// src/index.ts
// idris-ide-client - Public API
//
// Drive a compiler's IDE mode from an editor: sessions, commands, edits.

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

export { IdeClient, type IdeClientDeps, type IdeClientOptions } from "./client";

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION & DISPATCH
// ═══════════════════════════════════════════════════════════════════════════════

export { Session, type SessionDeps, type LoadMode, type LoadContinuation } from "./core/session";
export { Dispatcher, type DispatcherOptions, type NotificationListener } from "./core/dispatch";

// ═══════════════════════════════════════════════════════════════════════════════
// PROTOCOL
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/protocol";
export { type Sexp, parseSexp, sexpToString } from "./core/sexp";

// ═══════════════════════════════════════════════════════════════════════════════
// INTERACTIVE COMMANDS & EDITING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/interactive";
export { type EditMediator, PlainMediator, TemplateMediator, createMediator, templatize } from "./core/edit";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS, OUTCOMES, CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./ports";
export * from "./outcome";
export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// TERMINAL HOST ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./adapters";
