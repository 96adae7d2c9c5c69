export { ProcessTransport, type ProcessTransportOptions } from "./processTransport";
export { TextBuffer, type TextBufferOptions } from "./textBuffer";
export { ConsolePresentation, type ConsolePresentationOptions, pickChoice } from "./consolePresentation";
export { SnippetExpander, expandTemplate, type Expansion, type ExpandedField } from "./snippetExpander";
export { DiagnosticsStore } from "./diagnosticsStore";
export { consoleTraceSink, teeTrace, loggingConnection } from "./logging";
