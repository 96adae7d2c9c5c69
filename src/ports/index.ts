export * from "./types";
export * from "./transport";
export * from "./eval";
export * from "./buffer";
export * from "./presentation";
export * from "./template";
export * from "./diagnostics";
