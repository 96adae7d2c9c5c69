// src/core/protocol/index.ts
// Wire protocol: commands out, messages in, length-prefixed frames between

export {
  type CommandSpec,
  type CommandTag,
  type CommandOf,
  type Command,
  command,
  encodeCommand,
  describeCommand,
} from "./command";
export { frame, FrameDecoder } from "./framing";
export {
  type ReturnValue,
  type Highlight,
  type CompilerWarning,
  type IncomingMessage,
  type Notification,
  type Text,
  type Completions,
  type DisambiguationStep,
  decodeMessage,
  decodeHighlights,
  decodeText,
  decodeIdentifiers,
  decodeCompletions,
  decodeDisambiguation,
} from "./reply";
