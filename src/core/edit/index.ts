export { type EditMediator, PlainMediator, TemplateMediator, createMediator } from "./mediator";
export { type Templated, type TemplateField, templatize, escapeTemplateText } from "./template";
export { type LineSpan, lineContentSpan, endOfLine, stripTrailingNewline, findHole, holeSpanBefore } from "./lines";
