export { type InteractiveContext, prepareAtPoint } from "./context";
export {
  type EditResult,
  typeOf,
  docsFor,
  interpret,
  caseSplit,
  addClause,
  addProofClause,
  addMissing,
  makeWith,
  proofSearch,
  parseHints,
} from "./pointCommands";
export { type RefineVariant, type RefineState, type RefineResult, refineMetavariable } from "./refine";
export { type CompletionResult, completeAt, prefixAt } from "./completion";
