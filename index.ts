export { DecoderTable } from "./DecoderTable";
export type { DecoderEnvironment } from "./DecoderEnvironment";

export * from "./pattern/types";
export * from "./pattern/errors";
export {
  parsePattern,
  isOpcodeWidth,
  fixedMask,
  fixedValue,
  wildcardMask,
  variableNames,
} from "./pattern/parse";
export { resolveBindings, bindingDomain, applyBinding } from "./pattern/bindings";
export { deriveMaskValue, expandRule } from "./pattern/expand";
export type { MaskValue } from "./pattern/expand";
export { resolvePriority, coverage, intersects, subsumes } from "./pattern/priority";
export { compileRules, DEFAULT_COMPILE_OPTIONS } from "./pattern/compile";
export type { CompileOptions } from "./pattern/compile";
export { createDispatcher, emitSource, renderScalar } from "./pattern/emit";
export type {
  Dispatcher,
  DispatcherOptions,
  DispatchStrategy,
  EmitOptions,
  Handler,
  HandlerMap,
  Opcode,
} from "./pattern/emit";

export { parseTable } from "./dsl/parse";
export type { TableAst, TableHeader } from "./dsl/parse";
export { resolveTable } from "./dsl/resolve";
export type { TableDecl } from "./dsl/resolve";
