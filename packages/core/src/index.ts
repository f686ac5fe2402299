export { createCompletion, initiate } from "./completion.js";
export type { AsyncCompletion, InitiateResult } from "./completion.js";
export { resolveCompletion, resolveToken } from "./resolver.js";
export type {
  CompletionHandlerType,
  CompletionOwnership,
  CompletionResolution,
  CompletionReturnType,
  CompletionTokenFor,
  HandlerOwnership,
  HandlerSlot,
  NoResolutionStrategy,
  ResolveCompletion,
  SignatureMismatch,
  UntypedResolution,
} from "./resolver.js";
export {
  completionStrategy,
  defineStrategy,
  isStrategyToken,
  strategyToken,
} from "./registry.js";
export type {
  CompletionHandlerMap,
  CompletionResultMap,
  CompletionStrategy,
  CompletionStrategyTag,
  ResultCarrier,
  StrategyHandler,
  StrategyResult,
  StrategyToken,
} from "./registry.js";
export {
  defineSignature,
  formatSignature,
  isCompletionSignature,
  isFailure,
  splitErrorFirst,
  valueFromArgs,
} from "./signature.js";
export type {
  CompletionHandler,
  CompletionSignature,
  ErrorFirstArgs,
  ErrorFirstValue,
  IsCompletionHandler,
  Signature,
  SignatureOptions,
  SignatureValue,
} from "./signature.js";
export {
  CompletionError,
  completionDiagnostic,
  completionError,
  createDiagnostic,
  diagnosticCodes,
  diagnosticFromCode,
  formatDiagnostic,
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  isCompletionError,
} from "./diagnostics/index.js";
export type {
  AnyCompletionDiagnostic,
  CompletionDiagnostic,
  Diagnostic,
  DiagnosticCode,
  DiagnosticHint,
  DiagnosticParams,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./diagnostics/index.js";
export {
  configureCompletionTrace,
  isCompletionTraceEnabled,
  traceCompletion,
} from "./trace.js";
export type {
  CompletionTraceOptions,
  CompletionTraceScope,
  CompletionTraceSink,
} from "./trace.js";
