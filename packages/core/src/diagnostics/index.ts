export * from "./types.js";
export * from "./registry.js";

import type {
  Diagnostic,
  DiagnosticHint,
  DiagnosticInput,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

export const createDiagnostic = ({
  severity,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
});

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>
): Diagnostic => {
  const definition = getDiagnosticDefinition(options.code);
  return createDiagnostic({
    code: options.code,
    message: formatDiagnosticMessage(options.code, options.params),
    severity: options.severity ?? definition.severity,
    phase: options.phase ?? definition.phase,
    hints: options.hints ?? definition.hints,
  });
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const severity = diagnostic.severity.toUpperCase();
  const phase = diagnostic.phase ? `[${diagnostic.phase}] ` : "";
  return `${severity} ${phase}${diagnostic.code}: ${diagnostic.message}`;
};

export class CompletionError extends Error {
  readonly diagnostic: Diagnostic;
  readonly reason?: unknown;

  constructor(diagnostic: Diagnostic, reason?: unknown) {
    super(formatDiagnostic(diagnostic));
    this.name = "CompletionError";
    this.diagnostic = diagnostic;
    this.reason = reason;
  }

  get code(): string {
    return this.diagnostic.code;
  }
}

export const completionError = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K> & { reason?: unknown }
): CompletionError => {
  const diagnostic = diagnosticFromCode({
    code: options.code,
    params: options.params,
    severity: options.severity,
    phase: options.phase,
    hints: options.hints,
  });
  return new CompletionError(diagnostic, options.reason);
};

export const isCompletionError = (
  value: unknown,
  code?: DiagnosticCode
): value is CompletionError =>
  value instanceof CompletionError && (!code || value.code === code);

export const completionDiagnostic = Symbol.for("completion-token.diagnostic");

/**
 * Type-level diagnostic. A token whose resolution produces one of these is
 * rejected by the initiating function's type parameter constraint, and the
 * message shows up in the compiler error.
 */
export type CompletionDiagnostic<
  Code extends DiagnosticCode,
  Message extends string,
> = {
  readonly [completionDiagnostic]: {
    readonly code: Code;
    readonly message: Message;
  };
};

export type AnyCompletionDiagnostic = CompletionDiagnostic<
  DiagnosticCode,
  string
>;
