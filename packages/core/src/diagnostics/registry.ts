import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const exactSignatureHint: DiagnosticHint = {
  message:
    "Declare one parameter per signature argument, none optional, and return nothing from the handler.",
};

const strategyHint: DiagnosticHint = {
  message:
    "Pass a handler function or a token created by a registered strategy (useDeferred, usePromise, detached, a yield context).",
};

type DiagnosticParamsMap = {
  // Type-level only: formats the mismatch reported by `CompletionTokenFor`.
  CT0001:
    | { kind: "handler-shape"; token: string; signature: string }
    | { kind: "strategy-handler"; strategy: string; signature: string };
  CT0002: { kind: "no-strategy"; token: string; signature: string };
  CT0003: { kind: "repeated-invocation"; strategy: string; signature: string };
  CT0004: {
    kind: "cancelled";
    strategy: string;
    signature: string;
    reason?: string;
  };
  CT0005: { kind: "value-pending"; strategy: string; signature: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  CT0001: {
    code: "CT0001",
    message: (params) => {
      switch (params.kind) {
        case "handler-shape":
          return `${params.token} cannot be invoked with exactly the arguments of ${params.signature}`;
        case "strategy-handler":
          return `strategy ${params.strategy} builds a handler that does not match ${params.signature}`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "resolution",
    hints: [exactSignatureHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CT0001"]>,
  CT0002: {
    code: "CT0002",
    message: (params) =>
      `no completion strategy resolves ${params.token} for ${params.signature}`,
    severity: "error",
    phase: "resolution",
    hints: [strategyHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CT0002"]>,
  CT0003: {
    code: "CT0003",
    message: (params) =>
      `${params.strategy} handler for ${params.signature} was invoked more than once`,
    severity: "error",
    phase: "completion",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CT0003"]>,
  CT0004: {
    code: "CT0004",
    message: (params) =>
      `${params.strategy} completion for ${params.signature} was cancelled${
        params.reason ? `: ${params.reason}` : ""
      }`,
    severity: "error",
    phase: "completion",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CT0004"]>,
  CT0005: {
    code: "CT0005",
    message: (params) =>
      `${params.strategy} result for ${params.signature} is read before its handler fired`,
    severity: "error",
    phase: "binding",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CT0005"]>,
};

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

const isDiagnosticCode = (code: string): code is DiagnosticCode =>
  code in diagnosticsRegistry;

const exhaustive = (_value: never): never => _value;
