export type CompletionTraceScope = "resolve" | "bind" | "invoke" | "settle";

export type CompletionTraceSink = (line: string) => void;

export type CompletionTraceOptions = {
  enabled?: boolean;
  sink?: CompletionTraceSink;
};

const COMPLETION_TRACE_ENV = "COMPLETION_TOKEN_TRACE";

const readTraceEnv = (): string | undefined => {
  const processValue = (globalThis as {
    process?: { env?: Record<string, string | undefined> };
  }).process;
  return processValue?.env?.[COMPLETION_TRACE_ENV];
};

const TRACE_ENV_ENABLED = (() => {
  const raw = readTraceEnv();
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
})();

const defaultSink: CompletionTraceSink = (line) => {
  console.error(line);
};

let enabledOverride: boolean | undefined;
let sink: CompletionTraceSink = defaultSink;

export const isCompletionTraceEnabled = (): boolean =>
  enabledOverride ?? TRACE_ENV_ENABLED;

/**
 * Overrides the environment switch and output sink. Returns a function that
 * restores the previous configuration.
 */
export const configureCompletionTrace = ({
  enabled,
  sink: nextSink,
}: CompletionTraceOptions): (() => void) => {
  const previous = { enabled: enabledOverride, sink };
  if (enabled !== undefined) enabledOverride = enabled;
  if (nextSink) sink = nextSink;
  return () => {
    enabledOverride = previous.enabled;
    sink = previous.sink;
  };
};

export const traceCompletion = (
  scope: CompletionTraceScope,
  payload: Readonly<Record<string, unknown>>
): void => {
  if (!isCompletionTraceEnabled()) {
    return;
  }
  sink(`[completion-token:${scope}] ${JSON.stringify(payload)}`);
};
